import { spawn } from "node:child_process";

export interface BrowserCommand {
  command: string;
  args: string[];
}

/** Only http and https links are handed to the system */
export function browserCommand(url: string, platform: NodeJS.Platform = process.platform): BrowserCommand {
  const parsed = new URL(url);
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`Unsafe protocol: ${parsed.protocol}`);
  }
  const href = parsed.toString();

  switch (platform) {
    case "win32":
      // rundll32 takes the URL as-is, so cmd never parses `&` in it
      return { command: "rundll32", args: ["url.dll,FileProtocolHandler", href] };
    case "darwin":
      return { command: "open", args: [href] };
    default:
      return { command: "xdg-open", args: [href] };
  }
}

/** Opens the link in the default browser; resolves once the launcher has started */
export function openInBrowser(url: string): Promise<void> {
  let launch: BrowserCommand;
  try {
    launch = browserCommand(url);
  } catch (error) {
    return Promise.reject(error);
  }

  return new Promise((resolve, reject) => {
    const child = spawn(launch.command, launch.args, { detached: true, stdio: "ignore" });
    child.once("error", reject);
    child.once("spawn", () => {
      child.unref();
      resolve();
    });
  });
}
