/**
 * Error taxonomy shared by the connection bridge, the lobby join sequence and
 * the backend client. Every failure a user command can end in is one of these.
 */

export type CompanionErrorCode =
  | "CONNECTION_FAILED"
  | "CONNECTION_EXHAUSTED"
  | "NOT_CONNECTED"
  | "LOBBY_NOT_FOUND"
  | "JOIN_FAILED"
  | "REMOTE_REQUEST_FAILED"
  | "MALFORMED_RESPONSE"
  | "LOCAL_REQUEST_FAILED"
  | "INVALID_INPUT"
  | "LOG_EXPORT_FAILED";

export interface CompanionErrorInfo {
  code: CompanionErrorCode;
  title: string;
  description: string;
  retryable: boolean;
}

export abstract class CompanionError extends Error {
  abstract readonly code: CompanionErrorCode;
  /** Short user-facing heading */
  abstract readonly title: string;

  /** Whether the same call may succeed if the caller tries again later */
  isRetryable(): boolean {
    return false;
  }

  toJSON(): CompanionErrorInfo {
    return {
      code: this.code,
      title: this.title,
      description: this.message,
      retryable: this.isRetryable(),
    };
  }
}

/** A single connect attempt to the local endpoint failed */
export class ConnectionError extends CompanionError {
  readonly code = "CONNECTION_FAILED";
  readonly title = "Connection Failed";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConnectionError";
  }

  override isRetryable(): boolean {
    return true;
  }
}

/** Every connect attempt of a cycle failed; terminal until a new cycle is started */
export class ConnectionExhaustedError extends CompanionError {
  readonly code = "CONNECTION_EXHAUSTED";
  readonly title = "Client Not Found";

  constructor(public readonly attempts: number, options?: ErrorOptions) {
    super(`Failed to connect to the League client after ${attempts} attempts`, options);
    this.name = "ConnectionExhaustedError";
  }
}

export class NotConnectedError extends CompanionError {
  readonly code = "NOT_CONNECTED";
  readonly title = "Not Connected";

  constructor(message = "The League client is not connected") {
    super(message);
    this.name = "NotConnectedError";
  }
}

export class LobbyNotFoundError extends CompanionError {
  readonly code = "LOBBY_NOT_FOUND";
  readonly title = "Lobby Not Found";

  constructor(public readonly target: string) {
    super(`Couldn't find ${target}'s lobby`);
    this.name = "LobbyNotFoundError";
  }
}

export class JoinFailedError extends CompanionError {
  readonly code = "JOIN_FAILED";
  readonly title = "Join Failed";

  constructor(
    public readonly reason: string,
    public readonly status?: number,
  ) {
    super(`Failed to join: ${reason}`);
    this.name = "JoinFailedError";
  }
}

/** Network failure, timeout or unexpected status from the remote backend */
export class RemoteRequestError extends CompanionError {
  readonly code = "REMOTE_REQUEST_FAILED";
  readonly title = "Server Error";

  constructor(
    public readonly endpoint: string,
    message: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "RemoteRequestError";
  }

  override isRetryable(): boolean {
    return this.status === undefined || this.status >= 500;
  }
}

export class MalformedResponseError extends CompanionError {
  readonly code = "MALFORMED_RESPONSE";
  readonly title = "Invalid Response";

  constructor(
    public readonly endpoint: string,
    public readonly body: string,
  ) {
    super(`Invalid response from ${endpoint}: ${JSON.stringify(body.slice(0, 120))}`);
    this.name = "MalformedResponseError";
  }
}

/** A call against the local endpoint failed in transport or returned an unusable payload */
export class LocalRequestError extends CompanionError {
  readonly code = "LOCAL_REQUEST_FAILED";
  readonly title = "Client Request Failed";

  constructor(
    public readonly method: string,
    public readonly path: string,
    message: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(`${method} ${path} failed: ${message}`, options);
    this.name = "LocalRequestError";
  }
}

/** User-entered text that could not be parsed */
export class InvalidInputError extends CompanionError {
  readonly code = "INVALID_INPUT";
  readonly title = "Invalid Format";

  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class LogExportError extends CompanionError {
  readonly code = "LOG_EXPORT_FAILED";
  readonly title = "Export Failed";

  constructor(
    public readonly directory: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Could not write logs to ${directory}: ${reason}`, options);
    this.name = "LogExportError";
  }
}

export function isCompanionError(error: unknown): error is CompanionError {
  return error instanceof CompanionError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
