/**
 * Unit tests for the connection context queue and the action dispatcher.
 *
 * Run: npx tsx tests/dispatcher.test.ts
 */

import { ActionDispatcher, ConnectionContext } from "../src/main/lcu/dispatcher";
import { NotConnectedError } from "../src/main/lcu/errors";

import { FakeLcuHandle } from "./fakes";
import { assert, captureRejection, flush, runTests } from "./harness";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

runTests("Connection context and dispatcher", async () => {
  console.log("Serial execution:");
  {
    const context = new ConnectionContext(new FakeLcuHandle(), 1);
    const log: string[] = [];
    const gate = deferred();

    const first = context.enqueue(async () => {
      log.push("first:start");
      await gate.promise;
      log.push("first:end");
      return 1;
    }, "first");
    const second = context.enqueue(() => {
      log.push("second");
      return 2;
    }, "second");

    await flush();
    assert(log.join(",") === "first:start", "second job waits for the first");
    assert(context.pending === 1, "one job still queued");

    gate.resolve();
    const results = await Promise.all([first, second]);
    assert(log.join(",") === "first:start,first:end,second", "jobs run in enqueue order");
    assert(results[0] === 1 && results[1] === 2, "each caller gets its own result");
    await context.whenIdle();
    assert(context.pending === 0, "queue drains");
  }

  console.log("\nErrors stay with their job:");
  {
    const context = new ConnectionContext(new FakeLcuHandle(), 2);
    const failing = context.enqueue(() => {
      throw new Error("job boom");
    }, "failing");
    const after = context.enqueue(() => "still runs", "after");
    const error = await captureRejection(failing);
    assert(error instanceof Error && error.message === "job boom", "job error reaches its caller");
    assert((await after) === "still runs", "later jobs still run");
  }

  console.log("\nClosing:");
  {
    const context = new ConnectionContext(new FakeLcuHandle(), 3);
    const gate = deferred();
    const running = context.enqueue(async () => {
      await gate.promise;
      return "finished";
    }, "running");
    const queued = context.enqueue(() => "never", "join-lobby");
    await flush();

    context.close();
    const queuedError = await captureRejection(queued);
    assert(queuedError instanceof NotConnectedError, "queued job fails with NotConnectedError");
    assert(
      queuedError instanceof Error && queuedError.message === 'Connection lost before "join-lobby" could run',
      "failure names the dropped job",
    );

    gate.resolve();
    assert((await running) === "finished", "the job already running completes");
    assert(context.closed, "context reports closed");

    const late = await captureRejection(context.enqueue(() => "late"));
    assert(late instanceof NotConnectedError, "enqueue after close rejects");
  }

  console.log("\nDispatcher routing:");
  {
    const dispatcher = new ActionDispatcher();
    const idle = await captureRejection(dispatcher.invokeOnConnectionContext(() => "x"));
    assert(idle instanceof NotConnectedError, "no context rejects with NotConnectedError");
    assert(!dispatcher.connected, "not connected without a context");

    const handle = new FakeLcuHandle();
    const context = new ConnectionContext(handle, 4);
    dispatcher.attach(context);
    assert(dispatcher.connected, "connected once attached");
    const seen = await dispatcher.invokeOnConnectionContext((active) => active === handle, "identity");
    assert(seen, "job receives the context's handle");

    dispatcher.detach(new ConnectionContext(new FakeLcuHandle(), 5));
    assert(dispatcher.connected, "detaching another context is a no-op");

    context.close();
    const closed = await captureRejection(dispatcher.invokeOnConnectionContext(() => "x"));
    assert(closed instanceof NotConnectedError, "closed context rejects");

    dispatcher.detach(context);
    assert(!dispatcher.connected, "detach clears the current context");
  }
});
