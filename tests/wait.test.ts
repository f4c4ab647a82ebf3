import { CancelledError, PollTimeoutError } from "../src/errors.js";
import { sleep, waitFor } from "../src/wait.js";

describe("waitFor", () => {
  test("runs the first check immediately", async () => {
    const check = jest.fn(async () => true);
    const started = Date.now();

    await waitFor(check, { timeoutMs: 60_000, intervalMs: 10_000 });

    expect(check).toHaveBeenCalledTimes(1);
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  test("keeps polling until the condition holds", async () => {
    let calls = 0;
    await waitFor(async () => ++calls === 3, { timeoutMs: 5_000, intervalMs: 1 });
    expect(calls).toBe(3);
  });

  test("times out with the description in the message", async () => {
    const wait = waitFor(async () => false, { timeoutMs: 20, intervalMs: 5, description: "thing" });

    await expect(wait).rejects.toBeInstanceOf(PollTimeoutError);
    await expect(wait).rejects.toThrow("timed out after 20ms waiting for thing");
  });

  test("stops sleeping as soon as the signal aborts", async () => {
    const controller = new AbortController();
    const check = jest.fn(async () => false);
    const wait = waitFor(check, {
      timeoutMs: 60_000,
      intervalMs: 60_000,
      signal: controller.signal,
      description: "thing",
    });

    setTimeout(() => controller.abort(), 10);

    await expect(wait).rejects.toBeInstanceOf(CancelledError);
    await expect(wait).rejects.toThrow("cancelled while waiting for thing");
    expect(check).toHaveBeenCalledTimes(1);
  });

  test("never checks when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const check = jest.fn(async () => true);

    await expect(waitFor(check, { timeoutMs: 1_000, signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    expect(check).not.toHaveBeenCalled();
  });

  test("a failing check ends the wait with its error", async () => {
    let calls = 0;
    const wait = waitFor(
      async () => {
        calls++;
        throw new Error("boom");
      },
      { timeoutMs: 5_000, intervalMs: 1 }
    );

    await expect(wait).rejects.toThrow("boom");
    expect(calls).toBe(1);
  });
});

describe("sleep", () => {
  test("resolves after the delay", async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });

  test("rejects right away on an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(60_000, controller.signal, "napping")).rejects.toThrow("cancelled while napping");
  });
});
