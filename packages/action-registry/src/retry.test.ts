import { HandlerError } from "./errors";
import { withRetry } from "./retry";
import type { StepContext } from "./types";

const contextWith = (signal: AbortSignal = new AbortController().signal): StepContext => ({
  runId: "run-1",
  step: { action: "send_email", parameters: {}, index: 0 },
  previous: [],
  signal
});

const transient = () => new HandlerError("mail_unreachable", "mail request failed", { retryable: true });

describe("withRetry", () => {
  it("retries transient failures until the handler succeeds", async () => {
    let calls = 0;
    const handler = withRetry(
      () => {
        calls += 1;
        if (calls < 3) throw transient();
        return "sent";
      },
      { attempts: 3, delayMs: 0 }
    );

    await expect(handler({}, contextWith())).resolves.toBe("sent");
    expect(calls).toBe(3);
  });

  it("gives up after the configured number of attempts", async () => {
    let calls = 0;
    const handler = withRetry(
      () => {
        calls += 1;
        throw transient();
      },
      { attempts: 2, delayMs: 0 }
    );

    await expect(handler({}, contextWith())).rejects.toMatchObject({ code: "mail_unreachable" });
    expect(calls).toBe(2);
  });

  it("does not retry permanent failures", async () => {
    let calls = 0;
    const handler = withRetry(
      () => {
        calls += 1;
        throw new HandlerError("mail_rejected", "bad address");
      },
      { attempts: 5, delayMs: 0 }
    );

    await expect(handler({}, contextWith())).rejects.toThrow("bad address");
    expect(calls).toBe(1);
  });

  it("stops retrying once the step is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;
    const handler = withRetry(
      () => {
        calls += 1;
        throw transient();
      },
      { attempts: 3, delayMs: 0 }
    );

    await expect(handler({}, contextWith(controller.signal))).rejects.toBeInstanceOf(HandlerError);
    expect(calls).toBe(1);
  });

  it("does not call the handler again when aborted during the delay", async () => {
    const controller = new AbortController();
    let calls = 0;
    const handler = withRetry(
      () => {
        calls += 1;
        throw transient();
      },
      { attempts: 3, delayMs: 1_000 }
    );

    const pending = handler({}, contextWith(controller.signal));
    setTimeout(() => controller.abort(), 10);

    await expect(pending).rejects.toMatchObject({ code: "mail_unreachable" });
    expect(calls).toBe(1);
  });
});
