import { ActionRegistry, HandlerError, withRetry, type StepContext } from "@opsflow/action-registry";
import { createPlan, type Plan } from "@opsflow/contracts";
import { EventBus, type DomainEventName } from "@opsflow/event-bus";
import { CANCELLED_STEP, UNSUPPORTED_ACTION, WorkflowExecutor } from "./index";

const planOf = (...actions: string[]): Plan => createPlan("test", actions.map((action) => ({ action, parameters: {} })));

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("WorkflowExecutor", () => {
  let executor: WorkflowExecutor;

  beforeEach(() => {
    executor = new WorkflowExecutor({ eventBus: new EventBus() });
  });

  it("runs every step in order and succeeds", async () => {
    const registry = new ActionRegistry().register("one", () => 1).register("two", async () => 2).register("three", () => 3);
    const report = await executor.run(planOf("one", "two", "three"), registry);

    expect(report.status).toBe("succeeded");
    expect(report.log.map((entry) => [entry.step.index, entry.step.action, entry.outcome])).toEqual([
      [0, "one", { status: "success", payload: 1 }],
      [1, "two", { status: "success", payload: 2 }],
      [2, "three", { status: "success", payload: 3 }]
    ]);
    expect(Object.isFrozen(report.log)).toBe(true);
  });

  it("stops at the first failure and never calls later handlers", async () => {
    const later = { four: 0, five: 0 };
    const registry = new ActionRegistry()
      .register("one", () => "a")
      .register("two", () => "b")
      .register("three", () => {
        throw new Error("report renderer crashed");
      })
      .register("four", () => {
        later.four += 1;
      })
      .register("five", () => {
        later.five += 1;
      });

    const report = await executor.run(planOf("one", "two", "three", "four", "five"), registry);

    expect(report.status).toBe("failed");
    expect(report.log).toHaveLength(3);
    expect(report.log[2].outcome).toEqual({
      status: "failure",
      error: { code: "handler_error", message: "report renderer crashed", retryable: false }
    });
    expect(later).toEqual({ four: 0, five: 0 });
  });

  it("records rejected promises and handler error codes", async () => {
    const registry = new ActionRegistry().register("send_email", async () => {
      throw new HandlerError("mail_rejected", "mail request failed with status 503", { retryable: true });
    });
    const report = await executor.run(planOf("send_email"), registry);

    expect(report.log[0].outcome).toEqual({
      status: "failure",
      error: { code: "mail_rejected", message: "mail request failed with status 503", retryable: true }
    });
  });

  it("skips unsupported actions and carries on", async () => {
    const registry = new ActionRegistry().register("one", () => "first").register("three", () => "third");
    const report = await executor.run(planOf("one", "two", "three"), registry);

    expect(report.status).toBe("succeeded");
    expect(report.log.map((entry) => entry.outcome)).toEqual([
      { status: "success", payload: "first" },
      { status: "skipped", reason: UNSUPPORTED_ACTION },
      { status: "success", payload: "third" }
    ]);
  });

  it("returns an empty log for an empty plan", async () => {
    const report = await executor.run(planOf(), new ActionRegistry());
    expect(report).toMatchObject({ category: "test", status: "succeeded", log: [] });
  });

  it("hands each handler its parameters and the results so far", async () => {
    const seen: Array<{ parameters: Record<string, unknown>; previous: string[] }> = [];
    const record = (parameters: Record<string, unknown>, context: StepContext) => {
      seen.push({ parameters, previous: context.previous.map((entry) => entry.step.action) });
      return context.step.index;
    };
    const registry = new ActionRegistry().register("fetch_crm", record).register("analyze", record);
    const plan = createPlan("test", [
      { action: "fetch_crm", parameters: { limit: 2 } },
      { action: "analyze", parameters: { topN: 1 } }
    ]);

    await executor.run(plan, registry);
    expect(seen).toEqual([
      { parameters: { limit: 2 }, previous: [] },
      { parameters: { topN: 1 }, previous: ["fetch_crm"] }
    ]);
  });

  it("does not start when cancelled up front", async () => {
    const handler = vi.fn();
    const controller = new AbortController();
    controller.abort();

    const report = await executor.run(planOf("one"), new ActionRegistry().register("one", handler), { signal: controller.signal });
    expect(report.status).toBe("cancelled");
    expect(report.log).toEqual([]);
    expect(handler).not.toHaveBeenCalled();
  });

  it("stops between steps when cancelled mid-run", async () => {
    const controller = new AbortController();
    const second = vi.fn();
    const registry = new ActionRegistry()
      .register("one", () => {
        controller.abort();
        return "done";
      })
      .register("two", second);

    const report = await executor.run(planOf("one", "two"), registry, { signal: controller.signal });
    expect(report.status).toBe("cancelled");
    expect(report.log.map((entry) => entry.outcome)).toEqual([{ status: "success", payload: "done" }]);
    expect(second).not.toHaveBeenCalled();
  });

  it("reports a cancelled run when a handler stops on the caller's abort", async () => {
    const controller = new AbortController();
    const after = vi.fn();
    const registry = new ActionRegistry()
      .register(
        "fetch_crm",
        (_parameters, context) =>
          new Promise((_, reject) => {
            context.signal.addEventListener("abort", () => reject(context.signal.reason), { once: true });
          })
      )
      .register("analyze", after);
    const finished = vi.fn();
    const bus = new EventBus();
    bus.subscribe("run.finished", finished);

    setTimeout(() => controller.abort(), 10);
    const report = await new WorkflowExecutor({ eventBus: bus }).run(planOf("fetch_crm", "analyze"), registry, {
      signal: controller.signal,
      runId: "run-7"
    });

    expect(report.status).toBe("cancelled");
    expect(report.log.map((entry) => entry.outcome)).toEqual([{ status: "skipped", reason: CANCELLED_STEP }]);
    expect(after).not.toHaveBeenCalled();
    expect(finished).toHaveBeenCalledWith({ run_id: "run-7", category: "test", status: "cancelled", attempted: 1 });
  });

  it("does not retry a handler after its step timed out", async () => {
    let calls = 0;
    const registry = new ActionRegistry().register(
      "send_email",
      withRetry(
        () => {
          calls += 1;
          throw new HandlerError("mail_unreachable", "mail request failed: timeout", { retryable: true });
        },
        { attempts: 3, delayMs: 100 }
      )
    );

    const report = await executor.run(planOf("send_email"), registry, { stepTimeoutMs: 30 });
    expect(report.status).toBe("failed");
    expect(report.log[0].outcome).toMatchObject({ status: "failure", error: { code: "step_timeout" } });

    await sleep(150);
    expect(calls).toBe(1);
  });

  it("fails a step that outlives the timeout and aborts its signal", async () => {
    let stepSignal: AbortSignal | undefined;
    const after = vi.fn();
    const registry = new ActionRegistry()
      .register("slow", (_parameters, context) => {
        stepSignal = context.signal;
        return new Promise(() => undefined);
      })
      .register("after", after);

    const report = await executor.run(planOf("slow", "after"), registry, { stepTimeoutMs: 20 });
    expect(report.status).toBe("failed");
    expect(report.log).toHaveLength(1);
    expect(report.log[0].outcome).toEqual({
      status: "failure",
      error: {
        code: "step_timeout",
        message: "slow did not finish within 20ms",
        retryable: true,
        details: { action: "slow", timeoutMs: 20 }
      }
    });
    expect(stepSignal?.aborted).toBe(true);
    expect(after).not.toHaveBeenCalled();
  });

  it("keeps concurrent runs of different plans apart", async () => {
    const registry = new ActionRegistry()
      .register("echo", async (parameters, context) => {
        await sleep(Number(parameters.delay));
        return { tag: parameters.tag, seen: context.previous.map((entry) => entry.step.parameters.tag) };
      })
      .freeze();
    const tagged = (tags: Array<[string, number]>) => createPlan("echo", tags.map(([tag, delay]) => ({ action: "echo", parameters: { tag, delay } })));

    const [a, b] = await Promise.all([
      executor.run(tagged([["a1", 5], ["a2", 1], ["a3", 3]]), registry),
      executor.run(tagged([["b1", 1], ["b2", 4]]), registry)
    ]);

    expect(a.runId).not.toBe(b.runId);
    expect(a.log.map((entry) => entry.outcome)).toEqual([
      { status: "success", payload: { tag: "a1", seen: [] } },
      { status: "success", payload: { tag: "a2", seen: ["a1"] } },
      { status: "success", payload: { tag: "a3", seen: ["a1", "a2"] } }
    ]);
    expect(b.log.map((entry) => entry.outcome)).toEqual([
      { status: "success", payload: { tag: "b1", seen: [] } },
      { status: "success", payload: { tag: "b2", seen: ["b1"] } }
    ]);
  });

  it("publishes lifecycle events", async () => {
    const bus = new EventBus();
    const events: DomainEventName[] = [];
    bus.subscribe("run.started", () => {
      events.push("run.started");
    });
    bus.subscribe("step.finished", () => {
      events.push("step.finished");
    });
    const finished = vi.fn();
    bus.subscribe("run.finished", finished);

    const registry = new ActionRegistry().register("one", () => 1).register("two", () => {
      throw new Error("nope");
    });
    const report = await new WorkflowExecutor({ eventBus: bus }).run(planOf("one", "two"), registry, { runId: "run-42" });

    expect(report.runId).toBe("run-42");
    expect(events).toEqual(["run.started", "step.finished", "step.finished"]);
    expect(finished).toHaveBeenCalledWith({
      run_id: "run-42",
      category: "test",
      status: "failed",
      attempted: 2,
      error: { code: "handler_error", message: "nope", retryable: false }
    });
  });
});
