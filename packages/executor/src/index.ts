import crypto from "node:crypto";
import { defaultEventBus, type EventBus } from "@opsflow/event-bus";
import { toErrorInfo, type HandlerResolver, type StepContext } from "@opsflow/action-registry";
import type { ErrorInfo, Plan, RunReport, RunStatus, Step, StepResult } from "@opsflow/contracts";
import { StepTimeoutError, raceTimeout } from "./timeout";

export const UNSUPPORTED_ACTION = "unsupported action";
/** Skip reason for a step that stopped because the caller cancelled the run. */
export const CANCELLED_STEP = "cancelled";

export type ExecutorDeps = {
  eventBus?: EventBus;
  /** Default per-step bound; unset means handlers may take as long as they need. */
  stepTimeoutMs?: number;
};

export type RunOptions = {
  signal?: AbortSignal;
  stepTimeoutMs?: number;
  runId?: string;
};

/**
 * Runs plans one step at a time. Each call to `run` owns its log, so a single
 * executor can serve independent plans concurrently against a shared registry.
 */
export class WorkflowExecutor {
  private readonly bus: EventBus;
  private readonly stepTimeoutMs?: number;

  constructor({ eventBus = defaultEventBus, stepTimeoutMs }: ExecutorDeps = {}) {
    this.bus = eventBus;
    this.stepTimeoutMs = stepTimeoutMs;
  }

  async run(plan: Plan, registry: HandlerResolver, options: RunOptions = {}): Promise<RunReport> {
    const runId = options.runId ?? crypto.randomUUID();
    const timeoutMs = options.stepTimeoutMs ?? this.stepTimeoutMs;
    const startedAt = new Date().toISOString();
    const log: StepResult[] = [];
    let status: RunStatus = "succeeded";
    let error: ErrorInfo | undefined;

    await this.bus.publish("run.started", { run_id: runId, category: plan.category, step_count: plan.steps.length });

    for (const step of plan.steps) {
      if (options.signal?.aborted) {
        status = "cancelled";
        break;
      }

      const result = await this.runStep(runId, step, registry, log, options.signal, timeoutMs);
      log.push(result);
      await this.bus.publish("step.finished", { run_id: runId, result });

      if (result.outcome.status === "skipped" && result.outcome.reason === CANCELLED_STEP) {
        status = "cancelled";
        break;
      }
      if (result.outcome.status === "failure") {
        status = "failed";
        error = result.outcome.error;
        break;
      }
    }

    const report: RunReport = Object.freeze({
      runId,
      category: plan.category,
      status,
      log: Object.freeze([...log]),
      startedAt,
      finishedAt: new Date().toISOString()
    });

    await this.bus.publish("run.finished", {
      run_id: runId,
      category: plan.category,
      status,
      attempted: log.length,
      ...(error ? { error } : {})
    });
    return report;
  }

  private async runStep(
    runId: string,
    step: Step,
    registry: HandlerResolver,
    log: StepResult[],
    runSignal: AbortSignal | undefined,
    timeoutMs: number | undefined
  ): Promise<StepResult> {
    const handler = registry.resolve(step.action);
    if (!handler) {
      return { step, outcome: { status: "skipped", reason: UNSUPPORTED_ACTION }, durationMs: 0 };
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort(runSignal?.reason);
    runSignal?.addEventListener("abort", forwardAbort, { once: true });

    const context: StepContext = {
      runId,
      step,
      previous: Object.freeze([...log]),
      signal: controller.signal
    };

    let timedOut = false;
    const started = performance.now();
    try {
      const work = Promise.resolve().then(() => handler(step.parameters, context));
      const payload = await raceTimeout(work, timeoutMs, () => {
        timedOut = true;
        const timeout = new StepTimeoutError(step.action, timeoutMs ?? 0);
        controller.abort(timeout);
        return timeout;
      });
      return { step, outcome: { status: "success", payload }, durationMs: elapsed(started) };
    } catch (err) {
      // A handler that stops because the caller aborted is not at fault.
      if (runSignal?.aborted && !timedOut) {
        return { step, outcome: { status: "skipped", reason: CANCELLED_STEP }, durationMs: elapsed(started) };
      }
      return { step, outcome: { status: "failure", error: toErrorInfo(err) }, durationMs: elapsed(started) };
    } finally {
      runSignal?.removeEventListener("abort", forwardAbort);
    }
  }
}

const elapsed = (started: number) => Math.max(0, performance.now() - started);

export { StepTimeoutError, raceTimeout } from "./timeout";
