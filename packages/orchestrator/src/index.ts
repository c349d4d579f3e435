import type { Plan, RunReport } from "@opsflow/contracts";
import { defaultEventBus, type EventBus } from "@opsflow/event-bus";
import type { HandlerResolver } from "@opsflow/action-registry";
import { parseIntent, type Planner } from "@opsflow/planner";
import { WorkflowExecutor, type RunOptions } from "@opsflow/executor";

export type OrchestratorDeps = {
  eventBus?: EventBus;
  planner: Planner;
  registry: HandlerResolver;
  executor?: WorkflowExecutor;
};

export type SubmitOptions = Pick<RunOptions, "signal" | "stepTimeoutMs">;

/**
 * Handles one command end to end: intent in, run report out. Planning errors
 * are thrown to the caller; execution errors live in the report.
 */
export class WorkflowOrchestrator {
  private readonly bus: EventBus;
  private readonly planner: Planner;
  private readonly registry: HandlerResolver;
  private readonly executor: WorkflowExecutor;

  constructor({ eventBus = defaultEventBus, planner, registry, executor }: OrchestratorDeps) {
    this.bus = eventBus;
    this.planner = planner;
    this.registry = registry;
    this.executor = executor ?? new WorkflowExecutor({ eventBus });
  }

  preview(input: unknown): Plan {
    return this.planner.build(parseIntent(input));
  }

  async submit(input: unknown, options: SubmitOptions = {}): Promise<RunReport> {
    const intent = parseIntent(input);
    const plan = this.planner.build(intent);
    await this.bus.publish("plan.built", { intent, plan });
    return this.executor.run(plan, this.registry, options);
  }
}
