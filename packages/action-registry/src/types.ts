import type { ExecutionLog, Step } from "@opsflow/contracts";

export type StepContext = {
  readonly runId: string;
  readonly step: Step;
  /** Results of the steps already attempted in this run. */
  readonly previous: ExecutionLog;
  readonly signal: AbortSignal;
};

export type ActionHandler<P = Record<string, unknown>> = (parameters: P, context: StepContext) => unknown | Promise<unknown>;

export type DuplicatePolicy = "reject" | "replace";

export type ActionRegistryOptions = {
  onDuplicate?: DuplicatePolicy;
};

/** Read side of the registry, the only part the executor needs. */
export interface HandlerResolver {
  resolve(action: string): ActionHandler | undefined;
}
