import type { StepContext } from "@opsflow/action-registry";

export interface Connector {
  readonly action: string;
  handle(parameters: Record<string, unknown>, context: StepContext): Promise<unknown>;
}
