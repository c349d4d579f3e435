import type { ErrorInfo, IntentSpec, Plan, RunStatus, StepResult } from "@opsflow/contracts";

export type DomainEvents = {
  "plan.built": {
    intent: IntentSpec;
    plan: Plan;
  };
  "run.started": {
    run_id: string;
    category: string;
    step_count: number;
  };
  "step.finished": {
    run_id: string;
    result: StepResult;
  };
  "run.finished": {
    run_id: string;
    category: string;
    status: RunStatus;
    attempted: number;
    error?: ErrorInfo;
  };
};

export type DomainEventName = keyof DomainEvents;
