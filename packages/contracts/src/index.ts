import { z } from "zod";

/**
 * Shared enums
 */
export const RunStatusEnum = z.enum(["succeeded", "failed", "cancelled"]);
export const ReportFormatEnum = z.enum(["markdown", "csv", "json", "html"]);

const ParametersSchema = z.record(z.unknown());

/**
 * Intent contract: already-parsed structured input from the command layer.
 */
export const IntentSpecSchema = z.object({
  category: z.string().min(1),
  parameters: ParametersSchema.default({})
});

/**
 * Plan contracts
 */
export const StepSchema = z.object({
  action: z.string().min(1),
  parameters: ParametersSchema,
  index: z.number().int().nonnegative()
});

/**
 * Execution contracts
 */
export const ErrorInfoSchema = z.object({
  code: z.string(),
  message: z.string(),
  retryable: z.boolean(),
  details: z.record(z.unknown()).optional()
});

export const StepOutcomeSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("success"),
    payload: z.unknown()
  }),
  z.object({
    status: z.literal("failure"),
    error: ErrorInfoSchema
  }),
  z.object({
    status: z.literal("skipped"),
    reason: z.string()
  })
]);

const StepResultSchema = z.object({
  step: StepSchema,
  outcome: StepOutcomeSchema,
  durationMs: z.number().nonnegative()
});

export const RunReportSchema = z.object({
  runId: z.string(),
  category: z.string(),
  status: RunStatusEnum,
  log: z.array(StepResultSchema),
  startedAt: z.string(),
  finishedAt: z.string()
});

export type IntentSpec = z.infer<typeof IntentSpecSchema>;
export type RunStatus = z.infer<typeof RunStatusEnum>;
export type ReportFormat = z.infer<typeof ReportFormatEnum>;
export type ErrorInfo = z.infer<typeof ErrorInfoSchema>;
export type StepOutcome = z.infer<typeof StepOutcomeSchema>;

export type Step = Readonly<z.infer<typeof StepSchema>>;

export type Plan = {
  readonly category: string;
  readonly steps: readonly Step[];
};

export type StepResult = {
  readonly step: Step;
  readonly outcome: StepOutcome;
  readonly durationMs: number;
};

export type ExecutionLog = readonly StepResult[];

/** Serialized form matches `RunReportSchema`. */
export type RunReport = {
  readonly runId: string;
  readonly category: string;
  readonly status: RunStatus;
  readonly log: ExecutionLog;
  readonly startedAt: string;
  readonly finishedAt: string;
};

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) deepFreeze(nested);
    Object.freeze(value);
  }
  return value;
}

/**
 * Builds a frozen plan. Steps are re-indexed by position so `index` always
 * matches execution order.
 */
export function createPlan(category: string, steps: Array<{ action: string; parameters: Record<string, unknown> }>): Plan {
  const placed = steps.map((step, index) =>
    Object.freeze({ action: step.action, parameters: deepFreeze({ ...step.parameters }), index })
  );
  return Object.freeze({ category, steps: Object.freeze(placed) });
}

export const emptyPlan = (category: string): Plan => createPlan(category, []);

/**
 * Payload of the most recent successful step for `action`, searching backwards.
 */
export function latestPayload(log: ExecutionLog, action: string): unknown {
  for (let i = log.length - 1; i >= 0; i--) {
    const entry = log[i];
    if (entry.step.action === action && entry.outcome.status === "success") {
      return entry.outcome.payload;
    }
  }
  return undefined;
}
