export type PlanningErrorCode = "missing_parameters" | "invalid_intent";

/**
 * Raised by `build` before any step exists. A plan is either complete or
 * not produced at all.
 */
export class PlanningError extends Error {
  readonly code: PlanningErrorCode;
  readonly category?: string;
  readonly missing: string[];

  constructor(code: PlanningErrorCode, message: string, { category, missing = [] }: { category?: string; missing?: string[] } = {}) {
    super(message);
    this.name = "PlanningError";
    this.code = code;
    this.category = category;
    this.missing = missing;
  }
}
