import type { z } from "zod";
import { InvalidParametersError } from "@opsflow/action-registry";

/**
 * Narrows a step's untyped parameter mapping, failing the step before any
 * connector logic runs.
 */
export function parseParameters<S extends z.ZodTypeAny>(action: string, schema: S, input: unknown): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidParametersError(
      action,
      parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
    );
  }
  return parsed.data;
}
