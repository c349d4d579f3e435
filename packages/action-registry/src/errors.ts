import type { ErrorInfo } from "@opsflow/contracts";

export type HandlerErrorOptions = {
  retryable?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
};

/**
 * Failure reported by an action handler. `retryable` marks transient faults
 * (network, 5xx, timeouts) that a retry decorator may attempt again.
 */
export class HandlerError extends Error {
  readonly code: string;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, { retryable = false, details, cause }: HandlerErrorOptions = {}) {
    super(message, { cause });
    this.name = "HandlerError";
    this.code = code;
    this.retryable = retryable;
    this.details = details;
  }
}

export type ParameterIssue = {
  path: string;
  message: string;
};

export class InvalidParametersError extends HandlerError {
  readonly issues: ParameterIssue[];

  constructor(action: string, issues: ParameterIssue[]) {
    const summary = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join("; ");
    super("invalid_parameters", `Invalid parameters for ${action}: ${summary}`, {
      retryable: false,
      details: { action, issues }
    });
    this.name = "InvalidParametersError";
    this.issues = issues;
  }
}

export type RegistryErrorCode = "duplicate_action" | "registry_frozen";

export class RegistryError extends Error {
  constructor(readonly code: RegistryErrorCode, message: string) {
    super(message);
    this.name = "RegistryError";
  }
}

export function toErrorInfo(err: unknown): ErrorInfo {
  if (err instanceof HandlerError) {
    return {
      code: err.code,
      message: err.message,
      retryable: err.retryable,
      ...(err.details ? { details: err.details } : {})
    };
  }
  if (err instanceof Error) {
    return { code: "handler_error", message: err.message, retryable: false };
  }
  return { code: "unknown_error", message: String(err), retryable: false };
}
