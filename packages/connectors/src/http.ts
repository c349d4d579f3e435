import axios from "axios";
import { HandlerError } from "@opsflow/action-registry";

/**
 * Maps a transport failure onto a HandlerError. No response, 408, 429 and
 * 5xx are transient; other statuses are permanent.
 */
export function toTransportError(err: unknown, target: string): HandlerError {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    if (status === undefined) {
      return new HandlerError(`${target}_unreachable`, `${target} request failed: ${err.message}`, { retryable: true, cause: err });
    }
    const retryable = status >= 500 || status === 408 || status === 429;
    return new HandlerError(`${target}_rejected`, `${target} request failed with status ${status}`, {
      retryable,
      details: { status },
      cause: err
    });
  }
  if (err instanceof HandlerError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new HandlerError(`${target}_failed`, `${target} request failed: ${message}`, { cause: err });
}
