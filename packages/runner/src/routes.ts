import { PlanningError } from "@opsflow/planner";
import type { RunnerApp } from "./app";

export type RouteResponse = {
  status: number;
  body: unknown;
};

function parseBody(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(raw || "{}") };
  } catch {
    return { ok: false };
  }
}

function planningFailed(err: PlanningError): RouteResponse {
  return {
    status: 422,
    body: { error: "planning_failed", code: err.code, message: err.message, missing: err.missing }
  };
}

/**
 * Maps a request onto the app. Kept free of sockets so the transport can be
 * swapped or exercised directly.
 */
export async function handleRequest(app: RunnerApp, method: string, url: string, rawBody = ""): Promise<RouteResponse> {
  const path = url.split("?")[0];

  if (method === "GET" && path === "/health") {
    return { status: 200, body: { status: "ok" } };
  }

  if (method === "GET" && path === "/actions") {
    return { status: 200, body: { actions: app.registry.actions() } };
  }

  if (method === "GET" && path === "/workflows") {
    const workflows = app.planner.categories().map((category) => app.planner.describe(category));
    return { status: 200, body: { workflows } };
  }

  if (method === "POST" && (path === "/workflows" || path === "/workflows/preview")) {
    const body = parseBody(rawBody);
    if (!body.ok) {
      return { status: 400, body: { error: "invalid_payload" } };
    }
    try {
      if (path === "/workflows/preview") {
        return { status: 200, body: { plan: app.orchestrator.preview(body.value) } };
      }
      return { status: 200, body: await app.orchestrator.submit(body.value) };
    } catch (err) {
      if (err instanceof PlanningError) return planningFailed(err);
      throw err;
    }
  }

  return { status: 404, body: { error: "not_found" } };
}
