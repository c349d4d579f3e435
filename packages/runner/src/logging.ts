import type { EventBus, Subscription } from "@opsflow/event-bus";

export function attachConsoleLogging(bus: EventBus): Subscription[] {
  return [
    bus.subscribe("plan.built", ({ plan }) => {
      console.log("[plan.built]", plan.category, plan.steps.map((step) => step.action).join(" -> ") || "(empty)");
    }),
    bus.subscribe("run.started", ({ run_id, category, step_count }) => {
      console.log("[run.started]", run_id, category, `${step_count} steps`);
    }),
    bus.subscribe("step.finished", ({ run_id, result }) => {
      const { step, outcome, durationMs } = result;
      const detail = outcome.status === "failure" ? outcome.error.message : outcome.status === "skipped" ? outcome.reason : "";
      const line = ["[step.finished]", run_id, `#${step.index}`, step.action, outcome.status, `${Math.round(durationMs)}ms`, detail].filter(Boolean);
      if (outcome.status === "failure") console.error(...line);
      else console.log(...line);
    }),
    bus.subscribe("run.finished", ({ run_id, category, status, attempted }) => {
      console.log("[run.finished]", run_id, category, status, `${attempted} attempted`);
    })
  ];
}
