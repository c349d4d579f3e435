import type { IntentSpec, Plan } from "@opsflow/contracts";

export interface Planner {
  build(intent: IntentSpec): Plan;
}

export type TemplateSummary = {
  category: string;
  description: string;
  required: string[];
  optional: string[];
  actions: string[];
};
