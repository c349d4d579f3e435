import fs from "node:fs";
import { IntentSpecSchema, createPlan, emptyPlan, type IntentSpec, type Plan } from "@opsflow/contracts";
import { PlanningError } from "./errors";
import { bindParameters, defaultTemplates, parseTemplates, type WorkflowTemplate } from "./templates";
import type { Planner, TemplateSummary } from "./types";

/**
 * Validates untyped input (a request body, a queue message) as an intent.
 */
export function parseIntent(input: unknown): IntentSpec {
  const parsed = IntentSpecSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".") || "intent"}: ${issue.message}`).join("; ");
    throw new PlanningError("invalid_intent", `Invalid intent: ${detail}`);
  }
  return parsed.data;
}

const isBlank = (value: unknown) => value === undefined || value === null || (typeof value === "string" && value.trim() === "");

export class WorkflowPlanner implements Planner {
  private readonly templates = new Map<string, WorkflowTemplate>();

  constructor(templates: WorkflowTemplate[] = defaultTemplates) {
    for (const template of templates) {
      this.templates.set(template.category, template);
    }
  }

  static fromFile(path: string): WorkflowPlanner {
    const raw = fs.readFileSync(path, "utf-8");
    return new WorkflowPlanner(parseTemplates(JSON.parse(raw)));
  }

  /**
   * Same intent in, same plan out. Unknown categories plan to nothing; known
   * ones with required parameters missing throw before any step is built.
   */
  build(intent: IntentSpec): Plan {
    const { category, parameters } = parseIntent(intent);

    const template = this.templates.get(category);
    if (!template) return emptyPlan(category);

    const values = this.resolveValues(template, parameters);
    const steps = template.steps.map((step) => ({
      action: step.action,
      parameters: this.bind(category, step.parameters, values)
    }));
    return createPlan(category, steps);
  }

  categories(): string[] {
    return [...this.templates.keys()].sort();
  }

  describe(category: string): TemplateSummary | undefined {
    const template = this.templates.get(category);
    if (!template) return undefined;
    const names = Object.keys(template.parameters).sort();
    return {
      category,
      description: template.description,
      required: names.filter((name) => template.parameters[name].required),
      optional: names.filter((name) => !template.parameters[name].required),
      actions: template.steps.map((step) => step.action)
    };
  }

  private resolveValues(template: WorkflowTemplate, parameters: Record<string, unknown>): Map<string, unknown> {
    const values = new Map<string, unknown>();
    const missing: string[] = [];

    for (const [name, declared] of Object.entries(template.parameters)) {
      const provided = parameters[name];
      if (!isBlank(provided)) {
        values.set(name, provided);
      } else if (declared.default !== undefined) {
        values.set(name, declared.default);
      } else if (declared.required) {
        missing.push(name);
      }
    }

    if (missing.length > 0) {
      missing.sort();
      throw new PlanningError(
        "missing_parameters",
        `Workflow ${template.category} is missing required parameters: ${missing.join(", ")}`,
        { category: template.category, missing }
      );
    }
    return values;
  }

  private bind(category: string, parameters: Record<string, unknown>, values: Map<string, unknown>): Record<string, unknown> {
    try {
      return bindParameters(parameters, values);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new PlanningError("invalid_intent", `Parameters for ${category} cannot be copied into a plan: ${reason}`, { category });
    }
  }
}

export { PlanningError } from "./errors";
export type { PlanningErrorCode } from "./errors";
export { parseTemplates, defaultTemplates, WorkflowTemplateSchema } from "./templates";
export type { WorkflowTemplate } from "./templates";
export type * from "./types";
