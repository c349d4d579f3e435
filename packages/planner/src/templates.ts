import { z } from "zod";
import workflows from "../templates/workflows.json";

const TemplateParameterSchema = z.object({
  required: z.boolean().default(false),
  default: z.unknown().optional(),
  description: z.string().optional()
});

const TemplateStepSchema = z.object({
  action: z.string().min(1),
  parameters: z.record(z.unknown()).default({})
});

export const WorkflowTemplateSchema = z.object({
  category: z.string().min(1),
  description: z.string().default(""),
  parameters: z.record(TemplateParameterSchema).default({}),
  steps: z.array(TemplateStepSchema).min(1)
});

export const WorkflowTemplateListSchema = z.array(WorkflowTemplateSchema);

export type WorkflowTemplate = z.infer<typeof WorkflowTemplateSchema>;

const PLACEHOLDER = /^\$\{([^}]+)\}$/;

export function placeholderName(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  return PLACEHOLDER.exec(value)?.[1]?.trim();
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function collectPlaceholders(value: unknown, out: Set<string>): Set<string> {
  const name = placeholderName(value);
  if (name) {
    out.add(name);
  } else if (Array.isArray(value)) {
    for (const item of value) collectPlaceholders(item, out);
  } else if (isPlainObject(value)) {
    for (const nested of Object.values(value)) collectPlaceholders(nested, out);
  }
  return out;
}

type Binding = { bound: true; value: unknown } | { bound: false };

/**
 * Replaces `${name}` strings with the matching value from `values`. Keys and
 * array items whose placeholder has no value are dropped.
 */
export function bindValue(value: unknown, values: ReadonlyMap<string, unknown>): Binding {
  const name = placeholderName(value);
  if (name !== undefined) {
    return values.has(name) ? { bound: true, value: structuredClone(values.get(name)) } : { bound: false };
  }
  if (Array.isArray(value)) {
    const items: unknown[] = [];
    for (const item of value) {
      const binding = bindValue(item, values);
      if (binding.bound) items.push(binding.value);
    }
    return { bound: true, value: items };
  }
  if (isPlainObject(value)) {
    const entries: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      const binding = bindValue(nested, values);
      if (binding.bound) entries[key] = binding.value;
    }
    return { bound: true, value: entries };
  }
  return { bound: true, value };
}

export function bindParameters(parameters: Record<string, unknown>, values: ReadonlyMap<string, unknown>): Record<string, unknown> {
  const binding = bindValue(parameters, values);
  return binding.bound && isPlainObject(binding.value) ? binding.value : {};
}

/**
 * Parses and checks a template list: categories are unique and every
 * placeholder refers to a declared parameter.
 */
export function parseTemplates(input: unknown): WorkflowTemplate[] {
  const templates = WorkflowTemplateListSchema.parse(input);
  const seen = new Set<string>();
  for (const template of templates) {
    if (seen.has(template.category)) {
      throw new Error(`Duplicate workflow template for category ${template.category}`);
    }
    seen.add(template.category);

    const referenced = collectPlaceholders(template.steps, new Set());
    for (const name of referenced) {
      if (!(name in template.parameters)) {
        throw new Error(`Template ${template.category} references undeclared parameter ${name}`);
      }
    }
  }
  return templates;
}

export const defaultTemplates: WorkflowTemplate[] = parseTemplates(workflows);
