import { z } from "zod";
import { HandlerError, type StepContext } from "@opsflow/action-registry";
import { CrmRecordSchema, isBlank, previousRecords, type CrmRecord } from "./records";
import { parseParameters } from "./parameters";
import type { Connector } from "./types";

const CleanParamsSchema = z.object({
  records: z.array(CrmRecordSchema).optional(),
  requiredFields: z.array(z.string().min(1)).default(["id", "name"]),
  dedupeBy: z.string().min(1).default("id")
});

function normalize(record: CrmRecord): CrmRecord {
  const out: CrmRecord = {};
  for (const [key, value] of Object.entries(record)) {
    if (typeof value !== "string") {
      out[key] = value;
      continue;
    }
    const trimmed = value.trim();
    out[key] = key === "email" ? trimmed.toLowerCase() : trimmed;
  }
  return out;
}

export function cleanRecords(records: CrmRecord[], requiredFields: string[], dedupeBy: string): CrmRecord[] {
  const seen = new Set<string>();
  const cleaned: CrmRecord[] = [];
  for (const record of records.map(normalize)) {
    if (requiredFields.some((field) => isBlank(record[field]))) continue;
    const key = record[dedupeBy];
    if (!isBlank(key)) {
      const dedupeKey = String(key);
      if (seen.has(dedupeKey)) continue;
      seen.add(dedupeKey);
    }
    cleaned.push(record);
  }
  return cleaned;
}

export class DataCleaner implements Connector {
  readonly action = "clean_data";

  async handle(parameters: Record<string, unknown>, context: StepContext) {
    const params = parseParameters(this.action, CleanParamsSchema, parameters);
    const input = params.records ?? previousRecords(context, ["fetch_crm"]);
    if (!input) {
      throw new HandlerError("missing_input", "clean_data needs records from fetch_crm or a records parameter");
    }
    const records = cleanRecords(input, params.requiredFields, params.dedupeBy);
    return { records, removed: input.length - records.length };
  }
}
