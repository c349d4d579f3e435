import { z } from "zod";
import { HandlerError, type StepContext } from "@opsflow/action-registry";
import { isBlank, previousRecords, round2, toNumber, type Analysis, type CrmRecord } from "./records";
import { parseParameters } from "./parameters";
import type { Connector } from "./types";

const AnalyzeParamsSchema = z.object({
  topN: z.number().int().positive().default(3),
  valueField: z.string().min(1).default("value"),
  stageField: z.string().min(1).default("stage")
});

type AnalyzeParams = z.infer<typeof AnalyzeParamsSchema>;

const optionalText = (value: unknown) => (isBlank(value) ? null : String(value));

export function analyzeRecords(records: CrmRecord[], { topN, valueField, stageField }: AnalyzeParams): Analysis {
  const totalValue = records.reduce((sum, record) => sum + toNumber(record[valueField]), 0);

  const counts = new Map<string, number>();
  for (const record of records) {
    const stage = optionalText(record[stageField]) ?? "unknown";
    counts.set(stage, (counts.get(stage) ?? 0) + 1);
  }
  const byStage = Object.fromEntries([...counts.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));

  // stable sort: ties keep record order
  const top = records
    .map((record) => ({ id: optionalText(record.id), name: optionalText(record.name), value: toNumber(record[valueField]) }))
    .sort((a, b) => b.value - a.value)
    .slice(0, topN);

  return {
    recordCount: records.length,
    totalValue: round2(totalValue),
    averageValue: records.length === 0 ? 0 : round2(totalValue / records.length),
    byStage,
    top
  };
}

export class Analyzer implements Connector {
  readonly action = "analyze";

  async handle(parameters: Record<string, unknown>, context: StepContext) {
    const params = parseParameters(this.action, AnalyzeParamsSchema, parameters);
    const records = previousRecords(context, ["clean_data", "fetch_crm"]);
    if (!records) {
      throw new HandlerError("missing_input", "analyze needs records from clean_data or fetch_crm");
    }
    return analyzeRecords(records, params);
  }
}
