import { z } from "zod";
import { latestPayload } from "@opsflow/contracts";
import type { StepContext } from "@opsflow/action-registry";

export const CrmRecordSchema = z.record(z.unknown());
export type CrmRecord = z.infer<typeof CrmRecordSchema>;

export const RecordsPayloadSchema = z.object({
  records: z.array(CrmRecordSchema)
});

export const AnalysisSchema = z.object({
  recordCount: z.number(),
  totalValue: z.number(),
  averageValue: z.number(),
  byStage: z.record(z.number()),
  top: z.array(
    z.object({
      id: z.string().nullable(),
      name: z.string().nullable(),
      value: z.number()
    })
  )
});
export type Analysis = z.infer<typeof AnalysisSchema>;

export const ReportArtifactSchema = z.object({
  path: z.string(),
  format: z.string(),
  bytes: z.number()
});
export type ReportArtifact = z.infer<typeof ReportArtifactSchema>;

/**
 * Records produced earlier in the run, taken from the first action in
 * `actions` that has a usable payload.
 */
export function previousRecords(context: StepContext, actions: string[]): CrmRecord[] | undefined {
  for (const action of actions) {
    const parsed = RecordsPayloadSchema.safeParse(latestPayload(context.previous, action));
    if (parsed.success) return parsed.data.records;
  }
  return undefined;
}

export function previousAnalysis(context: StepContext): Analysis | undefined {
  const parsed = AnalysisSchema.safeParse(latestPayload(context.previous, "analyze"));
  return parsed.success ? parsed.data : undefined;
}

export function previousReport(context: StepContext): ReportArtifact | undefined {
  const parsed = ReportArtifactSchema.safeParse(latestPayload(context.previous, "generate_report"));
  return parsed.success ? parsed.data : undefined;
}

export const isBlank = (value: unknown) => value === undefined || value === null || (typeof value === "string" && value.trim() === "");

export function toNumber(value: unknown): number {
  const n = typeof value === "number" ? value : typeof value === "string" ? Number(value.trim()) : NaN;
  return Number.isFinite(n) ? n : 0;
}

export const round2 = (n: number) => Math.round(n * 100) / 100;

export function describeAnalysis(analysis: Analysis): string {
  const stages = Object.entries(analysis.byStage)
    .map(([stage, count]) => `${stage}: ${count}`)
    .join(", ");
  return `${analysis.recordCount} records, total value ${analysis.totalValue}, average ${analysis.averageValue}${stages ? ` (${stages})` : ""}`;
}
