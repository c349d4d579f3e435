import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ReportFormatEnum, type ReportFormat } from "@opsflow/contracts";
import { HandlerError, type StepContext } from "@opsflow/action-registry";
import { previousAnalysis, previousRecords, type Analysis, type CrmRecord, type ReportArtifact } from "./records";
import { parseParameters } from "./parameters";
import type { Connector } from "./types";

const ReportParamsSchema = z.object({
  format: ReportFormatEnum.default("markdown"),
  title: z.string().min(1).default("Report")
});

export type ReportInput = {
  title: string;
  analysis?: Analysis;
  records: CrmRecord[];
};

const EXTENSIONS: Record<ReportFormat, string> = {
  markdown: "md",
  csv: "csv",
  json: "json",
  html: "html"
};

export function slugify(title: string): string {
  const slug = title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "report";
}

function cellText(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function columnsOf(records: CrmRecord[]): string[] {
  const columns: string[] = [];
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!columns.includes(key)) columns.push(key);
    }
  }
  return columns;
}

function csvCell(value: unknown): string {
  const text = cellText(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function renderCsv(records: CrmRecord[]): string {
  const columns = columnsOf(records);
  if (columns.length === 0) return "";
  const lines = [columns.map(csvCell).join(",")];
  for (const record of records) {
    lines.push(columns.map((column) => csvCell(record[column])).join(","));
  }
  return `${lines.join("\n")}\n`;
}

function markdownTable(headers: string[], rows: unknown[][]): string[] {
  const escape = (value: unknown) => cellText(value).replace(/\|/g, "\\|");
  return [
    `| ${headers.join(" | ")} |`,
    `| ${headers.map(() => "---").join(" | ")} |`,
    ...rows.map((row) => `| ${row.map(escape).join(" | ")} |`)
  ];
}

export function renderMarkdown({ title, analysis, records }: ReportInput): string {
  const lines = [`# ${title}`, ""];
  if (!analysis) {
    lines.push(`- Records: ${records.length}`);
    return `${lines.join("\n")}\n`;
  }
  lines.push(
    `- Records: ${analysis.recordCount}`,
    `- Total value: ${analysis.totalValue}`,
    `- Average value: ${analysis.averageValue}`,
    "",
    "## By stage",
    "",
    ...markdownTable(["Stage", "Count"], Object.entries(analysis.byStage)),
    "",
    "## Top records",
    "",
    ...markdownTable(["Name", "Value"], analysis.top.map((entry) => [entry.name ?? entry.id ?? "", entry.value]))
  );
  return `${lines.join("\n")}\n`;
}

const escapeHtml = (value: unknown) =>
  cellText(value).replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");

function htmlTable(headers: string[], rows: unknown[][]): string {
  const head = headers.map((h) => `<th>${escapeHtml(h)}</th>`).join("");
  const body = rows.map((row) => `<tr>${row.map((cell) => `<td>${escapeHtml(cell)}</td>`).join("")}</tr>`).join("");
  return `<table><thead><tr>${head}</tr></thead><tbody>${body}</tbody></table>`;
}

export function renderHtml({ title, analysis, records }: ReportInput): string {
  const parts = [`<!doctype html><html><head><meta charset="utf-8"><title>${escapeHtml(title)}</title></head><body>`, `<h1>${escapeHtml(title)}</h1>`];
  if (analysis) {
    parts.push(
      `<ul><li>Records: ${analysis.recordCount}</li><li>Total value: ${analysis.totalValue}</li><li>Average value: ${analysis.averageValue}</li></ul>`,
      htmlTable(["Stage", "Count"], Object.entries(analysis.byStage))
    );
  }
  const columns = columnsOf(records);
  if (columns.length > 0) {
    parts.push(htmlTable(columns, records.map((record) => columns.map((column) => record[column]))));
  }
  parts.push("</body></html>");
  return parts.join("\n");
}

export function renderReport(format: ReportFormat, input: ReportInput): string {
  switch (format) {
    case "csv":
      return renderCsv(input.records);
    case "json":
      return `${JSON.stringify({ title: input.title, analysis: input.analysis ?? null, records: input.records }, null, 2)}\n`;
    case "html":
      return renderHtml(input);
    case "markdown":
      return renderMarkdown(input);
  }
}

export type ReportGeneratorDeps = {
  outputDir: string;
};

export class ReportGenerator implements Connector {
  readonly action = "generate_report";
  private readonly outputDir: string;

  constructor({ outputDir }: ReportGeneratorDeps) {
    this.outputDir = outputDir;
  }

  async handle(parameters: Record<string, unknown>, context: StepContext): Promise<ReportArtifact> {
    const { format, title } = parseParameters(this.action, ReportParamsSchema, parameters);
    const analysis = previousAnalysis(context);
    const records = previousRecords(context, ["clean_data", "fetch_crm"]);
    if (!analysis && !records) {
      throw new HandlerError("missing_input", "generate_report needs an analysis or records from earlier steps");
    }

    const content = renderReport(format, { title, analysis, records: records ?? [] });
    const file = path.join(this.outputDir, `${slugify(title)}-${context.runId}.${EXTENSIONS[format]}`);
    try {
      await fs.mkdir(this.outputDir, { recursive: true });
      await fs.writeFile(file, content, "utf-8");
    } catch (err) {
      throw new HandlerError("report_write_failed", `Cannot write report to ${file}`, { cause: err });
    }
    return { path: file, format, bytes: Buffer.byteLength(content, "utf-8") };
  }
}
