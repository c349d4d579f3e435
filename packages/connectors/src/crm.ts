import fs from "node:fs/promises";
import { z } from "zod";
import { HandlerError, type StepContext } from "@opsflow/action-registry";
import { CrmRecordSchema, type CrmRecord } from "./records";
import { parseParameters } from "./parameters";
import type { Connector } from "./types";

export interface CrmSource {
  fetchRecords(): Promise<CrmRecord[]>;
}

export class InMemoryCrmSource implements CrmSource {
  constructor(private readonly records: CrmRecord[]) {}

  async fetchRecords(): Promise<CrmRecord[]> {
    return this.records.map((record) => ({ ...record }));
  }
}

/**
 * Reads a JSON array of records from disk on every fetch.
 */
export class JsonFileCrmSource implements CrmSource {
  constructor(private readonly path: string) {}

  async fetchRecords(): Promise<CrmRecord[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.path, "utf-8");
    } catch (err) {
      throw new HandlerError("crm_unavailable", `Cannot read CRM data from ${this.path}`, { retryable: true, cause: err });
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new HandlerError("crm_malformed", `CRM data in ${this.path} is not valid JSON`, { cause: err });
    }
    const records = z.array(CrmRecordSchema).safeParse(parsed);
    if (!records.success) {
      throw new HandlerError("crm_malformed", `CRM data in ${this.path} must be an array of records`);
    }
    return records.data;
  }
}

const FilterValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const FetchParamsSchema = z.object({
  filters: z.record(FilterValueSchema).default({}),
  limit: z.number().int().positive().optional()
});

function matches(record: CrmRecord, filters: Record<string, string | number | boolean>): boolean {
  return Object.entries(filters).every(([field, expected]) => {
    const actual = record[field];
    if (typeof expected === "string") {
      return typeof actual === "string" && actual.trim().toLowerCase() === expected.trim().toLowerCase();
    }
    return actual === expected;
  });
}

export class CrmConnector implements Connector {
  readonly action = "fetch_crm";

  constructor(private readonly source: CrmSource) {}

  async handle(parameters: Record<string, unknown>, _context: StepContext) {
    const { filters, limit } = parseParameters(this.action, FetchParamsSchema, parameters);
    const records = (await this.source.fetchRecords()).filter((record) => matches(record, filters));
    const total = records.length;
    return {
      records: limit === undefined ? records : records.slice(0, limit),
      total
    };
  }
}
