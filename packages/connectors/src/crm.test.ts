import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { StepContext } from "@opsflow/action-registry";
import { CrmConnector, InMemoryCrmSource, JsonFileCrmSource } from "./crm";

const context: StepContext = {
  runId: "run-1",
  step: { action: "fetch_crm", parameters: {}, index: 0 },
  previous: [],
  signal: new AbortController().signal
};

const records = [
  { id: "1", name: "Acme", stage: "won", value: 500 },
  { id: "2", name: "Globex", stage: "open", value: "250.5" },
  { id: "3", name: "Initech", stage: "Won", value: 300 }
];

describe("CrmConnector", () => {
  const connector = new CrmConnector(new InMemoryCrmSource(records));

  it("returns every record without filters", async () => {
    await expect(connector.handle({}, context)).resolves.toEqual({ records, total: 3 });
  });

  it("matches string filters case-insensitively", async () => {
    const result = await connector.handle({ filters: { stage: "WON" } }, context);
    expect(result.records.map((record) => record.id)).toEqual(["1", "3"]);
    expect(result.total).toBe(2);
  });

  it("matches numbers exactly and applies the limit after counting", async () => {
    expect((await connector.handle({ filters: { value: 500 } }, context)).records).toEqual([records[0]]);
    const limited = await connector.handle({ limit: 1 }, context);
    expect(limited).toEqual({ records: [records[0]], total: 3 });
  });

  it("rejects malformed filters", async () => {
    await expect(connector.handle({ filters: "won" }, context)).rejects.toMatchObject({ code: "invalid_parameters", retryable: false });
  });
});

describe("JsonFileCrmSource", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "opsflow-crm-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads a JSON array of records", async () => {
    const file = path.join(dir, "crm.json");
    await fs.writeFile(file, JSON.stringify(records));
    await expect(new JsonFileCrmSource(file).fetchRecords()).resolves.toEqual(records);
  });

  it("reports a missing file as a transient failure", async () => {
    await expect(new JsonFileCrmSource(path.join(dir, "missing.json")).fetchRecords()).rejects.toMatchObject({
      code: "crm_unavailable",
      retryable: true
    });
  });

  it("rejects data that is not an array of records", async () => {
    const file = path.join(dir, "crm.json");
    await fs.writeFile(file, JSON.stringify({ id: "1" }));
    await expect(new JsonFileCrmSource(file).fetchRecords()).rejects.toMatchObject({ code: "crm_malformed" });
  });
});
