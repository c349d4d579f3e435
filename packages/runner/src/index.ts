import http, { type IncomingMessage } from "node:http";
import { defaultEventBus } from "@opsflow/event-bus";
import { loadConfig } from "./config";
import { createApp } from "./app";
import { attachConsoleLogging } from "./logging";
import { handleRequest } from "./routes";

const config = loadConfig();
const app = createApp(config, { eventBus: defaultEventBus });
attachConsoleLogging(defaultEventBus);

const server = http.createServer(async (req, res) => {
  try {
    const raw = req.method === "POST" ? await readBody(req) : "";
    const { status, body } = await handleRequest(app, req.method ?? "GET", req.url ?? "/", raw);
    res.writeHead(status, { "content-type": "application/json" });
    res.end(JSON.stringify(body));
  } catch (err) {
    console.error("[runner] request failed", err);
    res.writeHead(500, { "content-type": "application/json" });
    res.end(JSON.stringify({ error: "internal_error" }));
  }
});

server.listen(config.port, () => {
  console.log(`Workflow runner listening on http://localhost:${config.port}/workflows`);
  console.log(`Registered actions: ${app.registry.actions().join(", ")}`);
});

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}
