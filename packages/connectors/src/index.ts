import { withRetry, type ActionHandler, type ActionRegistry, type RetryOptions } from "@opsflow/action-registry";
import { CrmConnector, type CrmSource } from "./crm";
import { DataCleaner } from "./cleaning";
import { Analyzer } from "./analysis";
import { ReportGenerator } from "./report";
import { Mailer, type MailTransport } from "./mailer";
import { ChatNotifier, type ChatTransport } from "./chat";
import type { Connector } from "./types";

export type ConnectorDeps = {
  crm: CrmSource;
  outputDir: string;
  mail?: MailTransport;
  chat?: ChatTransport;
  /** Retry policy for connectors that reach the network; `false` disables it. */
  retry?: RetryOptions | false;
};

/**
 * Registers every connector whose dependencies are present. Without a mail or
 * chat transport those actions stay unregistered and plans skip them.
 */
export function registerDefaultConnectors(registry: ActionRegistry, { crm, outputDir, mail, chat, retry = {} }: ConnectorDeps): Connector[] {
  const local: Connector[] = [new CrmConnector(crm), new DataCleaner(), new Analyzer(), new ReportGenerator({ outputDir })];
  const remote: Connector[] = [];
  if (mail) remote.push(new Mailer(mail));
  if (chat) remote.push(new ChatNotifier(chat));

  for (const connector of local) {
    registry.register(connector.action, (parameters, context) => connector.handle(parameters, context));
  }
  for (const connector of remote) {
    const handler: ActionHandler = (parameters, context) => connector.handle(parameters, context);
    registry.register(connector.action, retry === false ? handler : withRetry(handler, retry));
  }
  return [...local, ...remote];
}

export * from "./crm";
export * from "./cleaning";
export * from "./analysis";
export * from "./report";
export * from "./mailer";
export * from "./chat";
export * from "./records";
export { toTransportError } from "./http";
export { parseParameters } from "./parameters";
export type { Connector } from "./types";
