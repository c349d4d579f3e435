import { defaultEventBus, type EventBus } from "@opsflow/event-bus";
import { ActionRegistry } from "@opsflow/action-registry";
import { WorkflowPlanner } from "@opsflow/planner";
import { WorkflowExecutor } from "@opsflow/executor";
import { WorkflowOrchestrator } from "@opsflow/orchestrator";
import {
  HttpMailTransport,
  InMemoryCrmSource,
  JsonFileCrmSource,
  WebhookChatTransport,
  registerDefaultConnectors,
  type ChatTransport,
  type CrmSource,
  type MailTransport
} from "@opsflow/connectors";
import type { RunnerConfig } from "./config";

export type RunnerOverrides = {
  eventBus?: EventBus;
  crm?: CrmSource;
  mail?: MailTransport;
  chat?: ChatTransport;
};

export type RunnerApp = {
  config: RunnerConfig;
  planner: WorkflowPlanner;
  registry: ActionRegistry;
  orchestrator: WorkflowOrchestrator;
};

function crmSourceFor(config: RunnerConfig): CrmSource {
  if (config.crmFile) return new JsonFileCrmSource(config.crmFile);
  console.warn("[runner] OPSFLOW_CRM_FILE not set; fetch_crm will return no records");
  return new InMemoryCrmSource([]);
}

/**
 * Wires planner, registry and executor. The registry is frozen before the
 * app is returned, so every run sees the same handlers.
 */
export function createApp(config: RunnerConfig, overrides: RunnerOverrides = {}): RunnerApp {
  const eventBus = overrides.eventBus ?? defaultEventBus;
  const planner = config.templatesFile ? WorkflowPlanner.fromFile(config.templatesFile) : new WorkflowPlanner();

  const mail = overrides.mail ?? (config.mailUrl ? new HttpMailTransport({ url: config.mailUrl, apiKey: config.mailApiKey }) : undefined);
  const chat = overrides.chat ?? (config.chatWebhookUrl ? new WebhookChatTransport(config.chatWebhookUrl) : undefined);

  const registry = new ActionRegistry();
  registerDefaultConnectors(registry, {
    crm: overrides.crm ?? crmSourceFor(config),
    outputDir: config.reportDir,
    mail,
    chat,
    retry: { attempts: config.retryAttempts, delayMs: config.retryDelayMs }
  });
  registry.freeze();

  const executor = new WorkflowExecutor({ eventBus, stepTimeoutMs: config.stepTimeoutMs });
  const orchestrator = new WorkflowOrchestrator({ eventBus, planner, registry, executor });
  return { config, planner, registry, orchestrator };
}
