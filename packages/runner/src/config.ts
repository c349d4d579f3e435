import { z } from "zod";

const EnvSchema = z.object({
  OPSFLOW_PORT: z.coerce.number().int().min(0).max(65535).default(4310),
  OPSFLOW_CRM_FILE: z.string().min(1).optional(),
  OPSFLOW_REPORT_DIR: z.string().min(1).default("./reports"),
  OPSFLOW_MAIL_URL: z.string().url().optional(),
  OPSFLOW_MAIL_API_KEY: z.string().min(1).optional(),
  OPSFLOW_CHAT_WEBHOOK_URL: z.string().url().optional(),
  OPSFLOW_STEP_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  OPSFLOW_RETRY_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  OPSFLOW_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(250),
  OPSFLOW_TEMPLATES_FILE: z.string().min(1).optional()
});

export type RunnerConfig = {
  port: number;
  crmFile?: string;
  reportDir: string;
  mailUrl?: string;
  mailApiKey?: string;
  chatWebhookUrl?: string;
  stepTimeoutMs?: number;
  retryAttempts: number;
  retryDelayMs: number;
  templatesFile?: string;
};

export class ConfigError extends Error {
  constructor(readonly keys: string[], message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Reads runner settings from the environment. Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))].sort();
    throw new ConfigError(keys, `Invalid configuration: ${keys.join(", ")}`);
  }
  const data = parsed.data;
  return {
    port: data.OPSFLOW_PORT,
    crmFile: data.OPSFLOW_CRM_FILE,
    reportDir: data.OPSFLOW_REPORT_DIR,
    mailUrl: data.OPSFLOW_MAIL_URL,
    mailApiKey: data.OPSFLOW_MAIL_API_KEY,
    chatWebhookUrl: data.OPSFLOW_CHAT_WEBHOOK_URL,
    stepTimeoutMs: data.OPSFLOW_STEP_TIMEOUT_MS,
    retryAttempts: data.OPSFLOW_RETRY_ATTEMPTS,
    retryDelayMs: data.OPSFLOW_RETRY_DELAY_MS,
    templatesFile: data.OPSFLOW_TEMPLATES_FILE
  };
}
