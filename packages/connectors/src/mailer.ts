import fs from "node:fs/promises";
import path from "node:path";
import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { HandlerError, type StepContext } from "@opsflow/action-registry";
import { describeAnalysis, previousAnalysis, previousReport, type ReportArtifact } from "./records";
import { parseParameters } from "./parameters";
import { toTransportError } from "./http";
import type { Connector } from "./types";

export type MailAttachment = {
  filename: string;
  /** File contents, base64 encoded. */
  content: string;
};

export type MailMessage = {
  to: string;
  subject: string;
  text: string;
  attachments: MailAttachment[];
};

export interface MailTransport {
  send(message: MailMessage): Promise<{ messageId?: string }>;
}

export type HttpMailTransportOptions = {
  url: string;
  apiKey?: string;
  timeoutMs?: number;
  client?: AxiosInstance;
};

/**
 * Hands messages to a mail relay that accepts JSON over HTTP.
 */
export class HttpMailTransport implements MailTransport {
  private readonly client: AxiosInstance;
  private readonly url: string;

  constructor({ url, apiKey, timeoutMs = 10_000, client }: HttpMailTransportOptions) {
    this.url = url;
    this.client =
      client ??
      axios.create({
        timeout: timeoutMs,
        headers: apiKey ? { "X-API-Key": apiKey } : undefined
      });
  }

  async send(message: MailMessage): Promise<{ messageId?: string }> {
    try {
      const res = await this.client.post<unknown>(this.url, message);
      const body = z.object({ id: z.string() }).safeParse(res.data);
      return body.success ? { messageId: body.data.id } : {};
    } catch (err) {
      throw toTransportError(err, "mail");
    }
  }
}

const MailParamsSchema = z.object({
  to: z.string().email(),
  subject: z.string().min(1),
  body: z.string().optional()
});

async function attachmentFor(report: ReportArtifact): Promise<MailAttachment> {
  try {
    const content = await fs.readFile(report.path);
    return { filename: path.basename(report.path), content: content.toString("base64") };
  } catch (err) {
    throw new HandlerError("report_unreadable", `Cannot read report ${report.path} for attaching`, { cause: err });
  }
}

export class Mailer implements Connector {
  readonly action = "send_email";

  constructor(private readonly transport: MailTransport) {}

  async handle(parameters: Record<string, unknown>, context: StepContext) {
    const { to, subject, body } = parseParameters(this.action, MailParamsSchema, parameters);
    const report = previousReport(context);
    const analysis = previousAnalysis(context);
    const text = body ?? (analysis ? `Summary: ${describeAnalysis(analysis)}` : "Please find the requested report attached.");

    const { messageId } = await this.transport.send({
      to,
      subject,
      text,
      attachments: report ? [await attachmentFor(report)] : []
    });
    return { to, subject, messageId: messageId ?? null, attachment: report?.path ?? null };
  }
}
