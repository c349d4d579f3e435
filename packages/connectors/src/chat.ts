import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { StepContext } from "@opsflow/action-registry";
import { describeAnalysis, previousAnalysis } from "./records";
import { parseParameters } from "./parameters";
import { toTransportError } from "./http";
import type { Connector } from "./types";

export type ChatMessage = {
  channel: string;
  text: string;
};

export interface ChatTransport {
  post(message: ChatMessage): Promise<void>;
}

export class WebhookChatTransport implements ChatTransport {
  private readonly client: AxiosInstance;

  constructor(private readonly url: string, client?: AxiosInstance) {
    this.client = client ?? axios.create({ timeout: 10_000 });
  }

  async post(message: ChatMessage): Promise<void> {
    try {
      await this.client.post(this.url, message);
    } catch (err) {
      throw toTransportError(err, "chat");
    }
  }
}

const ChatParamsSchema = z.object({
  channel: z.string().min(1),
  text: z.string().min(1).optional()
});

export class ChatNotifier implements Connector {
  readonly action = "send_chat_message";

  constructor(private readonly transport: ChatTransport) {}

  async handle(parameters: Record<string, unknown>, context: StepContext) {
    const { channel, text } = parseParameters(this.action, ChatParamsSchema, parameters);
    const analysis = previousAnalysis(context);
    const message = text ?? (analysis ? `CRM summary: ${describeAnalysis(analysis)}` : "Workflow finished.");
    await this.transport.post({ channel, text: message });
    return { channel, text: message, delivered: true };
  }
}
