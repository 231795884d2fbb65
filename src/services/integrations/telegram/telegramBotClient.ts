import type { HttpClientConfig } from "../../../config/configManager.js";
import { createLogger, type Logger } from "../../../telemetry/logger.js";
import type { MessageTransport, ReplyOptions } from "../../../trading/messageTransport.js";
import { RetryingHttpClient } from "../http/retryingHttpClient.js";

interface TelegramApiResponse {
  readonly ok: boolean;
  readonly description?: string;
}

export interface TelegramBotClientOptions {
  readonly token: string;
  readonly http: HttpClientConfig;
  readonly logger?: Logger;
}

// built by hand: "bot123:abc/" would parse as an absolute URL with scheme "bot123"
export function botApiBaseUrl(apiBaseUrl: string, token: string): string {
  return `${apiBaseUrl.replace(/\/+$/, "")}/bot${token}/`;
}

export class TelegramBotClient implements MessageTransport {
  private readonly http: RetryingHttpClient;
  private readonly logger: Logger;
  private readonly token: string;

  constructor(options: TelegramBotClientOptions) {
    this.token = options.token;
    this.logger = options.logger ?? createLogger("telegram");
    this.http = new RetryingHttpClient({
      http: { ...options.http, baseUrl: botApiBaseUrl(options.http.baseUrl, options.token) },
      service: "telegram",
      logger: this.logger,
    });
  }

  async reply(sessionId: string, text: string, options?: ReplyOptions): Promise<void> {
    await this.sendMessage(sessionId, text, options);
  }

  async sendMessage(chatId: string, text: string, options: ReplyOptions = {}): Promise<void> {
    await this.call("sendMessage", {
      chat_id: chatId,
      text,
      parse_mode: options.format === "html" ? "HTML" : undefined,
      disable_web_page_preview: true,
    });
  }

  async setWebhook(url: string): Promise<void> {
    await this.call("setWebhook", {
      url,
      allowed_updates: ["message", "edited_message"],
    });
    this.logger.info("Webhook registered", { url: url.split(this.token).join("<token>") });
  }

  private async call(method: string, payload: Record<string, unknown>): Promise<void> {
    const response = await this.http.post<TelegramApiResponse>(method, {
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
    });
    if (!response.ok) {
      throw new Error(`Telegram ${method} failed: ${response.description ?? "unknown error"}`);
    }
  }
}
