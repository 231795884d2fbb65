import { getBotConfig, type TelegramIntegrationConfig } from "../../../config/configManager.js";
import type { Logger } from "../../../telemetry/logger.js";
import { TelegramBotClient } from "./telegramBotClient.js";

export interface CreateTelegramClientOptions {
  readonly config?: TelegramIntegrationConfig;
  readonly logger?: Logger;
}

export function createTelegramClient(options: CreateTelegramClientOptions = {}): TelegramBotClient {
  const config = options.config ?? getBotConfig().telegram;
  return new TelegramBotClient({ token: config.token, http: config.api, logger: options.logger });
}

export { TelegramBotClient, botApiBaseUrl } from "./telegramBotClient.js";
export { parseTelegramUpdate } from "./telegramUpdates.js";
