import { getBotConfig, type BotConfig } from "../config/configManager.js";
import { createMetaApiGateway } from "../services/integrations/metaapi/index.js";
import { createTelegramClient, type TelegramBotClient } from "../services/integrations/telegram/index.js";
import { TradeJournal } from "../storage/tradeJournal.js";
import { createLogger } from "../telemetry/logger.js";
import type { BrokerageGateway } from "../trading/brokerageGateway.js";
import type { MessageTransport } from "../trading/messageTransport.js";
import { TradeExecutor } from "../trading/tradeExecutor.js";
import { TradeFlowController } from "../trading/tradeFlowController.js";

export interface BotRuntime {
  readonly config: BotConfig;
  readonly controller: TradeFlowController;
  readonly executor: TradeExecutor;
  readonly journal: TradeJournal;
}

export interface BotRuntimeOverrides {
  readonly config?: BotConfig;
  readonly gateway?: BrokerageGateway;
  readonly transport?: MessageTransport;
  readonly journal?: TradeJournal;
}

export function createBotRuntime(overrides: BotRuntimeOverrides = {}): BotRuntime {
  const config = overrides.config ?? getBotConfig();
  const gateway = overrides.gateway ?? createMetaApiGateway({ config: config.metaApi, logger: createLogger("metaapi") });
  const transport = overrides.transport ?? createTelegramClient({ config: config.telegram });
  const journal = overrides.journal ?? new TradeJournal({ dataDir: config.dataDir });

  const executor = new TradeExecutor({
    gateway,
    accountId: config.metaApi.accountId,
    allowedAccountLogin: config.metaApi.allowedAccountLogin,
    journal,
    logger: createLogger("executor"),
  });
  const controller = new TradeFlowController({
    transport,
    executor,
    authorizedUser: config.telegram.authorizedUser,
    riskFraction: config.riskFraction,
    logger: createLogger("flow"),
  });
  return { config, controller, executor, journal };
}

/** Live wiring: MetaApi gateway and a Telegram client shared by replies and webhook registration. */
export function createTelegramBotRuntime(config: BotConfig = getBotConfig()): BotRuntime & {
  readonly telegram: TelegramBotClient;
} {
  const telegram = createTelegramClient({ config: config.telegram });
  return { ...createBotRuntime({ config, transport: telegram }), telegram };
}
