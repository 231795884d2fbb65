export * from "./trading/tradeIntent.js";
export * from "./trading/signalParser.js";
export * from "./risk/riskCalculator.js";
export * from "./trading/riskReportFormatter.js";
export * from "./trading/brokerageGateway.js";
export type { InboundMessage, MessageTransport, ReplyOptions, MessageFormat } from "./trading/messageTransport.js";
export { TradeExecutor, planOrderLegs } from "./trading/tradeExecutor.js";
export type { ExecutionOutcome, ExecutionOptions, LegOutcome, TradeFlowEvent } from "./trading/tradeExecutor.js";
export { TradeFlowController, parseCommand } from "./trading/tradeFlowController.js";
export type { FlowMode, SessionState, TradeRunner } from "./trading/tradeFlowController.js";
export { SessionStore } from "./storage/sessionStore.js";
export { TradeJournal } from "./storage/tradeJournal.js";
export { MetaApiGateway } from "./services/integrations/metaapi/index.js";
export { TelegramBotClient, parseTelegramUpdate } from "./services/integrations/telegram/index.js";
export { ConfigManager, ConfigurationError } from "./config/configManager.js";
export { createBotRuntime } from "./runtime/botRuntime.js";
export { createServer } from "./server.js";
