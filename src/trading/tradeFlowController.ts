import { SessionStore } from "../storage/sessionStore.js";
import { createLogger, describeError, type Logger } from "../telemetry/logger.js";
import type { InboundMessage, MessageTransport } from "./messageTransport.js";
import {
  ACCOUNT_MISMATCH_MESSAGE,
  CALCULATE_PROMPT,
  CANCELED_MESSAGE,
  CONNECTED_MESSAGE,
  DECISION_PROMPT,
  HELP_MESSAGES,
  PARSED_MESSAGE,
  PLACED_MESSAGE,
  PLACING_MESSAGE,
  TRADE_PROMPT,
  UNAUTHORIZED_MESSAGE,
  UNEXPECTED_ERROR_MESSAGE,
  UNKNOWN_COMMAND_MESSAGE,
  WELCOME_MESSAGE,
  connectionFailedMessage,
  legFailedMessage,
  legPlacedMessage,
  parseErrorMessage,
  rejectedMessage,
} from "./messages.js";
import { formatRiskReportHtml } from "./riskReportFormatter.js";
import { parseSignal } from "./signalParser.js";
import type { ExecutionOptions, ExecutionOutcome, TradeFlowEvent } from "./tradeExecutor.js";
import type { TradeIntent } from "./tradeIntent.js";

export type FlowMode = "trade" | "calculate";

export type SessionState =
  | { readonly phase: "awaiting_signal"; readonly mode: FlowMode }
  | { readonly phase: "awaiting_decision"; readonly intent: TradeIntent };

/** The part of the executor the controller drives; `TradeExecutor` satisfies it. */
export interface TradeRunner {
  run(intent: TradeIntent, options: ExecutionOptions): Promise<ExecutionOutcome>;
}

export interface TradeFlowControllerOptions {
  readonly transport: MessageTransport;
  readonly executor: TradeRunner;
  readonly authorizedUser: string;
  readonly riskFraction: number;
  readonly sessions?: SessionStore<SessionState>;
  readonly logger?: Logger;
}

const COMMAND_PATTERN = /^\/([A-Za-z_]+)(?:@[A-Za-z0-9_]+)?(?:\s|$)/;

/** Command name without the slash or `@botname` suffix, lower-cased. */
export function parseCommand(text: string): string | undefined {
  const match = COMMAND_PATTERN.exec(text.trim());
  return match?.[1]?.toLowerCase();
}

export class TradeFlowController {
  private readonly transport: MessageTransport;
  private readonly executor: TradeRunner;
  private readonly authorizedUser: string;
  private readonly riskFraction: number;
  private readonly sessions: SessionStore<SessionState>;
  private readonly logger: Logger;

  constructor(options: TradeFlowControllerOptions) {
    this.transport = options.transport;
    this.executor = options.executor;
    this.authorizedUser = options.authorizedUser.replace(/^@/, "");
    this.riskFraction = options.riskFraction;
    this.sessions = options.sessions ?? new SessionStore<SessionState>();
    this.logger = options.logger ?? createLogger("flow");
  }

  getSession(sessionId: string): SessionState | undefined {
    return this.sessions.get(sessionId);
  }

  /** Messages of one session are handled strictly in arrival order. */
  handle(message: InboundMessage): Promise<void> {
    return this.sessions.runExclusive(message.sessionId, () => this.process(message));
  }

  private async process(message: InboundMessage): Promise<void> {
    if (message.username !== this.authorizedUser) {
      this.logger.warn("Rejected message from unauthorized user", {
        sessionId: message.sessionId,
        username: message.username ?? null,
      });
      await this.transport.reply(message.sessionId, UNAUTHORIZED_MESSAGE);
      return;
    }

    try {
      await this.dispatch(message);
    } catch (error) {
      this.logger.error("Trade flow failed", { sessionId: message.sessionId, error: describeError(error) });
      this.sessions.clear(message.sessionId);
      await this.transport.reply(message.sessionId, UNEXPECTED_ERROR_MESSAGE);
    }
  }

  private async dispatch(message: InboundMessage): Promise<void> {
    const { sessionId } = message;
    const state = this.sessions.get(sessionId);
    const command = parseCommand(message.text);

    switch (command) {
      case "start":
        await this.transport.reply(sessionId, WELCOME_MESSAGE);
        return;
      case "help":
        for (const text of HELP_MESSAGES) {
          await this.transport.reply(sessionId, text);
        }
        return;
      case "trade":
        this.sessions.set(sessionId, { phase: "awaiting_signal", mode: "trade" });
        await this.transport.reply(sessionId, TRADE_PROMPT);
        return;
      case "calculate":
        this.sessions.set(sessionId, { phase: "awaiting_signal", mode: "calculate" });
        await this.transport.reply(sessionId, CALCULATE_PROMPT);
        return;
      case "cancel":
        this.sessions.clear(sessionId);
        await this.transport.reply(sessionId, CANCELED_MESSAGE);
        return;
      case "yes":
        if (state?.phase === "awaiting_decision") {
          this.sessions.clear(sessionId);
          const outcome = await this.executor.run(state.intent, this.executionOptions(sessionId, true));
          await this.reportOutcome(sessionId, outcome);
          return;
        }
        break;
      case "no":
        if (state?.phase === "awaiting_decision") {
          this.sessions.clear(sessionId);
          await this.transport.reply(sessionId, CANCELED_MESSAGE);
          return;
        }
        break;
      case undefined:
        if (state?.phase === "awaiting_signal") {
          await this.handleSignal(sessionId, message.text, state.mode);
          return;
        }
        break;
      default:
        break;
    }
    await this.transport.reply(sessionId, UNKNOWN_COMMAND_MESSAGE);
  }

  private async handleSignal(sessionId: string, text: string, mode: FlowMode): Promise<void> {
    const parsed = parseSignal(text, { riskFraction: this.riskFraction });
    if (!parsed.success) {
      this.logger.info("Signal rejected", { sessionId, reason: parsed.error });
      await this.transport.reply(sessionId, parseErrorMessage(parsed.error));
      return;
    }

    const { intent } = parsed;
    this.logger.info("Signal parsed", { sessionId, mode, orderType: intent.orderType, symbol: intent.symbol });
    await this.transport.reply(sessionId, PARSED_MESSAGE);

    const outcome = await this.executor.run(intent, this.executionOptions(sessionId, mode === "trade"));
    if (mode === "calculate" && outcome.status === "reported") {
      this.sessions.set(sessionId, { phase: "awaiting_decision", intent });
      await this.transport.reply(sessionId, DECISION_PROMPT);
      return;
    }
    this.sessions.clear(sessionId);
    await this.reportOutcome(sessionId, outcome);
  }

  private executionOptions(sessionId: string, placeOrders: boolean): ExecutionOptions {
    return {
      sessionId,
      placeOrders,
      onEvent: (event) => this.relayEvent(sessionId, event),
    };
  }

  private async relayEvent(sessionId: string, event: TradeFlowEvent): Promise<void> {
    switch (event.type) {
      case "connected":
        await this.transport.reply(sessionId, CONNECTED_MESSAGE);
        return;
      case "report":
        await this.transport.reply(sessionId, formatRiskReportHtml(event.report), { format: "html" });
        return;
      case "placing":
        await this.transport.reply(sessionId, PLACING_MESSAGE);
        return;
      case "leg_placed":
        await this.transport.reply(sessionId, legPlacedMessage(event.leg.index + 1, event.leg.result.stringCode));
        return;
      case "leg_failed":
        await this.transport.reply(
          sessionId,
          legFailedMessage(event.leg.index + 1, event.leg.message, event.leg.stringCode),
        );
        return;
    }
  }

  private async reportOutcome(sessionId: string, outcome: ExecutionOutcome): Promise<void> {
    switch (outcome.status) {
      case "rejected":
        await this.transport.reply(sessionId, rejectedMessage(outcome.reason));
        return;
      case "account_mismatch":
        await this.transport.reply(sessionId, ACCOUNT_MISMATCH_MESSAGE);
        return;
      case "connection_failed":
        await this.transport.reply(sessionId, connectionFailedMessage(outcome.message));
        return;
      case "executed":
        if (outcome.legs.every((leg) => leg.status === "placed")) {
          await this.transport.reply(sessionId, PLACED_MESSAGE);
        }
        return;
      case "reported":
        return;
    }
  }
}
