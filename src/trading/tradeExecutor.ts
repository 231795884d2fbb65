import { computeRisk, RiskCalculationError, type RiskLeg, type RiskReport } from "../risk/riskCalculator.js";
import type { TradeJournal } from "../storage/tradeJournal.js";
import { createLogger, describeError, type Logger } from "../telemetry/logger.js";
import {
  TradeRejectedError,
  type AccountDeploymentState,
  type AccountInformation,
  type BrokerageConnection,
  type BrokerageGateway,
  type OrderRequest,
  type TradeResult,
} from "./brokerageGateway.js";
import { isBuyOrderType, isMarketOrderType, type TradeIntent } from "./tradeIntent.js";

const DEPLOYED_STATES: ReadonlySet<AccountDeploymentState> = new Set(["DEPLOYING", "DEPLOYED"]);

export type LegOutcome =
  | {
      readonly status: "placed";
      readonly index: number;
      readonly request: OrderRequest;
      readonly result: TradeResult;
    }
  | {
      readonly status: "failed";
      readonly index: number;
      readonly request: OrderRequest;
      readonly message: string;
      readonly stringCode?: string;
    };

/** Progress notifications emitted while a flow runs, in order. */
export type TradeFlowEvent =
  | { readonly type: "connected"; readonly account: AccountInformation }
  | { readonly type: "report"; readonly report: RiskReport }
  | { readonly type: "placing"; readonly legs: number }
  | { readonly type: "leg_placed"; readonly leg: LegOutcome & { readonly status: "placed" } }
  | { readonly type: "leg_failed"; readonly leg: LegOutcome & { readonly status: "failed" } };

export type ExecutionOutcome =
  | { readonly status: "reported"; readonly report: RiskReport }
  | { readonly status: "executed"; readonly report: RiskReport; readonly legs: readonly LegOutcome[] }
  | { readonly status: "rejected"; readonly reason: string }
  | { readonly status: "account_mismatch"; readonly login: number }
  | { readonly status: "connection_failed"; readonly message: string };

export interface ExecutionOptions {
  readonly sessionId: string;
  readonly placeOrders: boolean;
  readonly onEvent?: (event: TradeFlowEvent) => Promise<void>;
}

export interface TradeExecutorOptions {
  readonly gateway: BrokerageGateway;
  readonly accountId: string;
  readonly allowedAccountLogin: number;
  readonly journal?: TradeJournal;
  readonly logger?: Logger;
}

function buildOrderRequest(intent: TradeIntent, report: RiskReport, leg: RiskLeg): OrderRequest {
  const base = {
    symbol: intent.symbol,
    volume: leg.volume,
    stopLoss: intent.stopLoss,
    takeProfit: leg.takeProfit,
  };
  const { orderType } = intent;
  if (isMarketOrderType(orderType)) {
    return { ...base, orderType };
  }
  return { ...base, orderType, openPrice: report.entryPrice };
}

/** One order per take-profit leg, each carrying an equal share of the position. */
export function planOrderLegs(intent: TradeIntent, report: RiskReport): OrderRequest[] {
  return report.legs.map((leg) => buildOrderRequest(intent, report, leg));
}

export class TradeExecutor {
  private readonly gateway: BrokerageGateway;
  private readonly accountId: string;
  private readonly allowedAccountLogin: number;
  private readonly journal?: TradeJournal;
  private readonly logger: Logger;

  constructor(options: TradeExecutorOptions) {
    this.gateway = options.gateway;
    this.accountId = options.accountId;
    this.allowedAccountLogin = options.allowedAccountLogin;
    this.journal = options.journal;
    this.logger = options.logger ?? createLogger("executor");
  }

  /**
   * Connects to the account, sizes the intent against the live balance and,
   * when asked to, sends the order legs. Balance and market price are
   * fetched on every call.
   */
  async run(intent: TradeIntent, options: ExecutionOptions): Promise<ExecutionOutcome> {
    let connection: BrokerageConnection;
    let account: AccountInformation;
    try {
      connection = await this.openSynchronizedConnection();
      account = await connection.getAccountInformation();
    } catch (error) {
      this.logger.error("Brokerage connection failed", { error: describeError(error) });
      return { status: "connection_failed", message: describeError(error) };
    }

    if (account.login !== this.allowedAccountLogin) {
      this.logger.error("Connected to an unauthorized account", { login: account.login });
      return { status: "account_mismatch", login: account.login };
    }
    await this.emit(options, { type: "connected", account });

    let marketPrice: number | undefined;
    if (intent.entry.type === "market") {
      try {
        const price = await connection.getSymbolPrice(intent.symbol);
        marketPrice = isBuyOrderType(intent.orderType) ? price.ask : price.bid;
      } catch (error) {
        this.logger.error("Price lookup failed", { symbol: intent.symbol, error: describeError(error) });
        return { status: "connection_failed", message: describeError(error) };
      }
    }

    let report: RiskReport;
    try {
      report = computeRisk(intent, account.balance, marketPrice);
    } catch (error) {
      if (error instanceof RiskCalculationError) {
        return { status: "rejected", reason: error.message };
      }
      throw error;
    }
    await this.emit(options, { type: "report", report });

    if (!options.placeOrders) {
      return { status: "reported", report };
    }
    if (report.positionSize <= 0) {
      return {
        status: "rejected",
        reason: "Position size rounds down to 0.00 lots for this balance and stop loss",
      };
    }

    const requests = planOrderLegs(intent, report);
    await this.emit(options, { type: "placing", legs: requests.length });

    const legs: LegOutcome[] = [];
    for (const [index, request] of requests.entries()) {
      const leg = await this.placeLeg(connection, request, index);
      legs.push(leg);
      await this.record(options.sessionId, leg);
      if (leg.status === "placed") {
        await this.emit(options, { type: "leg_placed", leg });
      } else {
        await this.emit(options, { type: "leg_failed", leg });
      }
    }
    return { status: "executed", report, legs };
  }

  private async openSynchronizedConnection(): Promise<BrokerageConnection> {
    const account = await this.gateway.getAccount(this.accountId);
    if (!DEPLOYED_STATES.has(account.state)) {
      this.logger.info("Deploying account", { accountId: account.id, state: account.state });
      await account.deploy();
    }

    this.logger.info("Waiting for API server to connect to broker ...");
    await account.waitConnected();

    const connection = this.gateway.openConnection(account);
    await connection.connect();

    this.logger.info("Waiting for terminal state to synchronize ...");
    await connection.waitSynchronized();
    return connection;
  }

  // a failed leg never cancels the legs already placed
  private async placeLeg(connection: BrokerageConnection, request: OrderRequest, index: number): Promise<LegOutcome> {
    try {
      const result = await connection.placeOrder(request);
      this.logger.info("Order leg placed", { leg: index + 1, symbol: request.symbol, code: result.stringCode });
      return { status: "placed", index, request, result };
    } catch (error) {
      this.logger.warn("Order leg failed", { leg: index + 1, symbol: request.symbol, error: describeError(error) });
      return {
        status: "failed",
        index,
        request,
        message: describeError(error),
        stringCode: error instanceof TradeRejectedError ? error.stringCode : undefined,
      };
    }
  }

  private async record(sessionId: string, leg: LegOutcome): Promise<void> {
    if (!this.journal) {
      return;
    }
    const { request } = leg;
    try {
      await this.journal.append({
        sessionId,
        symbol: request.symbol,
        orderType: request.orderType,
        volume: request.volume,
        openPrice: "openPrice" in request ? request.openPrice : undefined,
        stopLoss: request.stopLoss,
        takeProfit: request.takeProfit,
        status: leg.status,
        stringCode: leg.status === "placed" ? leg.result.stringCode : leg.stringCode,
        message: leg.status === "placed" ? leg.result.message : leg.message,
        orderId: leg.status === "placed" ? leg.result.orderId : undefined,
      });
    } catch (error) {
      this.logger.warn("Failed to journal order leg", { error: describeError(error) });
    }
  }

  private async emit(options: ExecutionOptions, event: TradeFlowEvent): Promise<void> {
    if (!options.onEvent) {
      return;
    }
    try {
      await options.onEvent(event);
    } catch (error) {
      this.logger.warn("Failed to deliver flow update", { event: event.type, error: describeError(error) });
    }
  }
}
