import type { MarketOrderType, PendingOrderType } from "./tradeIntent.js";

export const ACCOUNT_DEPLOYMENT_STATES = [
  "CREATED",
  "DEPLOYING",
  "DEPLOYED",
  "DEPLOY_FAILED",
  "UNDEPLOYING",
  "UNDEPLOYED",
  "UNDEPLOY_FAILED",
  "DELETING",
  "DELETE_FAILED",
  "REDEPLOY_FAILED",
  "DRAFT",
] as const;

export type AccountDeploymentState = (typeof ACCOUNT_DEPLOYMENT_STATES)[number];

export function isAccountDeploymentState(value: unknown): value is AccountDeploymentState {
  return ACCOUNT_DEPLOYMENT_STATES.some((state) => state === value);
}

export interface AccountInformation {
  readonly login: number;
  readonly balance: number;
  readonly currency?: string;
  readonly broker?: string;
}

export interface SymbolPrice {
  readonly symbol: string;
  readonly bid: number;
  readonly ask: number;
}

interface OrderRequestBase {
  readonly symbol: string;
  readonly volume: number;
  readonly stopLoss: number;
  readonly takeProfit: number;
}

export interface MarketOrderRequest extends OrderRequestBase {
  readonly orderType: MarketOrderType;
}

export interface PendingOrderRequest extends OrderRequestBase {
  readonly orderType: PendingOrderType;
  readonly openPrice: number;
}

export type OrderRequest = MarketOrderRequest | PendingOrderRequest;

export interface TradeResult {
  readonly numericCode: number;
  readonly stringCode: string;
  readonly message: string;
  readonly orderId?: string;
}

export class GatewayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GatewayError";
  }
}

/** Raised when the brokerage answers a trade request with a failure code. */
export class TradeRejectedError extends Error {
  constructor(
    message: string,
    readonly numericCode: number,
    readonly stringCode: string,
  ) {
    super(message);
    this.name = "TradeRejectedError";
  }
}

export interface BrokerageAccount {
  readonly id: string;
  readonly state: AccountDeploymentState;
  deploy(): Promise<void>;
  waitConnected(): Promise<void>;
}

export interface BrokerageConnection {
  connect(): Promise<void>;
  waitSynchronized(): Promise<void>;
  getAccountInformation(): Promise<AccountInformation>;
  getSymbolPrice(symbol: string): Promise<SymbolPrice>;
  placeOrder(request: OrderRequest): Promise<TradeResult>;
}

export interface BrokerageGateway {
  getAccount(accountId: string): Promise<BrokerageAccount>;
  openConnection(account: BrokerageAccount): BrokerageConnection;
}
