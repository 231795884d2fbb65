export const ORDER_TYPES = ["Buy", "Sell", "Buy Limit", "Sell Limit", "Buy Stop", "Sell Stop"] as const;

export type OrderType = (typeof ORDER_TYPES)[number];

export type MarketOrderType = Extract<OrderType, "Buy" | "Sell">;
export type PendingOrderType = Exclude<OrderType, MarketOrderType>;

/**
 * Where the trade is entered. `market` means "at the current price", which
 * is only looked up once the brokerage connection is open.
 */
export type EntryInstruction =
  | { readonly type: "market" }
  | { readonly type: "price"; readonly price: number };

export type TakeProfitTargets = readonly [number] | readonly [number, number];

export interface TradeIntent {
  readonly orderType: OrderType;
  readonly symbol: string;
  readonly entry: EntryInstruction;
  readonly stopLoss: number;
  readonly takeProfits: TakeProfitTargets;
  readonly riskFraction: number;
  readonly text: string;
}

export function isMarketOrderType(orderType: OrderType): orderType is MarketOrderType {
  return orderType === "Buy" || orderType === "Sell";
}

export function isBuyOrderType(orderType: OrderType): boolean {
  return orderType === "Buy" || orderType === "Buy Limit" || orderType === "Buy Stop";
}
