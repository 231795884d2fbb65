import type { OrderType, TradeIntent } from "../trading/tradeIntent.js";

export const GOLD_SYMBOL = "XAUUSD";
export const SILVER_SYMBOL = "XAGUSD";

/** Account currency per pip for one standard lot. */
const PIP_VALUE_PER_LOT = 10;
// absorbs binary representation noise (0.29 * 100 = 28.999999999999996) before flooring
const FLOOR_TOLERANCE = 1e-9;

export class RiskCalculationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RiskCalculationError";
  }
}

export interface RiskLeg {
  readonly takeProfit: number;
  readonly pips: number;
  readonly volume: number;
  readonly profit: number;
}

export interface RiskReport {
  readonly orderType: OrderType;
  readonly symbol: string;
  readonly entryPrice: number;
  readonly stopLoss: number;
  readonly pipMultiplier: number;
  readonly stopLossPips: number;
  readonly takeProfitPips: readonly number[];
  readonly positionSize: number;
  readonly riskFraction: number;
  readonly riskPercent: number;
  readonly balance: number;
  readonly potentialLoss: number;
  readonly legs: readonly RiskLeg[];
  readonly totalProfit: number;
}

export function roundCurrency(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

function countIntegerDigits(price: number): number {
  return Math.trunc(Math.abs(price)).toString().length;
}

/**
 * Price change that makes up one pip. Metals have fixed units; for currency
 * pairs a quote with two or more integer digits (JPY crosses) uses 0.01.
 */
export function resolvePipMultiplier(symbol: string, entryPrice: number): number {
  if (symbol === GOLD_SYMBOL) {
    return 0.1;
  }
  if (symbol === SILVER_SYMBOL) {
    return 0.001;
  }
  if (countIntegerDigits(entryPrice) >= 2) {
    return 0.01;
  }
  return 0.0001;
}

export function pipDistance(from: number, to: number, multiplier: number): number {
  return Math.abs(Math.round((to - from) / multiplier));
}

export function computePositionSize(balance: number, riskFraction: number, stopLossPips: number): number {
  if (!(stopLossPips > 0)) {
    throw new RiskCalculationError("Stop loss must be at least one pip away from the entry");
  }
  const lots = (balance * riskFraction) / stopLossPips / PIP_VALUE_PER_LOT;
  return Math.floor(lots * 100 + FLOOR_TOLERANCE) / 100;
}

function resolveEntryPrice(intent: TradeIntent, marketPrice: number | undefined): number {
  if (intent.entry.type === "price") {
    return intent.entry.price;
  }
  if (marketPrice === undefined || !Number.isFinite(marketPrice) || marketPrice <= 0) {
    throw new RiskCalculationError(`A live ${intent.symbol} price is required to size a market entry`);
  }
  return marketPrice;
}

/**
 * Sizes the trade so that hitting the stop loss costs `riskFraction` of the
 * balance, then projects the loss and the profit of every take-profit leg.
 * Pure: identical inputs always produce an identical report.
 */
export function computeRisk(intent: TradeIntent, balance: number, marketPrice?: number): RiskReport {
  if (!Number.isFinite(balance) || balance < 0) {
    throw new RiskCalculationError(`Account balance must be a non-negative number, received ${balance}`);
  }

  const entryPrice = resolveEntryPrice(intent, marketPrice);
  const pipMultiplier = resolvePipMultiplier(intent.symbol, entryPrice);
  const stopLossPips = pipDistance(entryPrice, intent.stopLoss, pipMultiplier);
  const positionSize = computePositionSize(balance, intent.riskFraction, stopLossPips);

  const legCount = intent.takeProfits.length;
  const takeProfitPips = intent.takeProfits.map((takeProfit) => pipDistance(entryPrice, takeProfit, pipMultiplier));
  const legs = intent.takeProfits.map((takeProfit, index): RiskLeg => {
    const pips = takeProfitPips[index] ?? 0;
    return {
      takeProfit,
      pips,
      volume: positionSize / legCount,
      profit: roundCurrency(positionSize * PIP_VALUE_PER_LOT * (1 / legCount) * pips),
    };
  });
  const totalProfit = roundCurrency(legs.reduce((sum, leg) => sum + leg.profit, 0));

  return {
    orderType: intent.orderType,
    symbol: intent.symbol,
    entryPrice,
    stopLoss: intent.stopLoss,
    pipMultiplier,
    stopLossPips,
    takeProfitPips,
    positionSize,
    riskFraction: intent.riskFraction,
    riskPercent: roundCurrency(intent.riskFraction * 100),
    balance,
    potentialLoss: roundCurrency(positionSize * PIP_VALUE_PER_LOT * stopLossPips),
    legs,
    totalProfit,
  };
}
