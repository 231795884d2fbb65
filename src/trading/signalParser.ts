import { pipDistance, resolvePipMultiplier } from "../risk/riskCalculator.js";
import {
  isMarketOrderType,
  type EntryInstruction,
  type OrderType,
  type TakeProfitTargets,
  type TradeIntent,
} from "./tradeIntent.js";

export const SUPPORTED_SYMBOLS: ReadonlySet<string> = new Set([
  "AUDCAD",
  "AUDCHF",
  "AUDJPY",
  "AUDNZD",
  "AUDUSD",
  "CADCHF",
  "CADJPY",
  "CHFJPY",
  "EURAUD",
  "EURCAD",
  "EURCHF",
  "EURGBP",
  "EURJPY",
  "EURNZD",
  "EURUSD",
  "GBPAUD",
  "GBPCAD",
  "GBPCHF",
  "GBPJPY",
  "GBPNZD",
  "GBPUSD",
  "NZDCAD",
  "NZDCHF",
  "NZDJPY",
  "NZDUSD",
  "USDCAD",
  "USDCHF",
  "USDJPY",
  "XAGUSD",
  "XAUUSD",
]);

export const MARKET_ENTRY_MARKER = "NOW";

// compound phrases first: "buy" is a substring of "buy limit"
const ORDER_TYPE_PRIORITY: readonly OrderType[] = [
  "Buy Limit",
  "Sell Limit",
  "Buy Stop",
  "Sell Stop",
  "Buy",
  "Sell",
];

const DECIMAL_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)$/;

export type SignalParseResult =
  | { readonly success: true; readonly intent: TradeIntent }
  | { readonly success: false; readonly error: string };

export interface SignalParserOptions {
  readonly riskFraction: number;
}

function reject(error: string): SignalParseResult {
  return { success: false, error };
}

function lastToken(line: string | undefined): string | undefined {
  if (line === undefined) {
    return undefined;
  }
  const tokens = line.split(/\s+/).filter(Boolean);
  return tokens[tokens.length - 1];
}

// a single trailing line break does not open an empty line
function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.map((line) => line.trimEnd());
}

function parsePositiveDecimal(token: string | undefined): number | undefined {
  if (token === undefined || !DECIMAL_PATTERN.test(token)) {
    return undefined;
  }
  const value = Number(token);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

export function classifyOrderType(line: string): OrderType | undefined {
  const lower = line.toLowerCase();
  return ORDER_TYPE_PRIORITY.find((orderType) => lower.includes(orderType.toLowerCase()));
}

function parseEntry(orderType: OrderType, token: string | undefined): EntryInstruction | string {
  if (token === undefined) {
    return "Entry line is missing";
  }
  if (isMarketOrderType(orderType) && token === MARKET_ENTRY_MARKER) {
    return { type: "market" };
  }
  const price = parsePositiveDecimal(token);
  if (price === undefined) {
    return isMarketOrderType(orderType)
      ? `Entry must be ${MARKET_ENTRY_MARKER} or a positive price, received "${token}"`
      : `${orderType} orders need a positive entry price, received "${token}"`;
  }
  return { type: "price", price };
}

/**
 * Reads a five-line signal:
 *
 * ```
 * BUY LIMIT GBPUSD
 * Entry 1.14480
 * SL 1.14336
 * TP 1.28930
 * TP 1.29845   (optional)
 * ```
 *
 * Only the last token of every line is significant. Never throws; every
 * problem is reported through the `success: false` branch.
 */
export function parseSignal(text: string, options: SignalParserOptions): SignalParseResult {
  const lines = splitLines(text);
  const header = lines[0] ?? "";

  const orderType = classifyOrderType(header);
  if (!orderType) {
    return reject("First line must name the order type (Buy, Sell, Buy Limit, Sell Limit, Buy Stop or Sell Stop)");
  }

  const symbol = lastToken(header)?.toUpperCase();
  if (!symbol || !SUPPORTED_SYMBOLS.has(symbol)) {
    return reject(`Symbol "${symbol ?? ""}" is not in the list of supported instruments`);
  }

  const entry = parseEntry(orderType, lastToken(lines[1]));
  if (typeof entry === "string") {
    return reject(entry);
  }

  const stopLossToken = lastToken(lines[2]);
  const stopLoss = parsePositiveDecimal(stopLossToken);
  if (stopLoss === undefined) {
    return reject(
      stopLossToken === undefined
        ? "Stop loss line is missing"
        : `Stop loss must be a positive price, received "${stopLossToken}"`,
    );
  }

  const firstTargetToken = lastToken(lines[3]);
  const firstTarget = parsePositiveDecimal(firstTargetToken);
  if (firstTarget === undefined) {
    return reject(
      firstTargetToken === undefined
        ? "Take profit line is missing"
        : `Take profit must be a positive price, received "${firstTargetToken}"`,
    );
  }

  let takeProfits: TakeProfitTargets = [firstTarget];
  if (lines.length > 4) {
    const secondTargetToken = lastToken(lines[4]);
    const secondTarget = parsePositiveDecimal(secondTargetToken);
    if (secondTarget === undefined) {
      return reject(`Second take profit must be a positive price, received "${secondTargetToken ?? ""}"`);
    }
    takeProfits = [firstTarget, secondTarget];
  }

  if (entry.type === "price") {
    const multiplier = resolvePipMultiplier(symbol, entry.price);
    if (pipDistance(entry.price, stopLoss, multiplier) === 0) {
      return reject("Stop loss must be at least one pip away from the entry");
    }
  }

  return {
    success: true,
    intent: {
      orderType,
      symbol,
      entry,
      stopLoss,
      takeProfits,
      riskFraction: options.riskFraction,
      text,
    },
  };
}
