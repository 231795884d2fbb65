export const UNAUTHORIZED_MESSAGE = "Sorry, you are not authorized to use this bot!";

export const UNKNOWN_COMMAND_MESSAGE =
  "Unknown command. Use /trade to place a trade or /calculate to find information for a trade. " +
  "You can also use the /help command to view instructions for this bot.";

export const WELCOME_MESSAGE =
  "Hi, welcome to the FX Signal Desk Telegram bot!\n\n" +
  "You can use this bot to enter trades directly from Telegram and get a detailed look at your risk to reward " +
  "ratio with profit, loss and calculated lot size. The risk factor and account settings come from the " +
  "environment the bot runs in.\n\n" +
  "Use the /help command to view instructions and example trades.";

export const HELP_MESSAGES: readonly string[] = [
  "This bot is used to enter trades onto your MetaTrader account directly from Telegram. " +
    "Only the authorized username configured for this bot can use it.\n\n" +
    "This bot supports all trade order types (Market Execution, Limit and Stop).",
  "List of commands:\n" +
    "/start : displays welcome message\n" +
    "/help : displays list of commands and example trades\n" +
    "/trade : takes in user inputted trade for parsing and placement\n" +
    "/calculate : calculates trade information for a user inputted trade\n" +
    "/cancel : cancels the current action",
  "Example Trades:\n\n" +
    "Market Execution:\nBUY GBPUSD\nEntry NOW\nSL 1.14336\nTP 1.28930\nTP 1.29845\n\n" +
    "Limit Execution:\nBUY LIMIT GBPUSD\nEntry 1.14480\nSL 1.14336\nTP 1.28930\n\n" +
    "You are able to enter up to two take profits. If two are entered, both trades will use half of the " +
    "position size, and one will use TP1 while the other uses TP2.\n\n" +
    "Note: Use 'NOW' as the entry to enter a market execution trade.",
];

export const TRADE_PROMPT = "Please enter the trade that you would like to place.";
export const CALCULATE_PROMPT = "Please enter the trade that you would like to calculate.";
export const CANCELED_MESSAGE = "Command has been canceled.";
export const PARSED_MESSAGE = "Trade Successfully Parsed!\nConnecting to MetaTrader ... (May take a while)";
export const CONNECTED_MESSAGE = "Successfully connected to MetaTrader!\nCalculating trade risk ...";
export const PLACING_MESSAGE = "Entering trade on MetaTrader Account ...";
export const PLACED_MESSAGE = "Trade entered successfully, Good Luck!";
export const DECISION_PROMPT = "Would you like to enter this trade?\nTo enter, select: /yes\nTo decline, select: /no";
const RESTART_HINT = "Use /trade or /calculate to start again.";

export const ACCOUNT_MISMATCH_MESSAGE = `Connected to an unauthorized MT4 account. Operation aborted.\n\n${RESTART_HINT}`;
export const UNEXPECTED_ERROR_MESSAGE =
  "Something went wrong while handling your request. The current action has been canceled, please start again.";

export function parseErrorMessage(reason: string): string {
  return (
    `There was an error parsing this trade\n\nError: ${reason}\n\n` +
    "Please re-enter trade with this format:\n\nBUY/SELL SYMBOL\nEntry \nSL \nTP \n\n" +
    "Or use the /cancel command to cancel this action."
  );
}

/** `leg` counts from 1, matching the TP line it was built from. */
export function legPlacedMessage(leg: number, stringCode: string): string {
  return `TP ${leg} order placed (${stringCode})`;
}

export function legFailedMessage(leg: number, message: string, stringCode?: string): string {
  const code = stringCode ? ` (${stringCode})` : "";
  return `There was an issue with the TP ${leg} order${code}\n\nError Message:\n${message}`;
}

export function connectionFailedMessage(message: string): string {
  return `There was an issue with the connection \n\nError Message:\n${message}\n\n${RESTART_HINT}`;
}

export function rejectedMessage(reason: string): string {
  return `This trade cannot be sized or placed.\n\nReason: ${reason}\n\n${RESTART_HINT}`;
}
