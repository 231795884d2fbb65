import type { InboundMessage } from "../../../trading/messageTransport.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readUsername(value: unknown): string | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const username = value.username;
  return typeof username === "string" && username.length > 0 ? username : undefined;
}

/**
 * Extracts the text message of a webhook update. Edited messages count as
 * messages; updates without text (stickers, joins, callback queries) yield
 * `undefined`.
 */
export function parseTelegramUpdate(body: unknown): InboundMessage | undefined {
  if (!isRecord(body)) {
    return undefined;
  }
  const message = isRecord(body.message) ? body.message : isRecord(body.edited_message) ? body.edited_message : undefined;
  if (!message) {
    return undefined;
  }
  const text = message.text;
  if (typeof text !== "string" || !text.trim()) {
    return undefined;
  }
  const chat = message.chat;
  if (!isRecord(chat)) {
    return undefined;
  }
  const chatId = chat.id;
  if (typeof chatId !== "number" && typeof chatId !== "string") {
    return undefined;
  }
  return {
    sessionId: String(chatId),
    username: readUsername(chat) ?? readUsername(message.from),
    text,
  };
}
