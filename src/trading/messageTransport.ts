export type MessageFormat = "plain" | "html";

export interface ReplyOptions {
  readonly format?: MessageFormat;
}

export interface InboundMessage {
  /** Conversation the message belongs to; replies go back to it. */
  readonly sessionId: string;
  readonly username?: string;
  readonly text: string;
}

export interface MessageTransport {
  reply(sessionId: string, text: string, options?: ReplyOptions): Promise<void>;
}
