import { InputFile } from "grammy";
import type { ChatAction, ChatChannel } from "../worker/channel.js";

export const TELEGRAM_MAX_CHARS = 4096;

/** The part of the Bot API the channel sends through. */
export type OutboundApi = {
  sendMessage(chatId: number, text: string): Promise<unknown>;
  sendDocument(chatId: number, document: InputFile): Promise<unknown>;
  sendChatAction(chatId: number, action: ChatAction): Promise<unknown>;
};

/**
 * Split text into chunks that fit in a Telegram message (4096 chars max).
 * Tries to split at newlines, then spaces, then hard-splits.
 */
export function chunkText(text: string, maxLen = TELEGRAM_MAX_CHARS): string[] {
  if (text.length <= maxLen) return [text];

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > 0) {
    if (remaining.length <= maxLen) {
      chunks.push(remaining);
      break;
    }

    // Prefer a newline near the boundary, then a space
    let splitAt = remaining.lastIndexOf("\n", maxLen);
    if (splitAt < maxLen * 0.5) {
      splitAt = remaining.lastIndexOf(" ", maxLen);
    }
    if (splitAt < maxLen * 0.3) {
      splitAt = maxLen;
    }

    chunks.push(remaining.slice(0, splitAt));
    remaining = remaining.slice(splitAt).trimStart();
  }

  return chunks;
}

export class TelegramChannel implements ChatChannel {
  private readonly api: OutboundApi;

  constructor(api: OutboundApi) {
    this.api = api;
  }

  async sendText(chatId: number, text: string): Promise<void> {
    for (const chunk of chunkText(text)) {
      await this.api.sendMessage(chatId, chunk);
    }
  }

  async sendFile(chatId: number, filePath: string): Promise<void> {
    await this.api.sendDocument(chatId, new InputFile(filePath));
  }

  async sendTyping(chatId: number, action: ChatAction = "typing"): Promise<void> {
    await this.api.sendChatAction(chatId, action);
  }
}
