export type ChatAction = "typing" | "upload_document";

/** Outbound side of a chat transport. */
export interface ChatChannel {
  sendText(chatId: number, text: string): Promise<void>;
  sendFile(chatId: number, filePath: string): Promise<void>;
  /** Best-effort activity indicator. */
  sendTyping(chatId: number, action?: ChatAction): Promise<void>;
}
