import type { Logger } from "../logger.js";
import type { NewTask } from "../queue/types.js";
import type { FileSource } from "./attachments.js";
import { toInboundMessage, type Sender } from "./inbound.js";

/** The fields of a Telegram message that intake reads. */
export type IncomingMessage = {
  message_id: number;
  text?: string;
  caption?: string;
  photo?: Array<{ file_id: string }>;
  document?: { file_id: string; file_name?: string };
};

export type IntakeDeps = {
  enqueue: (task: NewTask) => number;
  downloadAll: (sources: FileSource[]) => Promise<string[]>;
  logger: Logger;
};

/** Largest photo size plus any document, in that order. */
export function fileSources(message: IncomingMessage): FileSource[] {
  const sources: FileSource[] = [];
  const photo = message.photo?.at(-1);
  if (photo) {
    sources.push({ fileId: photo.file_id, nameHint: `photo-${message.message_id}.jpg` });
  }
  if (message.document) {
    sources.push({
      fileId: message.document.file_id,
      nameHint: message.document.file_name || `document-${message.message_id}`,
    });
  }
  return sources;
}

/**
 * Materialize attachments, validate, and queue. Returns the task id, or
 * null when the message carried nothing to run.
 */
export async function acceptMessage(
  deps: IntakeDeps,
  chatId: number,
  sender: Sender | undefined,
  message: IncomingMessage,
): Promise<number | null> {
  const attachments = await deps.downloadAll(fileSources(message));
  const inbound = toInboundMessage({
    chatId,
    sender,
    text: message.text,
    caption: message.caption,
    attachments,
  });
  if (!inbound) return null;

  const taskId = deps.enqueue(inbound);
  deps.logger.info(
    `Queued task #${taskId} from ${inbound.username} in chat ${chatId} (attachments=${attachments.length})`,
  );
  return taskId;
}
