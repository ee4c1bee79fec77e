import { z } from "zod";
import type { MetaStore } from "../queue/types.js";

export const LAST_UPDATE_KEY = "last_update_id";

/** A chat message that has passed access control and is ready to queue. */
export const inboundMessageSchema = z
  .object({
    chatId: z.number().int(),
    userId: z.number().int(),
    username: z.string().min(1),
    text: z.string(),
    attachments: z.array(z.string().min(1)),
  })
  .refine((m) => m.text.trim().length > 0 || m.attachments.length > 0, {
    message: "message has neither text nor attachments",
  });

export type InboundMessage = z.infer<typeof inboundMessageSchema>;

export type Sender = {
  id: number;
  username?: string;
  first_name?: string;
  last_name?: string;
};

export type AccessPolicy = {
  allowedUsers: number[];
  allowedChats: number[];
};

/** Empty lists allow everyone. */
export function isAuthorized(policy: AccessPolicy, chatId: number, userId: number): boolean {
  if (policy.allowedUsers.length > 0 && !policy.allowedUsers.includes(userId)) return false;
  if (policy.allowedChats.length > 0 && !policy.allowedChats.includes(chatId)) return false;
  return true;
}

/** @username, else first and last name, else "unknown". */
export function displayName(sender: Sender | undefined): string {
  if (!sender) return "unknown";
  if (sender.username) return sender.username;
  const full = [sender.first_name, sender.last_name].filter(Boolean).join(" ").trim();
  return full || "unknown";
}

export function isNewUpdate(meta: MetaStore, updateId: number): boolean {
  const cursor = Number(meta.getMeta(LAST_UPDATE_KEY, "0"));
  return !Number.isFinite(cursor) || updateId > cursor;
}

export function recordUpdate(meta: MetaStore, updateId: number): void {
  const cursor = Number(meta.getMeta(LAST_UPDATE_KEY, "0"));
  if (!Number.isFinite(cursor) || updateId > cursor) {
    meta.setMeta(LAST_UPDATE_KEY, String(updateId));
  }
}

export type RawInbound = {
  chatId: number;
  sender: Sender | undefined;
  text: string | undefined;
  caption: string | undefined;
  attachments: string[];
};

/**
 * Build the validated record for the queue. Returns null when there is
 * nothing to run.
 */
export function toInboundMessage(raw: RawInbound): InboundMessage | null {
  const parsed = inboundMessageSchema.safeParse({
    chatId: raw.chatId,
    userId: raw.sender?.id ?? 0,
    username: displayName(raw.sender),
    text: (raw.text ?? raw.caption ?? "").trim(),
    attachments: raw.attachments,
  });
  return parsed.success ? parsed.data : null;
}
