import type { TaskCounts } from "../queue/types.js";

/** What command handlers need from a grammy context. */
export type CommandContext = {
  chat?: { id: number };
  reply: (text: string) => Promise<unknown>;
};

/** What command handlers need from the queue. */
export type CommandStore = {
  counts: () => TaskCounts;
  getChatSessionId: (chatId: number) => string;
  clearChatSessionId: (chatId: number) => void;
};

export const HELP_TEXT =
  "Hello! I queue your messages as tasks for the assistant agent.\n\n" +
  "Send text, a photo or a document and I'll reply when the task is done.\n\n" +
  "Commands:\n" +
  "/new — start a fresh agent session\n" +
  "/status — queue counts and the current session";

export function renderStatus(counts: TaskCounts, sessionId: string): string {
  return [
    "Queue status:",
    `- pending: ${counts.pending}`,
    `- running: ${counts.running}`,
    `- done: ${counts.done}`,
    `- failed: ${counts.failed}`,
    `Session: ${sessionId || "(none, the next message starts one)"}`,
  ].join("\n");
}

export async function handleStart(ctx: CommandContext): Promise<void> {
  await ctx.reply(HELP_TEXT);
}

export function handleStatus(store: CommandStore) {
  return async (ctx: CommandContext): Promise<void> => {
    const chatId = ctx.chat?.id;
    if (chatId === undefined) return;
    await ctx.reply(renderStatus(store.counts(), store.getChatSessionId(chatId)));
  };
}

export function handleNew(store: CommandStore) {
  return async (ctx: CommandContext): Promise<void> => {
    const chatId = ctx.chat?.id;
    if (chatId === undefined) return;
    store.clearChatSessionId(chatId);
    await ctx.reply("Session reset. Your next message starts a fresh agent session.");
  };
}
