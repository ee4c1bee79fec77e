import { describe, it, expect, vi } from "vitest";
import { HELP_TEXT, handleNew, handleStart, handleStatus, renderStatus } from "./commands.js";
import { TaskStore } from "../queue/store.js";
import { silentLogger } from "../logger.js";

function fakeCtx(chatId?: number) {
  return {
    chat: chatId === undefined ? undefined : { id: chatId },
    reply: vi.fn(async (_text: string) => ({})),
  };
}

describe("renderStatus", () => {
  it("lists counts and the session", () => {
    expect(renderStatus({ pending: 2, running: 1, done: 5, failed: 0 }, "S1")).toBe(
      "Queue status:\n- pending: 2\n- running: 1\n- done: 5\n- failed: 0\nSession: S1",
    );
  });

  it("marks a missing session", () => {
    expect(renderStatus({ pending: 0, running: 0, done: 0, failed: 0 }, "")).toContain(
      "Session: (none, the next message starts one)",
    );
  });
});

describe("command handlers", () => {
  it("/start replies with help", async () => {
    const ctx = fakeCtx(42);
    await handleStart(ctx);
    expect(ctx.reply).toHaveBeenCalledWith(HELP_TEXT);
  });

  it("/status reports the chat's session", async () => {
    const store = new TaskStore(":memory:", silentLogger);
    try {
      store.enqueue({ chatId: 42, userId: 7, username: "alice", text: "x", attachments: [] });
      store.setChatSessionId(42, "S1");
      const ctx = fakeCtx(42);
      await handleStatus(store)(ctx);
      expect(ctx.reply).toHaveBeenCalledWith(
        "Queue status:\n- pending: 1\n- running: 0\n- done: 0\n- failed: 0\nSession: S1",
      );
    } finally {
      store.close();
    }
  });

  it("/new clears the chat's session only", async () => {
    const store = new TaskStore(":memory:", silentLogger);
    try {
      store.setChatSessionId(42, "S1");
      store.setChatSessionId(43, "S2");
      const ctx = fakeCtx(42);
      await handleNew(store)(ctx);
      expect(store.getChatSessionId(42)).toBe("");
      expect(store.getChatSessionId(43)).toBe("S2");
      expect(ctx.reply).toHaveBeenCalledTimes(1);
    } finally {
      store.close();
    }
  });

  it("ignores updates without a chat", async () => {
    const store = new TaskStore(":memory:", silentLogger);
    try {
      const ctx = fakeCtx();
      await handleNew(store)(ctx);
      expect(ctx.reply).not.toHaveBeenCalled();
    } finally {
      store.close();
    }
  });
});
