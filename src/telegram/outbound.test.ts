import { describe, it, expect, vi } from "vitest";
import { InputFile } from "grammy";
import { TelegramChannel, chunkText } from "./outbound.js";

describe("chunkText", () => {
  it("returns single chunk for text under limit", () => {
    expect(chunkText("short text")).toEqual(["short text"]);
  });

  it("returns single chunk for text exactly at limit", () => {
    const text = "a".repeat(4096);
    expect(chunkText(text)).toEqual([text]);
  });

  it("splits at newline when possible", () => {
    const line1 = "a".repeat(3000);
    const line2 = "b".repeat(3000);
    const chunks = chunkText(`${line1}\n${line2}`);
    expect(chunks).toEqual([line1, line2]);
  });

  it("falls back to a space when the newline is too early", () => {
    const part1 = "a".repeat(100);
    const part2 = "b".repeat(3500);
    const part3 = "c".repeat(2000);
    const chunks = chunkText(`${part1}\n${part2} ${part3}`);
    expect(chunks).toEqual([`${part1}\n${part2}`, part3]);
  });

  it("hard splits when no good split point exists", () => {
    const chunks = chunkText("x".repeat(8000));
    expect(chunks.map((c) => c.length)).toEqual([4096, 3904]);
  });

  it("respects custom maxLen", () => {
    const chunks = chunkText("a".repeat(100), 50);
    expect(chunks.map((c) => c.length)).toEqual([50, 50]);
  });
});

describe("TelegramChannel", () => {
  function fakeApi() {
    return {
      sendMessage: vi.fn(async () => ({})),
      sendDocument: vi.fn(async () => ({})),
      sendChatAction: vi.fn(async () => true),
    };
  }

  it("sends long text in chunks", async () => {
    const api = fakeApi();
    const channel = new TelegramChannel(api);
    await channel.sendText(42, "x".repeat(5000));

    expect(api.sendMessage).toHaveBeenCalledTimes(2);
    expect(api.sendMessage).toHaveBeenNthCalledWith(1, 42, "x".repeat(4096));
    expect(api.sendMessage).toHaveBeenNthCalledWith(2, 42, "x".repeat(904));
  });

  it("sends files as documents", async () => {
    const api = fakeApi();
    await new TelegramChannel(api).sendFile(42, "/srv/assistant/notes/a.md");

    expect(api.sendDocument).toHaveBeenCalledTimes(1);
    expect(api.sendDocument).toHaveBeenCalledWith(42, expect.any(InputFile));
  });

  it("defaults the chat action to typing", async () => {
    const api = fakeApi();
    const channel = new TelegramChannel(api);
    await channel.sendTyping(42);
    await channel.sendTyping(42, "upload_document");

    expect(api.sendChatAction).toHaveBeenNthCalledWith(1, 42, "typing");
    expect(api.sendChatAction).toHaveBeenNthCalledWith(2, 42, "upload_document");
  });
});
