import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Worker, composeResult, type WorkerSettings } from "./worker.js";
import { buildPrompt } from "./prompt.js";
import type { ChatChannel } from "./channel.js";
import { TaskStore } from "../queue/store.js";
import type { NewTask } from "../queue/types.js";
import type { AgentRunResult, AgentRunner } from "../runner/agent-cli.js";
import type { RepoSyncer } from "../repo/git-sync.js";
import { silentLogger } from "../logger.js";

function newTask(text: string, chatId = 42): NewTask {
  return { chatId, userId: 7, username: "alice", text, attachments: [] };
}

function fakeChannel() {
  const texts: Array<[number, string]> = [];
  const files: Array<[number, string]> = [];
  const channel = {
    sendText: vi.fn(async (chatId: number, text: string) => {
      texts.push([chatId, text]);
    }),
    sendFile: vi.fn(async (chatId: number, filePath: string) => {
      files.push([chatId, filePath]);
    }),
    sendTyping: vi.fn(async () => {}),
  } satisfies ChatChannel;
  return { channel, texts, files };
}

function fakeRepo() {
  return {
    commitIfNeeded: vi.fn(async () => ({ status: "clean" as const })),
    pushIfDue: vi.fn(async () => ({ status: "not-due" as const })),
  } satisfies RepoSyncer;
}

function fakeAgent(...results: AgentRunResult[]) {
  const run = vi.fn<AgentRunner["run"]>();
  for (const result of results) run.mockResolvedValueOnce(result);
  return { run };
}

describe("composeResult", () => {
  it("joins text and file sections", () => {
    expect(composeResult({ text: "Done", sentFiles: ["a.md"], fileErrors: ["b.md: file not found"] })).toBe(
      "Done\n\nSent files:\n- a.md\n\nFile send errors:\n- b.md: file not found",
    );
  });

  it("is empty when there is nothing to report", () => {
    expect(composeResult({ text: "", sentFiles: [], fileErrors: [] })).toBe("");
  });
});

describe("Worker", () => {
  let root: string;
  let store: TaskStore;
  let settings: WorkerSettings;

  beforeEach(() => {
    root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "gateway-worker-")));
    fs.mkdirSync(path.join(root, "notes"));
    fs.writeFileSync(path.join(root, "notes", "a.md"), "# a\n");
    store = new TaskStore(":memory:", silentLogger);
    settings = {
      workspaceDir: root,
      idleSleepMs: 10,
      agentTimeoutMs: 5_000,
      maxResultChars: 3_500,
      maxSendFileBytes: 1024,
      instructionsPath: path.join(root, "AGENTS.md"),
    };
  });

  afterEach(() => {
    store.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  function makeWorker(agent: AgentRunner, channel: ChatChannel, repo: RepoSyncer = fakeRepo()) {
    return new Worker({ store, agent, channel, repo, buildPrompt, settings, logger: silentLogger });
  }

  it("reports an empty queue", async () => {
    const { channel } = fakeChannel();
    const worker = makeWorker(fakeAgent(), channel);
    await expect(worker.runOnce()).resolves.toBe(false);
  });

  it("relays text and files and completes the task", async () => {
    const id = store.enqueue(newTask("send me the note"));
    const agent = fakeAgent({
      success: true,
      message: "Done\n[[send-file:notes/a.md]]\n[[send-file:../outside.txt]]\n[[send-file:notes/a.md]]",
      sessionId: "S1",
    });
    const { channel, texts, files } = fakeChannel();
    const repo = fakeRepo();

    await expect(makeWorker(agent, channel, repo).runOnce()).resolves.toBe(true);

    expect(texts).toEqual([
      [42, "Done"],
      [42, "File send errors:\n- ../outside.txt: outside the working directory"],
    ]);
    expect(files).toEqual([[42, path.join(root, "notes", "a.md")]]);

    const task = store.getTask(id);
    expect(task?.status).toBe("done");
    expect(task?.resultText).toBe(
      "Done\n\nSent files:\n- notes/a.md\n\nFile send errors:\n- ../outside.txt: outside the working directory",
    );
    expect(store.getChatSessionId(42)).toBe("S1");
    expect(repo.commitIfNeeded).toHaveBeenCalledWith(id);
    expect(repo.pushIfDue).toHaveBeenCalledWith(store);
    expect(channel.sendTyping).toHaveBeenCalledWith(42, "typing");
    expect(channel.sendTyping).toHaveBeenCalledWith(42, "upload_document");
  });

  it("bootstraps new sessions and resumes known ones", async () => {
    store.enqueue(newTask("first"));
    store.enqueue(newTask("second"));
    const agent = fakeAgent(
      { success: true, message: "one", sessionId: "S1" },
      { success: true, message: "two", sessionId: "S1" },
    );
    const { channel } = fakeChannel();
    const worker = makeWorker(agent, channel);

    await worker.runOnce();
    await worker.runOnce();

    const [firstPrompt, firstOpts] = agent.run.mock.calls[0];
    const [secondPrompt, secondOpts] = agent.run.mock.calls[1];
    expect(firstPrompt.startsWith("Before handling the request")).toBe(true);
    expect(firstOpts).toEqual({ sessionId: "", timeoutMs: 5_000 });
    expect(secondPrompt.startsWith("second")).toBe(true);
    expect(secondOpts).toEqual({ sessionId: "S1", timeoutMs: 5_000 });
  });

  it("fails the task, keeps the new session and tells the chat", async () => {
    const id = store.enqueue(newTask("break"));
    const agent = fakeAgent({ success: false, message: "boom", sessionId: "S2", failure: "exit" });
    const { channel, texts } = fakeChannel();
    const repo = fakeRepo();

    await makeWorker(agent, channel, repo).runOnce();

    const task = store.getTask(id);
    expect(task?.status).toBe("failed");
    expect(task?.errorText).toBe(`Task #${id} failed.\n\nboom`);
    expect(texts).toEqual([[42, `Task #${id} failed.\n\nboom`]]);
    expect(store.getChatSessionId(42)).toBe("S2");
    expect(repo.commitIfNeeded).not.toHaveBeenCalled();
  });

  it("leaves the stored session alone when the agent returns none", async () => {
    store.setChatSessionId(42, "S1");
    store.enqueue(newTask("hi"));
    const { channel } = fakeChannel();
    await makeWorker(fakeAgent({ success: false, message: "x", sessionId: "", failure: "launch" }), channel).runOnce();
    expect(store.getChatSessionId(42)).toBe("S1");
  });

  it("trims long answers to the budget", async () => {
    settings.maxResultChars = 20;
    const id = store.enqueue(newTask("long"));
    const { channel, texts } = fakeChannel();
    await makeWorker(fakeAgent({ success: true, message: "y".repeat(100), sessionId: "S1" }), channel).runOnce();

    expect(texts).toEqual([[42, "yyyyyyy\n\n[truncated]"]]);
    expect(store.getTask(id)?.resultText).toBe("yyyyyyy\n\n[truncated]");
  });

  it("completes even when the chat is unreachable", async () => {
    const id = store.enqueue(newTask("hi"));
    const { channel } = fakeChannel();
    channel.sendText.mockRejectedValue(new Error("network down"));
    channel.sendTyping.mockRejectedValue(new Error("network down"));

    await makeWorker(fakeAgent({ success: true, message: "ok", sessionId: "S1" }), channel).runOnce();
    expect(store.getTask(id)?.status).toBe("done");
  });

  it("records a failed upload and keeps going", async () => {
    fs.writeFileSync(path.join(root, "notes", "b.md"), "# b\n");
    const id = store.enqueue(newTask("both"));
    const { channel, files } = fakeChannel();
    channel.sendFile.mockRejectedValueOnce(new Error("too many requests"));

    await makeWorker(
      fakeAgent({ success: true, message: "[[send-file:notes/a.md]]\n[[send-file:notes/b.md]]", sessionId: "S1" }),
      channel,
    ).runOnce();

    expect(files).toEqual([[42, path.join(root, "notes", "b.md")]]);
    expect(store.getTask(id)?.resultText).toBe(
      "Sent files:\n- notes/b.md\n\nFile send errors:\n- notes/a.md: send failed: too many requests",
    );
  });

  it("logs git failures without failing the task", async () => {
    const id = store.enqueue(newTask("hi"));
    const { channel } = fakeChannel();
    const repo = fakeRepo();
    repo.commitIfNeeded.mockRejectedValueOnce(new Error("git missing"));

    await makeWorker(fakeAgent({ success: true, message: "ok", sessionId: "S1" }), channel, repo).runOnce();
    expect(store.getTask(id)?.status).toBe("done");
  });

  it("processes queued tasks in order until stopped", async () => {
    const first = store.enqueue(newTask("a"));
    const second = store.enqueue(newTask("b", 43));
    const agent = fakeAgent(
      { success: true, message: "A", sessionId: "S1" },
      { success: true, message: "B", sessionId: "S2" },
    );
    const { channel, texts } = fakeChannel();
    const worker = makeWorker(agent, channel);

    const running = worker.start();
    await vi.waitFor(() => expect(store.getTask(second)?.status).toBe("done"));
    await worker.stop();
    await running;

    expect(store.getTask(first)?.status).toBe("done");
    expect(texts).toEqual([
      [42, "A"],
      [43, "B"],
    ]);
  });

  it("stops promptly while idle", async () => {
    settings.idleSleepMs = 60_000;
    const { channel } = fakeChannel();
    const agent = fakeAgent();
    const worker = makeWorker(agent, channel);
    const running = worker.start();
    await new Promise((resolve) => setTimeout(resolve, 20));
    await worker.stop();
    await running;
    expect(agent.run).not.toHaveBeenCalled();
  });

  it("waits for the in-flight task on stop", async () => {
    const id = store.enqueue(newTask("slow"));
    let finish: (result: AgentRunResult) => void = () => {};
    const agent = {
      run: vi.fn(
        () =>
          new Promise<AgentRunResult>((resolve) => {
            finish = resolve;
          }),
      ),
    };
    const { channel } = fakeChannel();
    const worker = makeWorker(agent, channel);

    void worker.start();
    await vi.waitFor(() => expect(agent.run).toHaveBeenCalled());
    const stopping = worker.stop();
    expect(store.getTask(id)?.status).toBe("running");
    finish({ success: true, message: "late", sessionId: "S1" });
    await stopping;

    expect(store.getTask(id)?.status).toBe("done");
  });
});
