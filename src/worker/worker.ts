import { setTimeout as sleep } from "node:timers/promises";
import { FileTransferError, errorCode, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { TaskStore } from "../queue/store.js";
import type { Task } from "../queue/types.js";
import { describeCommit, describePush, type RepoSyncer } from "../repo/git-sync.js";
import type { AgentRunner } from "../runner/agent-cli.js";
import type { ChatAction, ChatChannel } from "./channel.js";
import { parseAgentResponse, resolveOutboundFile, trimText } from "./directives.js";
import type { PromptBuilder } from "./prompt.js";

export type WorkerSettings = {
  workspaceDir: string;
  idleSleepMs: number;
  agentTimeoutMs: number;
  maxResultChars: number;
  maxSendFileBytes: number;
  instructionsPath: string;
};

export type WorkerDeps = {
  store: TaskStore;
  agent: AgentRunner;
  channel: ChatChannel;
  repo: RepoSyncer;
  buildPrompt: PromptBuilder;
  settings: WorkerSettings;
  logger: Logger;
};

type Delivery = {
  text: string;
  sentFiles: string[];
  fileErrors: string[];
};

function bulletList(title: string, items: string[]): string {
  return [title, ...items.map((item) => `- ${item}`)].join("\n");
}

/** Text persisted as the task result. */
export function composeResult({ text, sentFiles, fileErrors }: Delivery): string {
  const sections: string[] = [];
  if (text) sections.push(text);
  if (sentFiles.length > 0) sections.push(bulletList("Sent files:", sentFiles));
  if (fileErrors.length > 0) sections.push(bulletList("File send errors:", fileErrors));
  return sections.join("\n\n");
}

/**
 * Serial task executor: one task at a time, oldest first.
 */
export class Worker {
  private readonly deps: WorkerDeps;
  private readonly logger: Logger;
  private readonly idleAbort = new AbortController();
  private stopping = false;
  private loop: Promise<void> | null = null;

  constructor(deps: WorkerDeps) {
    this.deps = deps;
    this.logger = deps.logger;
  }

  /** Runs until `stop()`. Calling it again returns the same loop. */
  start(): Promise<void> {
    if (!this.loop) {
      this.logger.info("Worker started");
      this.loop = this.runLoop();
    }
    return this.loop;
  }

  /** Cancels the idle wait and resolves after the in-flight task finishes. */
  async stop(): Promise<void> {
    this.stopping = true;
    this.idleAbort.abort();
    if (this.loop) await this.loop;
    this.logger.info("Worker stopped");
  }

  /**
   * Claim and process one task. Returns false when the queue was empty.
   */
  async runOnce(): Promise<boolean> {
    let task: Task | null;
    try {
      task = this.deps.store.claimNext();
    } catch (err) {
      this.logger.error(`Claim failed: ${errorMessage(err)}`);
      return false;
    }
    if (!task) return false;

    try {
      await this.processTask(task);
    } catch (err) {
      this.logger.error(`Task #${task.id} aborted: ${errorMessage(err)}`);
    }
    return true;
  }

  private async runLoop(): Promise<void> {
    while (!this.stopping) {
      const worked = await this.runOnce();
      if (!worked && !this.stopping) await this.idle();
    }
  }

  private async idle(): Promise<void> {
    try {
      await sleep(this.deps.settings.idleSleepMs, undefined, { signal: this.idleAbort.signal });
    } catch (err) {
      if (errorCode(err) !== "ABORT_ERR") throw err;
    }
  }

  private async processTask(task: Task): Promise<void> {
    const { store, agent, settings } = this.deps;
    this.logger.info(`Processing task #${task.id} for chat ${task.chatId}`);

    const priorSessionId = store.getChatSessionId(task.chatId);
    const prompt = this.deps.buildPrompt({
      text: task.text,
      attachments: task.attachments,
      bootstrap: !priorSessionId,
      instructionsPath: settings.instructionsPath,
    });

    await this.indicate(task.chatId, "typing");
    const result = await agent.run(prompt, { sessionId: priorSessionId, timeoutMs: settings.agentTimeoutMs });

    if (result.sessionId && result.sessionId !== priorSessionId) {
      store.setChatSessionId(task.chatId, result.sessionId);
      this.logger.info(`Task #${task.id}: chat ${task.chatId} session set to ${result.sessionId}`);
    }

    if (!result.success) {
      await this.reportFailure(task, result.message);
      return;
    }

    const delivery = await this.deliver(task.chatId, result.message);
    store.complete(task.id, composeResult(delivery));
    this.logger.info(
      `Task #${task.id} done (files sent=${delivery.sentFiles.length} failed=${delivery.fileErrors.length})`,
    );
    await this.syncRepo(task.id);
  }

  private async deliver(chatId: number, message: string): Promise<Delivery> {
    const { channel, settings } = this.deps;
    const parsed = parseAgentResponse(message);
    const text = trimText(parsed.text, settings.maxResultChars);
    if (text) await this.safeSend(chatId, text);

    const sentFiles: string[] = [];
    const fileErrors: string[] = [];
    for (const requested of parsed.files) {
      try {
        const file = await resolveOutboundFile(settings.workspaceDir, requested, settings.maxSendFileBytes);
        await this.indicate(chatId, "upload_document");
        try {
          await channel.sendFile(chatId, file.absolutePath);
        } catch (err) {
          throw new FileTransferError(requested, `send failed: ${errorMessage(err)}`, { cause: err });
        }
        sentFiles.push(file.relativePath);
      } catch (err) {
        const reason = err instanceof FileTransferError ? err.message : `${requested}: ${errorMessage(err)}`;
        this.logger.warn(`File not sent: ${reason}`);
        fileErrors.push(reason);
      }
    }

    if (fileErrors.length > 0) {
      await this.safeSend(chatId, trimText(bulletList("File send errors:", fileErrors), settings.maxResultChars));
    }
    return { text, sentFiles, fileErrors };
  }

  private async reportFailure(task: Task, message: string): Promise<void> {
    const errorText = trimText(`Task #${task.id} failed.\n\n${message}`, this.deps.settings.maxResultChars);
    this.deps.store.fail(task.id, errorText);
    this.logger.warn(`Task #${task.id} failed`);
    await this.safeSend(task.chatId, errorText);
  }

  private async syncRepo(taskId: number): Promise<void> {
    try {
      const commit = await this.deps.repo.commitIfNeeded(taskId);
      const push = await this.deps.repo.pushIfDue(this.deps.store);
      this.logger.info(`Task #${taskId} git: ${describeCommit(commit)}; ${describePush(push)}`);
    } catch (err) {
      this.logger.error(`Task #${taskId} git sync failed: ${errorMessage(err)}`);
    }
  }

  private async indicate(chatId: number, action: ChatAction): Promise<void> {
    try {
      await this.deps.channel.sendTyping(chatId, action);
    } catch (err) {
      this.logger.debug(`Chat action failed for ${chatId}: ${errorMessage(err)}`);
    }
  }

  private async safeSend(chatId: number, text: string): Promise<void> {
    try {
      await this.deps.channel.sendText(chatId, text);
    } catch (err) {
      this.logger.error(`Failed to send message to chat ${chatId}: ${errorMessage(err)}`);
    }
  }
}
