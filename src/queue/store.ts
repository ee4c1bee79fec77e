import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { Statement } from "better-sqlite3";
import { StoreTransactionError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { upgradeSchema } from "./schema.js";
import type { MetaStore, NewTask, Task, TaskCounts, TaskRow, TaskStatus } from "./types.js";
import { TASK_STATUSES } from "./types.js";

const CHAT_SESSION_PREFIX = "chat_session:";
const DEFAULT_BUSY_TIMEOUT_MS = 5_000;

function utcNow(): string {
  return new Date().toISOString();
}

function chatSessionKey(chatId: number): string {
  return `${CHAT_SESSION_PREFIX}${chatId}`;
}

function normalizeStatus(value: string): TaskStatus {
  return TASK_STATUSES.find((s) => s === value) ?? "failed";
}

function parseAttachments(raw: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) return [];
    return parsed.filter((item): item is string => typeof item === "string");
  } catch {
    return [];
  }
}

function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    chatId: row.chat_id,
    userId: row.user_id,
    username: row.username,
    text: row.text,
    attachments: parseAttachments(row.attachments_json),
    status: normalizeStatus(row.status),
    createdAt: row.created_at,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    resultText: row.result_text,
    errorText: row.error_text,
  };
}

/**
 * Durable FIFO task queue plus a generic key/value table, backed by SQLite.
 *
 * Several stores (in one process or many) may share a database file;
 * `claimNext` is the only operation that needs to be safe against them and
 * runs as one `BEGIN IMMEDIATE` transaction.
 */
export class TaskStore implements MetaStore {
  private readonly db: Database.Database;
  private readonly logger: Logger;

  private readonly insertTaskStmt: Statement<[number, number, string, string, string, string]>;
  private readonly getTaskStmt: Statement<[number], TaskRow>;
  private readonly selectNextPendingStmt: Statement<[], TaskRow>;
  private readonly markRunningStmt: Statement<[string, number]>;
  private readonly completeStmt: Statement<[string, string, number]>;
  private readonly failStmt: Statement<[string, string, number]>;
  private readonly countsStmt: Statement<[], { status: string; cnt: number }>;

  private readonly getMetaStmt: Statement<[string], { value: string }>;
  private readonly setMetaStmt: Statement<[string, string]>;
  private readonly deleteMetaStmt: Statement<[string]>;
  private readonly listChatSessionsStmt: Statement<[], { value: string }>;

  private readonly claimTx: Database.Transaction<(startedAt: string) => TaskRow | undefined>;

  /**
   * @param dbPath SQLite file path, or `:memory:`.
   * @param opts.busyTimeoutMs how long a write waits for another connection's lock.
   */
  constructor(dbPath: string, logger: Logger, opts: { busyTimeoutMs?: number } = {}) {
    this.logger = logger;
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma(`busy_timeout = ${opts.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS}`);

    const upgrade = upgradeSchema(this.db);
    if (upgrade === "migrated-legacy") {
      this.logger.info(`Migrated legacy task table in ${dbPath}`);
    } else if (upgrade === "created") {
      this.logger.info(`Created queue schema in ${dbPath}`);
    }

    this.insertTaskStmt = this.db.prepare<[number, number, string, string, string, string]>(`
      INSERT INTO tasks (chat_id, user_id, username, text, attachments_json, status, created_at)
      VALUES (?, ?, ?, ?, ?, 'pending', ?)
    `);
    this.getTaskStmt = this.db.prepare<[number], TaskRow>(`SELECT * FROM tasks WHERE id = ?`);
    this.selectNextPendingStmt = this.db.prepare<[], TaskRow>(
      `SELECT * FROM tasks WHERE status = 'pending' ORDER BY id ASC LIMIT 1`,
    );
    this.markRunningStmt = this.db.prepare<[string, number]>(
      `UPDATE tasks SET status = 'running', started_at = ? WHERE id = ? AND status = 'pending'`,
    );
    this.completeStmt = this.db.prepare<[string, string, number]>(`
      UPDATE tasks
      SET status = 'done', finished_at = ?, result_text = ?, error_text = NULL
      WHERE id = ? AND status = 'running'
    `);
    this.failStmt = this.db.prepare<[string, string, number]>(`
      UPDATE tasks
      SET status = 'failed', finished_at = ?, error_text = ?
      WHERE id = ? AND status = 'running'
    `);
    this.countsStmt = this.db.prepare<[], { status: string; cnt: number }>(
      `SELECT status, COUNT(*) AS cnt FROM tasks GROUP BY status`,
    );

    this.getMetaStmt = this.db.prepare<[string], { value: string }>(`SELECT value FROM meta WHERE key = ?`);
    this.setMetaStmt = this.db.prepare<[string, string]>(`
      INSERT INTO meta (key, value) VALUES (?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value
    `);
    this.deleteMetaStmt = this.db.prepare<[string]>(`DELETE FROM meta WHERE key = ?`);
    this.listChatSessionsStmt = this.db.prepare<[], { value: string }>(
      `SELECT value FROM meta WHERE key GLOB '${CHAT_SESSION_PREFIX}*' AND value != ''`,
    );

    this.claimTx = this.db.transaction((startedAt: string): TaskRow | undefined => {
      const row = this.selectNextPendingStmt.get();
      if (!row) return undefined;
      this.markRunningStmt.run(startedAt, row.id);
      return { ...row, status: "running", started_at: startedAt };
    });
  }

  enqueue(task: NewTask): number {
    const result = this.insertTaskStmt.run(
      task.chatId,
      task.userId,
      task.username,
      task.text,
      JSON.stringify(task.attachments),
      utcNow(),
    );
    return Number(result.lastInsertRowid);
  }

  /**
   * Atomically move the oldest pending task to `running` and return it.
   * Returns null when the queue is empty.
   */
  claimNext(): Task | null {
    let row: TaskRow | undefined;
    try {
      row = this.claimTx.immediate(utcNow());
    } catch (err) {
      throw new StoreTransactionError("claim", errorMessage(err), { cause: err });
    }
    return row ? toTask(row) : null;
  }

  complete(taskId: number, resultText: string): void {
    this.finish("complete", taskId, () => this.completeStmt.run(utcNow(), resultText, taskId).changes);
  }

  fail(taskId: number, errorText: string): void {
    this.finish("fail", taskId, () => this.failStmt.run(utcNow(), errorText, taskId).changes);
  }

  getTask(taskId: number): Task | null {
    const row = this.getTaskStmt.get(taskId);
    return row ? toTask(row) : null;
  }

  counts(): TaskCounts {
    const result: TaskCounts = { pending: 0, running: 0, done: 0, failed: 0 };
    for (const row of this.countsStmt.all()) {
      const status = TASK_STATUSES.find((s) => s === row.status);
      if (status) result[status] = row.cnt;
    }
    return result;
  }

  getMeta(key: string, fallback = ""): string {
    return this.getMetaStmt.get(key)?.value ?? fallback;
  }

  setMeta(key: string, value: string): void {
    this.setMetaStmt.run(key, value);
  }

  deleteMeta(key: string): void {
    this.deleteMetaStmt.run(key);
  }

  getChatSessionId(chatId: number): string {
    return this.getMeta(chatSessionKey(chatId));
  }

  setChatSessionId(chatId: number, sessionId: string): void {
    this.setMeta(chatSessionKey(chatId), sessionId);
  }

  clearChatSessionId(chatId: number): void {
    this.deleteMeta(chatSessionKey(chatId));
  }

  /** Every session id currently linked to a chat. */
  listChatSessionIds(): string[] {
    return this.listChatSessionsStmt.all().map((row) => row.value);
  }

  close(): void {
    this.db.close();
  }

  private finish(operation: string, taskId: number, apply: () => number): void {
    let changes: number;
    try {
      changes = apply();
    } catch (err) {
      throw new StoreTransactionError(operation, errorMessage(err), { cause: err });
    }
    if (changes !== 1) {
      throw new StoreTransactionError(operation, `task #${taskId} is not running`);
    }
  }
}
