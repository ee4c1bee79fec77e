import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { MetaStore } from "../queue/types.js";

const execFileAsync = promisify(execFile);

/** Default timeout for a single git command (2 minutes) */
const GIT_COMMAND_TIMEOUT_MS = 120_000;

export const LAST_PUSH_ATTEMPT_KEY = "last_push_attempt_utc";

export type GitResult = {
  code: number;
  stdout: string;
  stderr: string;
};

/** Runs `git <args>` in the working root. Never rejects on a non-zero exit. */
export type GitRunner = (args: string[]) => Promise<GitResult>;

export type CommitOutcome =
  | { status: "disabled" }
  | { status: "clean" }
  | { status: "committed"; hash: string }
  | { status: "failed"; reason: string };

export type PushOutcome =
  | { status: "disabled" }
  | { status: "not-due" }
  | { status: "already-attempted" }
  | { status: "no-remote" }
  | { status: "pushed" }
  | { status: "failed"; reason: string };

export type RepoSyncOptions = {
  workspaceDir: string;
  autoCommit: boolean;
  autoPush: boolean;
  autoPushHourUtc: number;
  gitUserName: string;
  gitUserEmail: string;
  /** `{id}` is replaced with the task id. */
  commitTemplate: string;
  git?: GitRunner;
  now?: () => Date;
};

/** What the worker needs from repository sync. */
export interface RepoSyncer {
  commitIfNeeded(taskId: number): Promise<CommitOutcome>;
  pushIfDue(meta: MetaStore): Promise<PushOutcome>;
}

function stringField(err: unknown, key: "stdout" | "stderr"): string {
  if (!err || typeof err !== "object" || !(key in err)) return "";
  const value: unknown = Reflect.get(err, key);
  return typeof value === "string" ? value : "";
}

function exitCodeOf(err: unknown): number {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "number") return err.code;
  return 1;
}

/** Default runner: `git -C <root> ...` through execFile. */
export function createGitRunner(workspaceDir: string): GitRunner {
  return async (args) => {
    try {
      const { stdout, stderr } = await execFileAsync("git", ["-C", workspaceDir, ...args], {
        encoding: "utf8",
        timeout: GIT_COMMAND_TIMEOUT_MS,
      });
      return { code: 0, stdout, stderr };
    } catch (err) {
      const stderr = stringField(err, "stderr") || errorMessage(err);
      return { code: exitCodeOf(err), stdout: stringField(err, "stdout"), stderr };
    }
  };
}

export function formatCommitMessage(template: string, taskId: number): string {
  return template.split("{id}").join(String(taskId));
}

export function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function reasonOf(result: GitResult): string {
  return result.stderr.trim() || result.stdout.trim() || `git exited with code ${result.code}`;
}

export function describeCommit(outcome: CommitOutcome): string {
  switch (outcome.status) {
    case "disabled":
      return "auto-commit disabled";
    case "clean":
      return "no file changes";
    case "committed":
      return `committed ${outcome.hash}`;
    case "failed":
      return `commit failed: ${outcome.reason}`;
  }
}

export function describePush(outcome: PushOutcome): string {
  switch (outcome.status) {
    case "disabled":
      return "auto-push disabled";
    case "not-due":
      return "push not due yet";
    case "already-attempted":
      return "push already attempted today";
    case "no-remote":
      return "push skipped: no git remote configured";
    case "pushed":
      return "push completed";
    case "failed":
      return `push failed: ${outcome.reason}`;
  }
}

/**
 * Commits the working tree after each successful task and pushes at most
 * once per UTC day, after a configured hour.
 */
export class RepoSync implements RepoSyncer {
  private readonly opts: RepoSyncOptions;
  private readonly git: GitRunner;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(opts: RepoSyncOptions, logger: Logger) {
    this.opts = opts;
    this.git = opts.git ?? createGitRunner(opts.workspaceDir);
    this.now = opts.now ?? (() => new Date());
    this.logger = logger;
  }

  async commitIfNeeded(taskId: number): Promise<CommitOutcome> {
    if (!this.opts.autoCommit) return { status: "disabled" };

    const status = await this.git(["status", "--porcelain"]);
    if (status.code !== 0) return { status: "failed", reason: `git status failed: ${reasonOf(status)}` };
    if (!status.stdout.trim()) return { status: "clean" };

    await this.ensureIdentity();

    const add = await this.git(["add", "-A"]);
    if (add.code !== 0) return { status: "failed", reason: reasonOf(add) };

    const commit = await this.git(["commit", "-m", formatCommitMessage(this.opts.commitTemplate, taskId)]);
    if (commit.code !== 0) return { status: "failed", reason: reasonOf(commit) };

    const head = await this.git(["rev-parse", "--short", "HEAD"]);
    return { status: "committed", hash: head.stdout.trim() };
  }

  async pushIfDue(meta: MetaStore): Promise<PushOutcome> {
    if (!this.opts.autoPush) return { status: "disabled" };

    const now = this.now();
    if (now.getUTCHours() < this.opts.autoPushHourUtc) return { status: "not-due" };

    const today = utcDay(now);
    if (meta.getMeta(LAST_PUSH_ATTEMPT_KEY) === today) return { status: "already-attempted" };

    const remotes = await this.git(["remote"]);
    if (!remotes.stdout.trim()) {
      meta.setMeta(LAST_PUSH_ATTEMPT_KEY, today);
      return { status: "no-remote" };
    }

    const pushed = await this.git(["push"]);
    meta.setMeta(LAST_PUSH_ATTEMPT_KEY, today);
    if (pushed.code !== 0) {
      this.logger.warn(`git push failed: ${reasonOf(pushed)}`);
      return { status: "failed", reason: reasonOf(pushed) };
    }
    return { status: "pushed" };
  }

  private async ensureIdentity(): Promise<void> {
    const name = await this.git(["config", "--get", "user.name"]);
    if (!name.stdout.trim()) await this.git(["config", "user.name", this.opts.gitUserName]);
    const email = await this.git(["config", "--get", "user.email"]);
    if (!email.stdout.trim()) await this.git(["config", "user.email", this.opts.gitUserEmail]);
  }
}
