import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { ConfigurationError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";

function expandHome(p: string): string {
  if (p.startsWith("~/") || p === "~") {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

type Env = Record<string, string | undefined>;

function requireEnv(env: Env, key: string): string {
  const value = env[key];
  if (!value?.trim()) {
    throw new ConfigurationError(`Missing required env var: ${key}`);
  }
  return value.trim();
}

function parseBool(raw: string | undefined, fallback: boolean): boolean {
  const v = raw?.trim().toLowerCase();
  if (!v) return fallback;
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

function parseInteger(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigurationError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return n;
}

function parseIdList(raw: string | undefined): number[] {
  return (raw ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map(Number)
    .filter((n) => Number.isSafeInteger(n) && n !== 0);
}

/**
 * Split a command-line fragment into argv entries.
 * Honors single and double quotes and backslash escapes outside single quotes.
 */
export function splitArgs(input: string): string[] {
  const args: string[] = [];
  let current = "";
  let inToken = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else if (ch === "\\" && quote === '"' && i + 1 < input.length) {
        current += input[++i];
      } else {
        current += ch;
      }
      continue;
    }
    if (ch === "'" || ch === '"') {
      quote = ch;
      inToken = true;
    } else if (ch === "\\" && i + 1 < input.length) {
      current += input[++i];
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) {
        args.push(current);
        current = "";
        inToken = false;
      }
    } else {
      current += ch;
      inToken = true;
    }
  }

  if (quote) {
    throw new ConfigurationError(`Unterminated quote in arguments: ${input}`);
  }
  if (inToken) args.push(current);
  return args;
}

export type Config = {
  telegramBotToken: string;
  allowedUsers: number[];
  allowedChats: number[];

  /** Working root: the agent runs here and outbound files must resolve inside it. */
  workspaceDir: string;
  stateDbPath: string;
  uploadsSubdir: string;
  idleSleepMs: number;

  agentBin: string;
  agentTimeoutMs: number;
  agentModel: string;
  agentExtraArgs: string[];
  instructionsPath: string;

  autoCommit: boolean;
  autoPush: boolean;
  autoPushHourUtc: number;
  gitUserName: string;
  gitUserEmail: string;
  gitCommitTemplate: string;

  maxResultChars: number;
  maxSendFileBytes: number;

  sessionsDir: string;
  sessionRetentionDays: number;
  sessionGcCron: string;

  logLevel: LogLevel;
};

/**
 * Build the runtime configuration from environment variables.
 * Throws `ConfigurationError` for anything the gateway cannot start without.
 */
export function loadConfig(env: Env = process.env): Config {
  const telegramBotToken = requireEnv(env, "TELEGRAM_BOT_TOKEN");

  const workspaceDir = path.resolve(expandHome(requireEnv(env, "ASSISTANT_ROOT")));
  let rootStat: fs.Stats | undefined;
  try {
    rootStat = fs.statSync(workspaceDir);
  } catch {
    rootStat = undefined;
  }
  if (!rootStat?.isDirectory()) {
    throw new ConfigurationError(`ASSISTANT_ROOT is not a directory: ${workspaceDir}`);
  }

  const logLevel = env.LOG_LEVEL?.trim().toLowerCase() || "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`Unknown LOG_LEVEL: ${logLevel}`);
  }

  const autoPushHourUtc = parseInteger(env, "AUTO_PUSH_HOUR_UTC", 3);
  if (autoPushHourUtc > 23) {
    throw new ConfigurationError(`AUTO_PUSH_HOUR_UTC must be 0-23, got ${autoPushHourUtc}`);
  }

  return {
    telegramBotToken,
    allowedUsers: parseIdList(env.ALLOWED_TELEGRAM_USERS),
    allowedChats: parseIdList(env.ALLOWED_TELEGRAM_CHATS),

    workspaceDir,
    stateDbPath: path.resolve(
      expandHome(env.STATE_DB_PATH?.trim() || path.join(workspaceDir, ".assistant", "state.db")),
    ),
    uploadsSubdir: env.UPLOADS_SUBDIR?.trim() || "uploads",
    idleSleepMs: parseInteger(env, "IDLE_SLEEP_MS", 1_000, 10),

    agentBin: env.AGENT_BIN?.trim() || "codex",
    agentTimeoutMs: parseInteger(env, "AGENT_TIMEOUT_MS", 1_800_000, 1_000),
    agentModel: env.AGENT_MODEL?.trim() || "",
    agentExtraArgs: splitArgs(env.AGENT_EXTRA_ARGS?.trim() || ""),
    instructionsPath: expandHome(env.AGENT_INSTRUCTIONS_PATH?.trim() || path.join(workspaceDir, "AGENTS.md")),

    autoCommit: parseBool(env.AUTO_COMMIT, true),
    autoPush: parseBool(env.AUTO_PUSH, true),
    autoPushHourUtc,
    gitUserName: env.GIT_USER_NAME?.trim() || "Assistant Bot",
    gitUserEmail: env.GIT_USER_EMAIL?.trim() || "assistant-bot@localhost",
    gitCommitTemplate: env.GIT_COMMIT_TEMPLATE?.trim() || "assistant: task #{id}",

    maxResultChars: parseInteger(env, "MAX_RESULT_CHARS", 3_500, 200),
    maxSendFileBytes: parseInteger(env, "MAX_SEND_FILE_BYTES", 50 * 1024 * 1024, 1),

    sessionsDir: path.resolve(expandHome(env.SESSIONS_DIR?.trim() || "~/.codex/sessions")),
    sessionRetentionDays: parseInteger(env, "SESSION_RETENTION_DAYS", 7),
    sessionGcCron: env.SESSION_GC_CRON?.trim() || "30 4 * * *",

    logLevel,
  };
}
