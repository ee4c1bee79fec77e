/**
 * Deletes stale agent session transcripts that no chat refers to any more.
 *
 * Transcripts are `rollout-*.jsonl` files anywhere under the sessions
 * directory; the session id is the last UUID in the file name.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { Cron } from "croner";
import { errorCode, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";

const DAY_MS = 86_400_000;

const SESSION_ID_PATTERN = /[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi;

export type SweepOptions = {
  sessionsDir: string;
  /** Session ids that must survive regardless of age. */
  retain: Iterable<string>;
  olderThanDays: number;
  now?: Date;
};

export type SweepResult = {
  deleted: number;
  kept: number;
  skipped: number;
  errors: number;
};

export function isTranscriptName(name: string): boolean {
  return name.startsWith("rollout-") && name.endsWith(".jsonl");
}

/** Last UUID in the file name, lower-cased, or "" when there is none. */
export function extractSessionId(fileName: string): string {
  const matches = path.basename(fileName).match(SESSION_ID_PATTERN);
  return matches ? matches[matches.length - 1].toLowerCase() : "";
}

async function listTranscripts(dir: string, found: string[], dirs: string[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      dirs.push(full);
      await listTranscripts(full, found, dirs);
    } else if (entry.isFile() && isTranscriptName(entry.name)) {
      found.push(full);
    }
  }
}

/** Best-effort; a directory that cannot be removed stays. */
async function removeEmptyDirs(dirs: string[]): Promise<void> {
  // Deepest first, so parents emptied by their children go too.
  const ordered = [...dirs].sort((a, b) => b.length - a.length);
  for (const dir of ordered) {
    const remaining = await fs.readdir(dir).catch(() => null);
    if (remaining?.length === 0) {
      await fs.rmdir(dir).catch(() => undefined);
    }
  }
}

export async function sweepSessions(opts: SweepOptions): Promise<SweepResult> {
  const result: SweepResult = { deleted: 0, kept: 0, skipped: 0, errors: 0 };
  const retain = new Set<string>();
  for (const id of opts.retain) {
    if (id) retain.add(id.toLowerCase());
  }
  const cutoffMs = (opts.now ?? new Date()).getTime() - Math.max(0, opts.olderThanDays) * DAY_MS;

  const files: string[] = [];
  const dirs: string[] = [];
  try {
    await listTranscripts(opts.sessionsDir, files, dirs);
  } catch (err) {
    if (errorCode(err) === "ENOENT") return result;
    throw err;
  }

  for (const file of files) {
    let mtimeMs: number;
    try {
      mtimeMs = (await fs.stat(file)).mtimeMs;
    } catch {
      result.errors++;
      continue;
    }

    if (mtimeMs >= cutoffMs) {
      result.skipped++;
      continue;
    }

    const sessionId = extractSessionId(file);
    if (sessionId && retain.has(sessionId)) {
      result.kept++;
      continue;
    }

    try {
      await fs.unlink(file);
      result.deleted++;
    } catch {
      result.errors++;
    }
  }

  await removeEmptyDirs(dirs);
  return result;
}

export type SessionSweepSchedule = {
  sessionsDir: string;
  olderThanDays: number;
  /** Cron expression, evaluated in UTC. */
  cron: string;
  /** Read at each run so newly linked sessions are protected. */
  retain: () => Iterable<string>;
  logger: Logger;
};

export type SweepHandle = {
  /** Resolves once the startup sweep has finished. */
  initial: Promise<SweepResult | null>;
  stop: () => void;
};

/**
 * Sweep once now, then on the given cron schedule.
 */
export function startSessionSweeps(schedule: SessionSweepSchedule): SweepHandle {
  const { logger } = schedule;

  const runOnce = async (): Promise<SweepResult | null> => {
    try {
      const result = await sweepSessions({
        sessionsDir: schedule.sessionsDir,
        retain: schedule.retain(),
        olderThanDays: schedule.olderThanDays,
      });
      logger.info(
        `Session sweep: deleted=${result.deleted} kept=${result.kept} skipped=${result.skipped} errors=${result.errors}`,
      );
      return result;
    } catch (err) {
      logger.error(`Session sweep failed: ${errorMessage(err)}`);
      return null;
    }
  };

  const job = new Cron(schedule.cron, { timezone: "UTC", protect: true }, async () => {
    await runOnce();
  });
  logger.debug(`Next session sweep at ${job.nextRun()?.toISOString() ?? "never"}`);

  return {
    initial: runOnce(),
    stop: () => job.stop(),
  };
}
