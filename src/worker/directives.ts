import fs from "node:fs/promises";
import path from "node:path";
import { FileTransferError, errorCode } from "../errors.js";

export const TRUNCATION_MARKER = "\n\n[truncated]";

const SEND_FILE_LINE = /^\s*\[\[send-file:(.*)\]\]\s*$/;
const WRAPPING_QUOTES = /^["'`]+|["'`]+$/g;

export type ParsedResponse = {
  /** Visible text with directive lines removed. */
  text: string;
  /** Requested paths, deduplicated, in first-seen order. */
  files: string[];
};

export type OutboundFile = {
  /** Path as the agent wrote it. */
  requestedPath: string;
  absolutePath: string;
  /** Path relative to the working root. */
  relativePath: string;
  size: number;
};

/**
 * Pull `[[send-file:<path>]]` lines out of an agent answer.
 */
export function parseAgentResponse(response: string): ParsedResponse {
  const kept: string[] = [];
  const files: string[] = [];
  const seen = new Set<string>();

  for (const line of response.split(/\r?\n/)) {
    const match = SEND_FILE_LINE.exec(line);
    if (!match) {
      kept.push(line);
      continue;
    }
    const requested = match[1].trim().replace(WRAPPING_QUOTES, "").trim();
    if (requested && !seen.has(requested)) {
      seen.add(requested);
      files.push(requested);
    }
  }

  const text = kept
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
  return { text, files };
}

/**
 * Trim `text` and cap it at `limit` characters, marking the cut.
 */
export function trimText(text: string, limit: number): string {
  const clean = text.trim();
  if (clean.length <= limit) return clean;
  const room = Math.max(0, limit - TRUNCATION_MARKER.length);
  return clean.slice(0, room).trimEnd() + TRUNCATION_MARKER;
}

function isInside(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

/**
 * Resolve a requested path against the working root and check it can be sent.
 * Throws FileTransferError with a reason the user can read.
 */
export async function resolveOutboundFile(root: string, requested: string, maxBytes: number): Promise<OutboundFile> {
  const rootPath = path.resolve(root);
  const candidate = path.resolve(rootPath, requested);
  if (!isInside(rootPath, candidate)) {
    throw new FileTransferError(requested, "outside the working directory");
  }

  let realPath: string;
  try {
    realPath = await fs.realpath(candidate);
  } catch (err) {
    if (errorCode(err) === "ENOENT") throw new FileTransferError(requested, "file not found", { cause: err });
    throw new FileTransferError(requested, "cannot be resolved", { cause: err });
  }
  const realRoot = await fs.realpath(rootPath);
  if (!isInside(realRoot, realPath)) {
    throw new FileTransferError(requested, "outside the working directory");
  }

  const stats = await fs.stat(realPath);
  if (!stats.isFile()) {
    throw new FileTransferError(requested, "not a regular file");
  }
  if (stats.size > maxBytes) {
    throw new FileTransferError(requested, `file too large (${stats.size} bytes, limit ${maxBytes})`);
  }

  return {
    requestedPath: requested,
    absolutePath: realPath,
    relativePath: path.relative(realRoot, realPath),
    size: stats.size,
  };
}
