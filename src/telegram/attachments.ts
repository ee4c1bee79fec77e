import fs from "node:fs/promises";
import path from "node:path";
import { errorCode } from "../errors.js";

const MAX_UNIQUE_ATTEMPTS = 1000;

export type FileSource = {
  fileId: string;
  /** Name hint for the stored file, e.g. the document's original name. */
  nameHint: string;
};

/** The part of the Bot API needed to locate a file. */
export type FileLocator = {
  getFile(fileId: string): Promise<{ file_path?: string }>;
};

export type AttachmentDownloaderOptions = {
  botToken: string;
  workspaceDir: string;
  uploadsSubdir: string;
  api: FileLocator;
  fetchImpl?: typeof fetch;
  now?: () => Date;
};

/** Lower-case ASCII slug; falls back when nothing usable remains. */
export function slugify(text: string, fallback = "file", maxLen = 64): string {
  const cleaned = text
    .normalize("NFKD")
    .replace(/[^\x00-\x7f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return (cleaned || fallback).slice(0, maxLen);
}

/** YYYYMMDD-HHMMSS in UTC. */
export function timestampPrefix(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, "")}-${iso.slice(11, 19).replace(/:/g, "")}`;
}

async function writeUnique(dir: string, fileName: string, data: Buffer): Promise<string> {
  const ext = path.extname(fileName);
  const stem = fileName.slice(0, fileName.length - ext.length);
  for (let i = 0; i < MAX_UNIQUE_ATTEMPTS; i++) {
    const candidate = path.join(dir, i === 0 ? fileName : `${stem}-${i}${ext}`);
    try {
      await fs.writeFile(candidate, data, { flag: "wx" });
      return candidate;
    } catch (err) {
      if (errorCode(err) !== "EEXIST") throw err;
    }
  }
  throw new Error(`Failed to allocate a unique path for ${fileName}`);
}

/**
 * Saves Telegram attachments under the working root so the agent can read
 * them. Returned paths are relative to the root, with forward slashes.
 */
export class AttachmentDownloader {
  private readonly opts: AttachmentDownloaderOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;

  constructor(opts: AttachmentDownloaderOptions) {
    this.opts = opts;
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.now = opts.now ?? (() => new Date());
  }

  async download(source: FileSource): Promise<string> {
    const file = await this.opts.api.getFile(source.fileId);
    const remotePath = file.file_path;
    if (!remotePath) {
      throw new Error("Telegram getFile returned no file_path");
    }

    const res = await this.fetchImpl(`https://api.telegram.org/file/bot${this.opts.botToken}/${remotePath}`);
    if (!res.ok) {
      throw new Error(`Telegram file download failed: ${res.status}`);
    }
    const data = Buffer.from(await res.arrayBuffer());

    const hintExt = path.extname(source.nameHint);
    const ext = (path.extname(remotePath) || hintExt || ".bin").toLowerCase();
    const stem = slugify(path.basename(source.nameHint, hintExt));
    const fileName = `${timestampPrefix(this.now())}-${stem}${ext}`;

    const dir = path.join(this.opts.workspaceDir, this.opts.uploadsSubdir);
    await fs.mkdir(dir, { recursive: true });
    const saved = await writeUnique(dir, fileName, data);
    return path.relative(this.opts.workspaceDir, saved).split(path.sep).join("/");
  }

  async downloadAll(sources: FileSource[]): Promise<string[]> {
    const paths: string[] = [];
    for (const source of sources) {
      paths.push(await this.download(source));
    }
    return paths;
  }
}
