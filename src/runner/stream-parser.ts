/**
 * Parse NDJSON output from `codex exec --json`.
 *
 * Each line is a JSON object. We extract:
 * - session id (from the first "thread.started" event)
 * - agent text (from "item.completed" events whose item is an agent_message)
 *
 * Lines that are not JSON objects are kept as raw diagnostics.
 */

export type AgentEvent =
  | { type: "session"; sessionId: string }
  | { type: "message"; text: string }
  | { type: "ignored" }
  | { type: "raw"; line: string };

export type AssembledStream = {
  /** First announced session id, or "" when none was announced. */
  sessionId: string;
  /** Last agent message, or "" when the agent produced none. */
  message: string;
  /** Non-empty lines that were not JSON objects, in order. */
  rawLines: string[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Returns null for blank lines. */
export function parseEventLine(line: string): AgentEvent | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return { type: "raw", line: trimmed };
  }
  if (!isRecord(parsed)) return { type: "raw", line: trimmed };

  if (parsed.type === "thread.started") {
    const id = typeof parsed.thread_id === "string" ? parsed.thread_id.trim() : "";
    return id ? { type: "session", sessionId: id } : { type: "ignored" };
  }

  if (parsed.type === "item.completed" && isRecord(parsed.item)) {
    const item = parsed.item;
    // Reasoning, command and file-change items carry no answer text.
    // An empty final message still replaces earlier drafts.
    if (item.type === "agent_message" && typeof item.text === "string") {
      return { type: "message", text: item.text.trim() };
    }
  }

  return { type: "ignored" };
}

/** Split captured output into non-empty lines that are not JSON objects. */
export function diagnosticLines(output: string): string[] {
  const lines: string[] = [];
  for (const line of output.split(/\r?\n/)) {
    const event = parseEventLine(line);
    if (event?.type === "raw") lines.push(event.line);
  }
  return lines;
}

/**
 * Fold a complete stdout capture into the session id, the final message and
 * the raw diagnostic lines.
 */
export function assembleEventStream(stdout: string): AssembledStream {
  let sessionId = "";
  let message = "";
  const rawLines: string[] = [];

  for (const line of stdout.split(/\r?\n/)) {
    const event = parseEventLine(line);
    if (!event) continue;
    switch (event.type) {
      case "session":
        if (!sessionId) sessionId = event.sessionId;
        break;
      case "message":
        message = event.text;
        break;
      case "raw":
        rawLines.push(event.line);
        break;
      case "ignored":
        break;
    }
  }

  return { sessionId, message, rawLines };
}
