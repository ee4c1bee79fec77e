export type PromptInput = {
  text: string;
  /** Paths relative to the working root. */
  attachments: string[];
  /** First prompt of a new session. */
  bootstrap: boolean;
  instructionsPath: string;
};

export type PromptBuilder = (input: PromptInput) => string;

export const SEND_FILES_NOTE = [
  "If you need to send the user one or more files in Telegram, add separate lines at the END of your answer in the form:",
  "[[send-file:daily/2026-02-22.md]]",
  "[[send-file:topics/note.md]]",
  "One path per line, server paths only. Do not wrap these lines in a code block.",
].join("\n");

export const RISKY_ACTION_NOTE =
  "Before any risky action (deleting data, restarting services, mass edits) ask the user for explicit confirmation first.";

function bootstrapPrefix(instructionsPath: string): string {
  return `Before handling the request, open and read \`${instructionsPath}\`. Follow it as the main instructions for this session.\n\n`;
}

function attachmentsBlock(attachments: string[]): string {
  return ["User attachments (server paths):", ...attachments.map((p) => `- \`${p}\``)].join("\n");
}

export function buildPrompt({ text, attachments, bootstrap, instructionsPath }: PromptInput): string {
  const body = text.trim();
  const parts: string[] = [];

  if (body) {
    parts.push(body);
  } else if (attachments.length > 0) {
    parts.push("The user sent attachments without text.");
  }
  if (attachments.length > 0) parts.push(attachmentsBlock(attachments));
  parts.push(SEND_FILES_NOTE, RISKY_ACTION_NOTE);

  const prefix = bootstrap ? bootstrapPrefix(instructionsPath) : "";
  return prefix + parts.join("\n\n");
}
