import { describe, it, expect } from "vitest";
import { buildPrompt, RISKY_ACTION_NOTE, SEND_FILES_NOTE } from "./prompt.js";

const base = { text: "", attachments: [], bootstrap: false, instructionsPath: "/srv/assistant/AGENTS.md" };

describe("buildPrompt", () => {
  it("uses plain text followed by the protocol notes", () => {
    expect(buildPrompt({ ...base, text: "  summarize today  " })).toBe(
      `summarize today\n\n${SEND_FILES_NOTE}\n\n${RISKY_ACTION_NOTE}`,
    );
  });

  it("lists attachments after the text", () => {
    const prompt = buildPrompt({ ...base, text: "what is this?", attachments: ["uploads/a.png", "uploads/b.pdf"] });
    expect(prompt).toBe(
      [
        "what is this?",
        "User attachments (server paths):\n- `uploads/a.png`\n- `uploads/b.pdf`",
        SEND_FILES_NOTE,
        RISKY_ACTION_NOTE,
      ].join("\n\n"),
    );
  });

  it("describes attachment-only messages", () => {
    const prompt = buildPrompt({ ...base, attachments: ["uploads/a.png"] });
    expect(prompt.startsWith("The user sent attachments without text.\n\nUser attachments (server paths):\n")).toBe(
      true,
    );
  });

  it("prefixes the instructions file on bootstrap", () => {
    const prompt = buildPrompt({ ...base, text: "hi", bootstrap: true });
    expect(prompt.startsWith("Before handling the request, open and read `/srv/assistant/AGENTS.md`.")).toBe(true);
    expect(prompt).toContain("\n\nhi\n\n");
  });

  it("is deterministic", () => {
    const input = { ...base, text: "same", attachments: ["x"] };
    expect(buildPrompt(input)).toBe(buildPrompt(input));
  });
});
