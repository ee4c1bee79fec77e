import { spawn, type ChildProcess } from "node:child_process";
import { StringDecoder } from "node:string_decoder";
import { ExecutionTimeoutError, ProcessLaunchError, errorCode, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { assembleEventStream, diagnosticLines, parseEventLine } from "./stream-parser.js";

/** How many trailing diagnostic lines of each stream are surfaced. */
export const DIAGNOSTIC_TAIL_LINES = 20;

/** Grace period between SIGTERM and SIGKILL once a run has timed out. */
export const KILL_GRACE_MS = 5_000;

export const EMPTY_ANSWER_MESSAGE = "The agent finished without a text answer.";
export const FAILURE_HEADER = "Agent CLI request failed.";

export type AgentFailure = "launch" | "timeout" | "exit";

export type AgentRunResult = {
  success: boolean;
  message: string;
  /** Session id to resume next time, or "" when unknown. */
  sessionId: string;
  failure?: AgentFailure;
};

export type AgentRunOptions = {
  /** Resume this session; empty or absent starts a fresh one. */
  sessionId?: string;
  timeoutMs?: number;
};

/** What the worker needs from an agent. */
export interface AgentRunner {
  run(prompt: string, opts?: AgentRunOptions): Promise<AgentRunResult>;
}

export type AgentClientOptions = {
  bin: string;
  workspaceDir: string;
  /** Empty means the CLI's default model. */
  model: string;
  extraArgs: string[];
  timeoutMs: number;
};

export type CompletedRun = {
  exitCode: number | null;
  signal?: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  priorSessionId: string;
};

function tail<T>(items: T[], count: number): T[] {
  return items.length > count ? items.slice(items.length - count) : items;
}

/**
 * Classify a finished process run. Pure; exposed for tests.
 */
export function summarizeRun(run: CompletedRun): AgentRunResult {
  const stream = assembleEventStream(run.stdout);
  const sessionId = stream.sessionId || run.priorSessionId;
  const diagnostics = [
    ...tail(diagnosticLines(run.stderr), DIAGNOSTIC_TAIL_LINES),
    ...tail(stream.rawLines, DIAGNOSTIC_TAIL_LINES),
  ];

  if (run.exitCode === 0) {
    const message = stream.message || diagnostics.join("\n") || EMPTY_ANSWER_MESSAGE;
    return { success: true, message, sessionId };
  }

  const exit = run.exitCode ?? run.signal ?? "unknown";
  const message =
    diagnostics.length > 0
      ? `${FAILURE_HEADER}\n${diagnostics.join("\n")}`
      : `Agent CLI request failed (exit code ${exit}).`;
  return { success: false, message, sessionId, failure: "exit" };
}

/**
 * Runs the agent CLI once per prompt and resumes sessions by id.
 */
export class AgentClient implements AgentRunner {
  private readonly opts: AgentClientOptions;
  private readonly logger: Logger;

  constructor(opts: AgentClientOptions, logger: Logger) {
    this.opts = opts;
    this.logger = logger;
  }

  buildArgs(prompt: string, sessionId = ""): string[] {
    const args = ["exec", "--json", "--skip-git-repo-check", "--cd", this.opts.workspaceDir];
    if (this.opts.model) args.push("-m", this.opts.model);
    args.push(...this.opts.extraArgs);
    if (sessionId) args.push("resume", sessionId);
    args.push(prompt);
    return args;
  }

  run(prompt: string, runOpts: AgentRunOptions = {}): Promise<AgentRunResult> {
    const priorSessionId = runOpts.sessionId?.trim() ?? "";
    const timeoutMs = runOpts.timeoutMs ?? this.opts.timeoutMs;
    const args = this.buildArgs(prompt, priorSessionId);

    // The child has no business with our bot token.
    const env = { ...process.env };
    delete env.TELEGRAM_BOT_TOKEN;

    this.logger.info(priorSessionId ? `Resuming session ${priorSessionId}` : "Starting a fresh session");

    return new Promise((resolve) => {
      const proc = spawn(this.opts.bin, args, {
        cwd: this.opts.workspaceDir,
        env,
        stdio: ["ignore", "pipe", "pipe"],
        detached: true, // own process group, so a timeout can take the whole tree down
      });

      // Multibyte characters can straddle pipe reads.
      const stdoutDecoder = new StringDecoder("utf8");
      const stderrDecoder = new StringDecoder("utf8");
      let stdout = "";
      let stderr = "";
      let lineBuffer = "";
      let announcedSessionId = "";
      let timedOut = false;
      let killTimer: NodeJS.Timeout | undefined;
      let settled = false;

      const settle = (result: AgentRunResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        clearTimeout(killTimer);
        resolve(result);
      };

      // The run only settles on close, so no agent outlives its task.
      const timer = setTimeout(() => {
        timedOut = true;
        this.logger.warn(new ExecutionTimeoutError(timeoutMs).message);
        this.terminate(proc, "SIGTERM");
        killTimer = setTimeout(() => {
          this.logger.warn(`Agent ignored SIGTERM for ${KILL_GRACE_MS}ms, sending SIGKILL`);
          this.terminate(proc, "SIGKILL");
        }, KILL_GRACE_MS);
      }, timeoutMs);

      const scanLine = (line: string) => {
        const event = parseEventLine(line);
        if (event?.type === "session" && !announcedSessionId) {
          announcedSessionId = event.sessionId;
          this.logger.debug(`Agent announced session ${announcedSessionId}`);
        }
      };

      const onStdout = (data: string) => {
        stdout += data;
        lineBuffer += data;
        const lines = lineBuffer.split("\n");
        lineBuffer = lines.pop() ?? "";
        for (const line of lines) scanLine(line);
      };

      proc.stdout.on("data", (chunk: Buffer) => onStdout(stdoutDecoder.write(chunk)));

      proc.stderr.on("data", (chunk: Buffer) => {
        stderr += stderrDecoder.write(chunk);
      });

      proc.on("error", (err) => {
        if (settled) return;
        const message =
          errorCode(err) === "ENOENT"
            ? new ProcessLaunchError(this.opts.bin, { cause: err }).message
            : `Failed to run agent: ${errorMessage(err)}`;
        this.logger.error(message);
        settle({ success: false, message, sessionId: "", failure: "launch" });
      });

      proc.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
        if (settled) return;
        onStdout(stdoutDecoder.end());
        stderr += stderrDecoder.end();
        if (lineBuffer.trim()) scanLine(lineBuffer);

        if (timedOut) {
          settle({
            success: false,
            message: new ExecutionTimeoutError(timeoutMs).message,
            sessionId: announcedSessionId || priorSessionId,
            failure: "timeout",
          });
          return;
        }

        const result = summarizeRun({ exitCode: code, signal, stdout, stderr, priorSessionId });
        if (!result.success) {
          this.logger.warn(`Agent exited with code ${code ?? signal ?? "unknown"}`);
        }
        settle(result);
      });
    });
  }

  private terminate(proc: ChildProcess, signal: NodeJS.Signals): void {
    try {
      if (proc.pid !== undefined) {
        process.kill(-proc.pid, signal);
        return;
      }
    } catch (err) {
      this.logger.debug(`Process group kill failed: ${errorMessage(err)}`);
    }
    proc.kill(signal);
  }
}
