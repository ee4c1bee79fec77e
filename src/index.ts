import { execFileSync } from "node:child_process";
import { config as loadEnv } from "dotenv";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { TaskStore } from "./queue/store.js";
import { RepoSync } from "./repo/git-sync.js";
import { AgentClient } from "./runner/agent-cli.js";
import { startSessionSweeps } from "./sessions/sweeper.js";
import { createBot } from "./telegram/bot.js";
import { TelegramChannel } from "./telegram/outbound.js";
import { buildPrompt } from "./worker/prompt.js";
import { Worker } from "./worker/worker.js";

loadEnv();

async function main() {
  const config = loadConfig();
  const logger = createLogger("gateway", config.logLevel);
  const init = logger.child("init");

  init.info("Starting assistant gateway...");
  init.info(`Working root: ${config.workspaceDir}`);
  init.info(`State database: ${config.stateDbPath}`);
  init.info(`Model: ${config.agentModel || "(CLI default)"}`);
  init.info(`Allowed users: ${config.allowedUsers.length > 0 ? config.allowedUsers.join(", ") : "(all)"}`);
  init.info(`Allowed chats: ${config.allowedChats.length > 0 ? config.allowedChats.join(", ") : "(all)"}`);

  // Verify the agent CLI is accessible
  try {
    const version = execFileSync(config.agentBin, ["--version"], { timeout: 10_000, encoding: "utf-8" }).trim();
    init.info(`Agent CLI: ${version}`);
  } catch (err) {
    init.error(`Failed to run '${config.agentBin} --version'. Is the CLI installed and on PATH?`);
    init.error(errorMessage(err));
    process.exit(1);
  }

  const store = new TaskStore(config.stateDbPath, logger.child("queue"));
  const counts = store.counts();
  if (counts.running > 0) {
    init.warn(`${counts.running} task(s) were left running by a previous process and will not be resumed`);
  }

  const agent = new AgentClient(
    {
      bin: config.agentBin,
      workspaceDir: config.workspaceDir,
      model: config.agentModel,
      extraArgs: config.agentExtraArgs,
      timeoutMs: config.agentTimeoutMs,
    },
    logger.child("runner"),
  );

  const repo = new RepoSync(
    {
      workspaceDir: config.workspaceDir,
      autoCommit: config.autoCommit,
      autoPush: config.autoPush,
      autoPushHourUtc: config.autoPushHourUtc,
      gitUserName: config.gitUserName,
      gitUserEmail: config.gitUserEmail,
      commitTemplate: config.gitCommitTemplate,
    },
    logger.child("git"),
  );

  const bot = createBot({ config, store, logger: logger.child("telegram") });

  const worker = new Worker({
    store,
    agent,
    channel: new TelegramChannel(bot.api),
    repo,
    buildPrompt,
    settings: {
      workspaceDir: config.workspaceDir,
      idleSleepMs: config.idleSleepMs,
      agentTimeoutMs: config.agentTimeoutMs,
      maxResultChars: config.maxResultChars,
      maxSendFileBytes: config.maxSendFileBytes,
      instructionsPath: config.instructionsPath,
    },
    logger: logger.child("worker"),
  });

  const sweeps = startSessionSweeps({
    sessionsDir: config.sessionsDir,
    olderThanDays: config.sessionRetentionDays,
    cron: config.sessionGcCron,
    retain: () => store.listChatSessionIds(),
    logger: logger.child("sessions"),
  });

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string, exitCode = 0) => {
    if (shuttingDown) return;
    shuttingDown = true;
    const log = logger.child("shutdown");
    log.info(`Received ${signal}, shutting down...`);

    sweeps.stop();
    // Stop intake first, then let the current task finish
    await bot.stop();
    await worker.stop();
    store.close();

    log.info("Done.");
    process.exit(exitCode);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  worker.start().catch((err) => {
    logger.error(`Worker crashed: ${errorMessage(err)}`);
    void shutdown("worker failure", 1);
  });

  init.info("Bot starting...");
  await bot.start({
    allowed_updates: ["message"],
    onStart: (botInfo) => {
      init.info(`Bot @${botInfo.username} is running!`);
    },
  });
}

main().catch((err) => {
  console.error("[fatal]", err);
  process.exit(1);
});
