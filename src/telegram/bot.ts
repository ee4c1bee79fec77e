import { Bot } from "grammy";
import type { Config } from "../config.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { TaskStore } from "../queue/store.js";
import { AttachmentDownloader } from "./attachments.js";
import { handleNew, handleStart, handleStatus } from "./commands.js";
import { isAuthorized, isNewUpdate, recordUpdate } from "./inbound.js";
import { acceptMessage } from "./intake.js";

export function createBot(opts: { config: Config; store: TaskStore; logger: Logger }): Bot {
  const { config, store, logger } = opts;
  const bot = new Bot(config.telegramBotToken);
  const downloader = new AttachmentDownloader({
    botToken: config.telegramBotToken,
    workspaceDir: config.workspaceDir,
    uploadsSubdir: config.uploadsSubdir,
    api: { getFile: (fileId) => bot.api.getFile(fileId) },
  });

  // Inbound cursor: updates at or below the stored id were handled before a restart
  bot.use(async (ctx, next) => {
    const updateId = ctx.update.update_id;
    if (!isNewUpdate(store, updateId)) {
      logger.debug(`Skipping already handled update ${updateId}`);
      return;
    }
    try {
      await next();
    } finally {
      recordUpdate(store, updateId);
    }
  });

  // Access control middleware
  bot.use(async (ctx, next) => {
    const userId = ctx.from?.id;
    const chatId = ctx.chat?.id;
    if (userId === undefined || chatId === undefined) return;

    if (!isAuthorized(config, chatId, userId)) {
      logger.warn(`Unauthorized access attempt: chat=${chatId} user=${userId} (${ctx.from?.username ?? "unknown"})`);
      await ctx.reply("Unauthorized. Your user ID is not in the allowed list.");
      return;
    }

    await next();
  });

  bot.command("start", handleStart);
  bot.command("status", handleStatus(store));
  bot.command("new", handleNew(store));

  bot.on("message", async (ctx) => {
    const message = ctx.message;
    // Unknown commands are not tasks
    if (message.text?.startsWith("/")) return;

    let taskId: number | null;
    try {
      taskId = await acceptMessage(
        {
          enqueue: (task) => store.enqueue(task),
          downloadAll: (sources) => downloader.downloadAll(sources),
          logger,
        },
        ctx.chat.id,
        ctx.from,
        message,
      );
    } catch (err) {
      logger.error(`Failed to accept message in chat ${ctx.chat.id}: ${errorMessage(err)}`);
      await ctx.reply(`Could not accept the message: ${errorMessage(err)}`);
      return;
    }

    if (taskId !== null) {
      await ctx.reply(`Task accepted: #${taskId}`);
    }
  });

  bot.catch((err) => {
    logger.error(`Update ${err.ctx.update.update_id} failed: ${errorMessage(err.error)}`);
  });

  return bot;
}
