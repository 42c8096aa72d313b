import { Bot } from "grammy";

import { attachServices, serializePerUser } from "./middleware.js";
import { registerCallbacks } from "./callbacks.js";
import { actorOf, registerCommands } from "./commands.js";
import { handleText } from "./inputFlow.js";
import { homeScreen, postScreen, rejectInput } from "./presenter.js";
import { logger } from "../logger.js";
import type { Actor, BotContext, BotServices } from "./types.js";

/** Runs a message handler, posting the home screen again if it throws. */
const guarded = async (ctx: BotContext, actor: Actor, run: () => Promise<void>): Promise<void> => {
  try {
    await run();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error("Message handling failed", { chatId: actor.chatId, userId: actor.userId, message });
    const screen = await homeScreen(ctx.services, actor);
    await postScreen(ctx.services, actor, { ...screen, text: `❌ Something went wrong.\n\n${screen.text}` });
  }
};

export const createTelegramBot = (token: string, services: BotServices): Bot<BotContext> => {
  const bot = new Bot<BotContext>(token);
  bot.use(attachServices(services));
  bot.use(serializePerUser());
  registerCommands(bot);
  registerCallbacks(bot);

  bot.on("message:text", async (ctx) => {
    const actor = actorOf(ctx);
    if (!actor) return;

    logger.debug("Incoming telegram message", {
      chatId: actor.chatId,
      userId: actor.userId,
      textLength: ctx.message.text.length,
    });

    await guarded(ctx, actor, () => handleText(ctx.services, actor, ctx.message.text, ctx.message.message_id));
  });

  bot.on("message", async (ctx) => {
    const actor = actorOf(ctx);
    if (!actor) return;
    logger.debug("Unsupported message", { chatId: actor.chatId, userId: actor.userId });
    await guarded(ctx, actor, async () => {
      await rejectInput(ctx.services, actor, ctx.message.message_id, "unsupported_media");
    });
  });

  bot.catch((error) => {
    const message = error.error instanceof Error ? error.error.message : String(error.error);
    logger.error("Unhandled bot error", { updateId: error.ctx.update.update_id, message });
  });

  return bot;
};
