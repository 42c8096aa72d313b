import type { Bot } from "grammy";

import { logger } from "../logger.js";
import { mainScreen, helpScreen, wizardScreenFor } from "./screens.js";
import { postScreen } from "./presenter.js";
import { beginRegistration, restartRegistration } from "./registrationFlow.js";
import type { Actor, BotContext } from "./types.js";

export const actorOf = (ctx: BotContext): Actor | null => {
  const userId = ctx.from?.id;
  const chatId = ctx.chat?.id;
  if (!userId || !chatId) return null;
  return { userId, chatId };
};

const requireActor = async (ctx: BotContext): Promise<Actor | null> => {
  const actor = actorOf(ctx);
  if (!actor) {
    await ctx.reply("Could not identify the chat.");
    return null;
  }
  return actor;
};

/**
 * Re-posts the current wizard step when registration is unfinished. Returns
 * true when the command must stop there.
 */
export const guardRegistration = async (ctx: BotContext, actor: Actor): Promise<boolean> => {
  const { services } = ctx;
  const state = services.wizard.get(actor.chatId);
  if (!state) return false;
  const scope = await services.access.resolveScope(actor.userId);
  const screen = wizardScreenFor(scope, state);
  await postScreen(services, actor, { ...screen, text: `⚠️ Finish the registration first.\n\n${screen.text}` });
  return true;
};

export const registerCommands = (bot: Bot<BotContext>): void => {
  bot.command("start", async (ctx) => {
    const actor = await requireActor(ctx);
    if (!actor) return;
    const { services } = ctx;
    services.pending.clearPending(actor.userId);

    const role = await services.access.getRole(actor.userId);
    logger.info("Start command", { chatId: actor.chatId, role });
    if (role === "unregistered") {
      await beginRegistration(services, actor);
      return;
    }
    services.wizard.reset(actor.chatId);
    const scope = await services.access.resolveScope(actor.userId);
    await postScreen(services, actor, mainScreen(scope));
  });

  bot.command("menu", async (ctx) => {
    const actor = await requireActor(ctx);
    if (!actor) return;
    if (await guardRegistration(ctx, actor)) return;
    ctx.services.pending.clearPending(actor.userId);
    const scope = await ctx.services.access.resolveScope(actor.userId);
    await postScreen(ctx.services, actor, mainScreen(scope));
  });

  bot.command("help", async (ctx) => {
    const actor = await requireActor(ctx);
    if (!actor) return;
    if (await guardRegistration(ctx, actor)) return;
    ctx.services.pending.clearPending(actor.userId);
    const scope = await ctx.services.access.resolveScope(actor.userId);
    await postScreen(ctx.services, actor, helpScreen(scope));
  });

  bot.command(["reset", "cancel"], async (ctx) => {
    const actor = await requireActor(ctx);
    if (!actor) return;
    const { services } = ctx;
    services.pending.clearPending(actor.userId);
    const role = await services.access.getRole(actor.userId);
    if (role === "unregistered") {
      await restartRegistration(services, actor);
      return;
    }
    services.wizard.reset(actor.chatId);
    const scope = await services.access.resolveScope(actor.userId);
    await postScreen(services, actor, mainScreen(scope, "🔄 Cancelled."));
  });
};

export const botCommandList = [
  { command: "start", description: "Start the bot" },
  { command: "menu", description: "Main menu" },
  { command: "help", description: "Help" },
  { command: "reset", description: "Cancel the current action" },
];
