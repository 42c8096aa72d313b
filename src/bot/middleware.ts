import type { MiddlewareFn } from "grammy";

import type { BotContext, BotServices } from "./types.js";

export const attachServices = (services: BotServices): MiddlewareFn<BotContext> => {
  return async (ctx, next) => {
    ctx.services = services;
    await next();
  };
};

/** Handles one update per user at a time, in arrival order. */
export const serializePerUser = (): MiddlewareFn<BotContext> => {
  return async (ctx, next) => {
    const userId = ctx.from?.id;
    if (!userId) {
      await next();
      return;
    }
    await ctx.services.queue.run(userId, () => next());
  };
};
