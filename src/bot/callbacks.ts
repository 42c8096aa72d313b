import type { Bot } from "grammy";

import type { MenuScope } from "../auth/types.js";
import { logger } from "../logger.js";
import { callbackData, callbackPatterns, isWizardCallback } from "../menu/callbackData.js";
import { isHelpSection } from "../menu/keyboards.js";
import { ALL_DEVICES, SYSTEM_GROUPS, USER_GROUPS } from "../state/thresholdContext.js";
import { actorOf } from "./commands.js";
import { postScreen, presentScreen } from "./presenter.js";
import {
  beginRegistration,
  finishRegistrationGroups,
  restartRegistration,
  toggleRegistrationGroup,
  type CallbackReply,
} from "./registrationFlow.js";
import {
  adminListScreen,
  allDataScreen,
  groupInfoScreen,
  groupListScreen,
  helpScreen,
  helpSectionScreen,
  mainScreen,
  myDataScreen,
  statsScreen,
  thresholdDevicesScreen,
  thresholdGroupsScreen,
  type Screen,
} from "./screens.js";
import { openThresholdPrompt } from "./thresholdFlow.js";
import type { Actor, BotContext, BotServices } from "./types.js";

const log = logger.child("callbacks");

type CallbackHandler = (ctx: BotContext, actor: Actor, messageId: number) => Promise<CallbackReply>;

const NO_ACCESS: CallbackReply = { text: "⛔ No access to this group", alert: true };
const SUPERADMIN_ONLY: CallbackReply = { text: "⛔ Superadmins only", alert: true };

const matched = (ctx: BotContext, index: number): string | null =>
  typeof ctx.match === "object" ? ctx.match[index] ?? null : null;

/**
 * Wraps a button handler: resolves who tapped which message, answers the
 * callback query exactly once, and falls back to a fresh main menu when the
 * handler throws.
 */
const handle = (name: string, handler: CallbackHandler) => async (ctx: BotContext): Promise<void> => {
  const actor = actorOf(ctx);
  const messageId = ctx.callbackQuery?.message?.message_id;
  if (!actor || messageId === undefined) {
    await ctx.answerCallbackQuery();
    return;
  }

  let reply: CallbackReply;
  try {
    reply = await handler(ctx, actor, messageId);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error("Callback failed", { name, userId: actor.userId, message });
    await ctx.answerCallbackQuery({ text: "❌ Something went wrong", show_alert: true });
    const scope = await ctx.services.access.resolveScope(actor.userId);
    await postScreen(ctx.services, actor, mainScreen(scope));
    return;
  }

  await ctx.answerCallbackQuery(reply ? { text: reply.text, show_alert: reply.alert ?? false } : undefined);
};

const show = async (
  ctx: BotContext,
  actor: Actor,
  messageId: number,
  build: (scope: MenuScope) => Screen,
): Promise<CallbackReply> => {
  const scope = await ctx.services.access.resolveScope(actor.userId);
  await presentScreen(ctx.services, actor, build(scope), messageId);
  return null;
};

/**
 * While the wizard runs only its own buttons work, and unregistered users get
 * nothing but the registration entry. Returns the refusal, or null to go on.
 */
export const guardCallback = async (services: BotServices, actor: Actor, data: string): Promise<CallbackReply> => {
  if (data === callbackData.noop || isWizardCallback(data)) return null;
  if (services.wizard.isActive(actor.chatId)) {
    return { text: "⚠️ Finish the registration first", alert: true };
  }
  if ((await services.access.getRole(actor.userId)) === "unregistered") {
    return { text: "📝 Register first: /start", alert: true };
  }
  return null;
};

export const registerCallbacks = (bot: Bot<BotContext>): void => {
  bot.on("callback_query:data", async (ctx, next) => {
    const actor = actorOf(ctx);
    if (!actor) {
      await next();
      return;
    }
    const data = ctx.callbackQuery.data;
    const refusal = await guardCallback(ctx.services, actor, data);
    if (refusal) {
      log.debug("Callback refused", { chatId: actor.chatId, data });
      await ctx.answerCallbackQuery({ text: refusal.text, show_alert: refusal.alert ?? false });
      return;
    }
    if (data !== callbackData.noop) {
      ctx.services.pending.clearPending(actor.userId);
    }
    await next();
  });

  bot.callbackQuery(
    callbackData.main,
    handle("main", (ctx, actor, messageId) => show(ctx, actor, messageId, (scope) => mainScreen(scope))),
  );

  bot.callbackQuery(
    callbackData.help,
    handle("help", (ctx, actor, messageId) => show(ctx, actor, messageId, helpScreen)),
  );

  bot.callbackQuery(
    callbackPatterns.helpSection,
    handle("help_section", async (ctx, actor, messageId) => {
      const section = matched(ctx, 1);
      if (!section || !isHelpSection(section)) return { text: "Unknown topic" };
      return show(ctx, actor, messageId, (scope) => helpSectionScreen(scope, section));
    }),
  );

  bot.callbackQuery(
    callbackData.myData,
    handle("my_data", async (ctx, actor, messageId) => {
      const { services } = ctx;
      const [scope, record] = await Promise.all([
        services.access.resolveScope(actor.userId),
        services.admins.get(actor.userId),
      ]);
      const bands = Object.fromEntries(
        await Promise.all(
          scope.groups.map(async (group) => [group, await services.thresholds.get(group, ALL_DEVICES)] as const),
        ),
      );
      await presentScreen(services, actor, myDataScreen(scope, record, bands), messageId);
      return null;
    }),
  );

  bot.callbackQuery(
    callbackData.groups,
    handle("groups", (ctx, actor, messageId) => show(ctx, actor, messageId, groupListScreen)),
  );

  bot.callbackQuery(
    callbackData.allData,
    handle("all_data", (ctx, actor, messageId) => show(ctx, actor, messageId, allDataScreen)),
  );

  bot.callbackQuery(
    callbackPatterns.groupInfo,
    handle("group_info", async (ctx, actor, messageId) => {
      const { services } = ctx;
      const group = matched(ctx, 1);
      if (!group || !(await services.access.canAccessGroup(actor.userId, group))) return NO_ACCESS;
      const deviceKeys = await services.devices.devicesOf(group);
      const devices = await Promise.all(
        deviceKeys.map(async (deviceKey) => ({ deviceKey, band: await services.thresholds.get(group, deviceKey) })),
      );
      return show(ctx, actor, messageId, (scope) => groupInfoScreen(scope, group, devices));
    }),
  );

  bot.callbackQuery(
    callbackData.stats,
    handle("stats", async (ctx, actor, messageId) => {
      const { services } = ctx;
      const [admins, devicesByGroup] = await Promise.all([services.admins.list(), services.devices.devicesByGroup()]);
      const stats = {
        activeMenus: services.sessions.size(),
        menusByKind: services.sessions.kindStats(),
        registrations: services.wizard.stepStats(),
        pendingThresholds: services.pending.size(),
        admins: admins.length,
        devices: Object.values(devicesByGroup).reduce((sum, keys) => sum + keys.length, 0),
      };
      return show(ctx, actor, messageId, (scope) => statsScreen(scope, stats));
    }),
  );

  bot.callbackQuery(
    callbackData.admins,
    handle("admins", async (ctx, actor, messageId) => {
      const { services } = ctx;
      if (!services.access.isSuperadmin(actor.userId)) return SUPERADMIN_ONLY;
      const admins = await services.admins.list();
      return show(ctx, actor, messageId, (scope) => adminListScreen(scope, admins));
    }),
  );

  bot.callbackQuery(
    callbackData.thresholdGroups,
    handle("threshold_groups", (ctx, actor, messageId) => show(ctx, actor, messageId, thresholdGroupsScreen)),
  );

  bot.callbackQuery(
    callbackPatterns.thresholdGroup,
    handle("threshold_group", async (ctx, actor, messageId) => {
      const group = matched(ctx, 1);
      if (!group || !(await ctx.services.access.canAccessGroup(actor.userId, group))) return NO_ACCESS;
      return show(ctx, actor, messageId, (scope) => thresholdDevicesScreen(scope, group));
    }),
  );

  bot.callbackQuery(
    callbackPatterns.thresholdSet,
    handle("threshold_set", async (ctx, actor, messageId) => {
      const { services } = ctx;
      const group = matched(ctx, 1);
      const device = matched(ctx, 2);
      if (!group || !device || !(await services.access.canAccessGroup(actor.userId, group))) return NO_ACCESS;
      if (device === ALL_DEVICES) {
        await openThresholdPrompt(
          services,
          actor,
          { operation: "whole_group", groupKey: group, deviceKey: ALL_DEVICES },
          messageId,
        );
        return null;
      }
      if (!(await services.devices.hasDevice(group, device))) {
        return { text: "Unknown device", alert: true };
      }
      await openThresholdPrompt(
        services,
        actor,
        { operation: "single_device", groupKey: group, deviceKey: device },
        messageId,
      );
      return null;
    }),
  );

  bot.callbackQuery(
    callbackData.thresholdUser,
    handle("threshold_user", async (ctx, actor, messageId) => {
      const { services } = ctx;
      const groups = await services.access.accessibleGroups(actor.userId);
      if (groups.length === 0) return { text: "No groups assigned", alert: true };
      await openThresholdPrompt(
        services,
        actor,
        { operation: "all_user_groups", groupKey: USER_GROUPS, deviceKey: ALL_DEVICES },
        messageId,
      );
      return null;
    }),
  );

  bot.callbackQuery(
    callbackData.thresholdSystem,
    handle("threshold_system", async (ctx, actor, messageId) => {
      const { services } = ctx;
      if (!services.access.isSuperadmin(actor.userId)) return SUPERADMIN_ONLY;
      await openThresholdPrompt(
        services,
        actor,
        { operation: "all_system", groupKey: SYSTEM_GROUPS, deviceKey: ALL_DEVICES },
        messageId,
      );
      return null;
    }),
  );

  bot.callbackQuery(
    callbackData.regStart,
    handle("reg_start", async (ctx, actor, messageId) => {
      if ((await ctx.services.access.getRole(actor.userId)) !== "unregistered") {
        return { text: "✅ You are already registered" };
      }
      await beginRegistration(ctx.services, actor, messageId);
      return null;
    }),
  );

  bot.callbackQuery(
    callbackPatterns.regToggle,
    handle("reg_toggle", async (ctx, actor, messageId) => {
      const group = matched(ctx, 1);
      if (!group) return null;
      return toggleRegistrationGroup(ctx.services, actor, group, messageId);
    }),
  );

  bot.callbackQuery(
    callbackData.regFinish,
    handle("reg_finish", (ctx, actor, messageId) => finishRegistrationGroups(ctx.services, actor, messageId)),
  );

  bot.callbackQuery(
    callbackData.regNeedGroup,
    handle("reg_need", async () => ({ text: "❌ Pick at least one group", alert: true })),
  );

  bot.callbackQuery(
    callbackData.regReset,
    handle("reg_reset", (ctx, actor, messageId) => restartRegistration(ctx.services, actor, messageId)),
  );

  bot.callbackQuery(callbackData.noop, async (ctx) => {
    await ctx.answerCallbackQuery();
  });

  bot.on("callback_query:data", async (ctx) => {
    log.warn("Unknown callback", { userId: ctx.from.id, data: ctx.callbackQuery.data });
    await ctx.answerCallbackQuery({ text: "Unknown action" });
  });
};
