import { logger } from "../logger.js";
import { composeRejection, type InputIssue } from "../menu/feedback.js";
import type { SyncOutcome } from "../menu/synchronizer.js";
import { mainScreen, wizardScreenFor, type Screen } from "./screens.js";
import type { Actor, BotServices } from "./types.js";

const log = logger.child("presenter");

/** Sends `screen` as a new message and makes it the user's live menu. */
export const postScreen = async (services: BotServices, actor: Actor, screen: Screen): Promise<number> => {
  const messageId = await services.messenger.sendMessage(actor.chatId, screen.text, screen.controls);
  services.sessions.track(actor.userId, actor.chatId, messageId, screen.kind, screen.context);
  return messageId;
};

/**
 * Shows `screen` in place of the tapped menu message, or as a new message
 * when there is none or it can no longer be edited.
 */
export const presentScreen = async (
  services: BotServices,
  actor: Actor,
  screen: Screen,
  menuMessageId?: number,
): Promise<number> => {
  if (menuMessageId !== undefined) {
    const result = await services.messenger.editMessage(actor.chatId, menuMessageId, screen.text, screen.controls);
    if (result.status !== "failed") {
      services.sessions.track(actor.userId, actor.chatId, menuMessageId, screen.kind, screen.context);
      return menuMessageId;
    }
  }
  return postScreen(services, actor, screen);
};

/** Moves the live menu to `screen`; posts a new message if that is impossible. */
export const transitionTo = async (services: BotServices, actor: Actor, screen: Screen): Promise<SyncOutcome> => {
  const outcome = await services.menus.render({
    userId: actor.userId,
    event: { type: "transition", text: screen.text, kind: screen.kind, context: screen.context },
    controls: screen.controls,
  });
  if (!outcome.handled) {
    await postScreen(services, actor, screen);
  }
  return outcome;
};

/** Where a user lands when no live menu is left: the wizard step or the main menu. */
export const homeScreen = async (services: BotServices, actor: Actor): Promise<Screen> => {
  const scope = await services.access.resolveScope(actor.userId);
  const state = services.wizard.get(actor.chatId);
  return state ? wizardScreenFor(scope, state) : mainScreen(scope);
};

/**
 * Reports a rejected input in the live menu. The user's message is removed
 * first; without a live menu the home screen is posted carrying the error.
 */
export const rejectInput = async (
  services: BotServices,
  actor: Actor,
  userMessageId: number,
  issue: InputIssue,
  headline?: string,
): Promise<SyncOutcome> => {
  await services.messenger.deleteMessage(actor.chatId, userMessageId);

  const outcome = await services.menus.render({
    userId: actor.userId,
    event: { type: "rejected", issue, headline },
  });
  if (outcome.handled) return outcome;

  log.warn("Input rejected without a live menu", { userId: actor.userId, issue, reason: outcome.reason });
  const home = await homeScreen(services, actor);
  await postScreen(services, actor, { ...home, text: composeRejection(home.kind, home.context, issue, headline) });
  return outcome;
};
