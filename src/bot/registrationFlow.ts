import { logger } from "../logger.js";
import { postScreen, presentScreen, rejectInput, transitionTo } from "./presenter.js";
import {
  registrationDoneScreen,
  wizardGroupsScreen,
  wizardNameScreen,
  wizardPositionScreen,
  wizardScreenFor,
} from "./screens.js";
import type { Actor, BotServices } from "./types.js";

const log = logger.child("registration");

export type CallbackReply = { text: string; alert?: boolean } | null;

/** Starts the wizard, or shows the step an unfinished one is at. */
export const beginRegistration = async (
  services: BotServices,
  actor: Actor,
  menuMessageId?: number,
): Promise<void> => {
  const state = services.wizard.start(actor.chatId);
  const scope = await services.access.resolveScope(actor.userId);
  log.info("Registration shown", { chatId: actor.chatId, step: state.step });
  await presentScreen(services, actor, wizardScreenFor(scope, state), menuMessageId);
};

/** Starts the wizard over from the name step. Registered users are left alone. */
export const restartRegistration = async (
  services: BotServices,
  actor: Actor,
  menuMessageId?: number,
): Promise<CallbackReply> => {
  if ((await services.access.getRole(actor.userId)) !== "unregistered") {
    return { text: "✅ You are already registered" };
  }
  services.wizard.reset(actor.chatId);
  services.wizard.start(actor.chatId);
  const scope = await services.access.resolveScope(actor.userId);
  const screen = wizardNameScreen(scope);
  await presentScreen(
    services,
    actor,
    { ...screen, text: `🔄 *Registration reset*\n\n${screen.text}` },
    menuMessageId,
  );
  return { text: "🔄 Registration reset" };
};

export const toggleRegistrationGroup = async (
  services: BotServices,
  actor: Actor,
  group: string,
  menuMessageId: number,
): Promise<CallbackReply> => {
  const scope = await services.access.resolveScope(actor.userId);
  if (!scope.allGroups.includes(group)) {
    return { text: "Unknown group", alert: true };
  }
  const result = services.wizard.toggleGroup(actor.chatId, group);
  if (!result.ok) {
    return { text: "⚠️ This step is no longer active", alert: true };
  }
  const state = services.wizard.get(actor.chatId);
  if (state) {
    await presentScreen(services, actor, wizardGroupsScreen(scope, state), menuMessageId);
  }
  return { text: `Group ${group} ${result.selected ? "added" : "removed"}` };
};

export const finishRegistrationGroups = async (
  services: BotServices,
  actor: Actor,
  menuMessageId: number,
): Promise<CallbackReply> => {
  const result = services.wizard.finishGroups(actor.chatId);
  if (!result.ok) {
    return result.reason === "empty_selection"
      ? { text: "❌ Pick at least one group", alert: true }
      : { text: "⚠️ This step is no longer active", alert: true };
  }
  const state = services.wizard.get(actor.chatId);
  if (state) {
    const scope = await services.access.resolveScope(actor.userId);
    await presentScreen(services, actor, wizardPositionScreen(scope, state), menuMessageId);
  }
  return null;
};

/** Saves the finished wizard and turns the live menu into the main menu. */
export const completeRegistration = async (services: BotServices, actor: Actor): Promise<void> => {
  const outcome = services.wizard.consumeCompleted(actor.chatId);
  if (!outcome) return;

  try {
    const record = await services.admins.register(actor.userId, outcome);
    const scope = await services.access.resolveScope(actor.userId);
    log.info("Registration completed", { chatId: actor.chatId, groups: record.groups.length });
    await transitionTo(services, actor, registrationDoneScreen(scope, record));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error("Failed to save registration", { chatId: actor.chatId, message });
    const scope = await services.access.resolveScope(actor.userId);
    const screen = wizardNameScreen(scope);
    services.wizard.start(actor.chatId);
    await postScreen(services, actor, {
      ...screen,
      text: `❌ *Could not save the registration.* Please try again.\n\n${screen.text}`,
    });
  }
};

/** Text typed while the wizard is running. */
export const handleRegistrationText = async (
  services: BotServices,
  actor: Actor,
  text: string,
  messageId: number,
): Promise<void> => {
  const step = services.wizard.stepOf(actor.chatId);
  switch (step) {
    case "name": {
      const result = services.wizard.submitName(actor.chatId, text);
      if (!result.ok) {
        await rejectInput(services, actor, messageId, "invalid_name", "Invalid full name");
        return;
      }
      await services.messenger.deleteMessage(actor.chatId, messageId);
      const state = services.wizard.get(actor.chatId);
      if (!state) return;
      const scope = await services.access.resolveScope(actor.userId);
      await transitionTo(services, actor, wizardGroupsScreen(scope, state));
      return;
    }
    case "position": {
      const result = services.wizard.submitPosition(actor.chatId, text);
      if (!result.ok) {
        await rejectInput(services, actor, messageId, "invalid_position", "Invalid job title");
        return;
      }
      await services.messenger.deleteMessage(actor.chatId, messageId);
      await completeRegistration(services, actor);
      return;
    }
    case "completed":
      await services.messenger.deleteMessage(actor.chatId, messageId);
      await completeRegistration(services, actor);
      return;
    case "groups":
    case "not_started":
      await rejectInput(services, actor, messageId, "free_text");
      return;
  }
};
