import { logger } from "../logger.js";
import { checkInput } from "../validators.js";
import { rejectInput } from "./presenter.js";
import { handleRegistrationText } from "./registrationFlow.js";
import { handleThresholdText } from "./thresholdFlow.js";
import type { Actor, BotServices } from "./types.js";

const log = logger.child("input");

/**
 * Routes a typed message: a pending threshold prompt first, then the
 * registration wizard; anything else is unsupported free text.
 */
export const handleText = async (
  services: BotServices,
  actor: Actor,
  text: string,
  messageId: number,
): Promise<void> => {
  const issue = checkInput(text, services.maxMessageLength);
  if (issue) {
    log.info("Inbound text rejected", { chatId: actor.chatId, issue, length: text.length });
    await rejectInput(services, actor, messageId, issue);
    return;
  }

  const request = services.pending.getPending(actor.userId);
  if (request) {
    await handleThresholdText(services, actor, request, text.trim(), messageId);
    return;
  }

  if (services.wizard.isActive(actor.chatId)) {
    await handleRegistrationText(services, actor, text, messageId);
    return;
  }

  await rejectInput(services, actor, messageId, "free_text");
};
