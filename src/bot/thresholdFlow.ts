import { logger } from "../logger.js";
import type { ThresholdEditRequest } from "../state/thresholdContext.js";
import type { ThresholdTarget } from "../thresholds/thresholdService.js";
import { parseThresholdPair } from "../validators.js";
import { postScreen, presentScreen, rejectInput } from "./presenter.js";
import { thresholdPromptScreen, thresholdSavedText } from "./screens.js";
import type { Actor, BotServices } from "./types.js";

const log = logger.child("thresholds");

/**
 * Shows the "send min max" prompt and remembers what it is for. The pending
 * request points at the tapped message before any network call is made.
 */
export const openThresholdPrompt = async (
  services: BotServices,
  actor: Actor,
  target: ThresholdTarget,
  menuMessageId: number,
): Promise<void> => {
  services.pending.setPending(
    actor.userId,
    actor.chatId,
    menuMessageId,
    target.operation,
    target.groupKey,
    target.deviceKey,
  );

  const [scope, current] = await Promise.all([
    services.access.resolveScope(actor.userId),
    services.thresholds.get(target.groupKey, target.deviceKey),
  ]);
  const shownIn = await presentScreen(services, actor, thresholdPromptScreen(scope, target, current), menuMessageId);

  if (shownIn !== menuMessageId) {
    services.pending.setPending(
      actor.userId,
      actor.chatId,
      shownIn,
      target.operation,
      target.groupKey,
      target.deviceKey,
    );
  }
  log.debug("Threshold prompt opened", { userId: actor.userId, ...target });
};

/** Numbers sent for a pending prompt. */
export const handleThresholdText = async (
  services: BotServices,
  actor: Actor,
  request: ThresholdEditRequest,
  text: string,
  messageId: number,
): Promise<void> => {
  const parsed = parseThresholdPair(text);
  if (!parsed.ok) {
    await rejectInput(services, actor, messageId, parsed.issue);
    return;
  }

  let groups: string[];
  try {
    const userGroups = await services.access.accessibleGroups(actor.userId);
    groups = await services.thresholds.apply(request, parsed.pair, actor.userId, userGroups);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error("Failed to save thresholds", { userId: actor.userId, message });
    await rejectInput(services, actor, messageId, "save_failed", "Could not save thresholds");
    return;
  }

  services.pending.clearPending(actor.userId);
  log.info("Thresholds saved", {
    userId: actor.userId,
    operation: request.operation,
    groups: groups.length,
    min: parsed.pair.min,
    max: parsed.pair.max,
  });

  await services.messenger.deleteMessage(actor.chatId, messageId);
  const savedText = thresholdSavedText(request, parsed.pair, groups);
  const outcome = await services.menus.render({ userId: actor.userId, event: { type: "success", text: savedText } });
  if (!outcome.handled) {
    const scope = await services.access.resolveScope(actor.userId);
    const prompt = thresholdPromptScreen(scope, request, parsed.pair);
    await postScreen(services, actor, { ...prompt, text: savedText });
  }
};
