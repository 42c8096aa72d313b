import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { buttons, type FakeMessenger } from "../testing/fakes.js";
import { createTestServices } from "../testing/services.js";
import { handleText } from "./inputFlow.js";
import { postScreen, rejectInput } from "./presenter.js";
import { mainScreen } from "./screens.js";
import type { Actor, BotServices } from "./types.js";

const NOW = 1_700_000_000_001;
const actor: Actor = { userId: 3, chatId: 30 };

describe("text routing", () => {
  let services: BotServices;
  let messenger: FakeMessenger;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ services, messenger, cleanup } = await createTestServices({
      clock: () => NOW,
      maxMessageLength: 20,
      devices: [{ deviceKey: "D1", groupKey: "G1" }],
    }));
    await services.admins.register(actor.userId, { name: "Smith John Robert", position: "Director", groups: ["G1"] });
  });

  afterEach(async () => {
    await cleanup();
  });

  it("reports free text in the live menu", async () => {
    const scope = await services.access.resolveScope(actor.userId);
    const menuId = await postScreen(services, actor, mainScreen(scope));

    await handleText(services, actor, "hello", 40);

    expect(messenger.deleteMessage).toHaveBeenCalledWith(30, 40);
    expect(messenger.editMessage).toHaveBeenCalledTimes(1);
    const [chatId, messageId, text, controls] = messenger.editMessage.mock.calls[0];
    expect([chatId, messageId]).toEqual([30, menuId]);
    expect(text).toBe("❌ *Unsupported message*\n\nDetected: 📝 free text\n\nUse the menu buttons to navigate.⠁");
    expect(buttons(controls)[0]).toEqual([
      ["📊 My data", "menu:mine"],
      ["🌡️ Groups", "menu:groups"],
    ]);
  });

  it("posts the main menu with the error when no live menu exists", async () => {
    await handleText(services, actor, "hello", 40);

    expect(messenger.editMessage).not.toHaveBeenCalled();
    expect(messenger.sendMessage).toHaveBeenCalledTimes(1);
    expect(messenger.sendMessage.mock.calls[0][1]).toBe(
      "❌ *Unsupported message*\n\nDetected: 📝 free text\n\nUse the menu buttons to navigate.",
    );
    expect(services.sessions.get(actor.userId)).toMatchObject({
      menuKind: "main",
      messageRef: { chatId: 30, messageId: 1001 },
    });
  });

  it("rejects over-long and unsafe text before routing", async () => {
    const scope = await services.access.resolveScope(actor.userId);
    await postScreen(services, actor, mainScreen(scope));
    services.pending.setPending(actor.userId, actor.chatId, 1001, "single_device", "G1", "D1");

    await handleText(services, actor, "1".repeat(21), 40);
    await handleText(services, actor, "10 <20>", 41);

    expect(messenger.editMessage.mock.calls[0][2]).toBe(
      "❌ *Unsupported message*\n\nDetected: ❌ message too long\n\nUse the menu buttons to navigate.⠁",
    );
    expect(messenger.editMessage.mock.calls[1][2]).toBe(
      "❌ *Unsupported message*\n\nDetected: ❌ forbidden characters\n\nUse the menu buttons to navigate.⠂",
    );
    expect(services.pending.hasPending(actor.userId)).toBe(true);
  });

  it("reports unsupported media", async () => {
    const scope = await services.access.resolveScope(actor.userId);
    await postScreen(services, actor, mainScreen(scope));

    const outcome = await rejectInput(services, actor, 42, "unsupported_media");

    expect(outcome).toEqual({ handled: true, messageId: 1001, attempts: 1 });
    expect(messenger.editMessage.mock.calls[0][2]).toBe(
      "❌ *Unsupported message*\n\nDetected: 📎 unsupported content\n\nUse the menu buttons to navigate.⠁",
    );
  });
});
