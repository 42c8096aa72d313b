import { Api } from "grammy";

import { createTelegramBot } from "./bot/index.js";
import { botCommandList } from "./bot/commands.js";
import type { BotServices } from "./bot/types.js";
import { loadConfig } from "./config.js";
import { AdminService } from "./admins/adminService.js";
import { AccessService } from "./auth/access.js";
import { DeviceCatalog } from "./devices/deviceCatalog.js";
import { MenuSynchronizer } from "./menu/synchronizer.js";
import { TelegramMessenger } from "./relay/telegramMessenger.js";
import { KeyedQueue } from "./state/keyedQueue.js";
import { SessionRegistry } from "./state/sessionRegistry.js";
import { ThresholdContextStore } from "./state/thresholdContext.js";
import { WizardStateMachine } from "./state/wizardMachine.js";
import { JsonStore } from "./store/jsonStore.js";
import { ThresholdService } from "./thresholds/thresholdService.js";
import { isValidName, isValidPosition } from "./validators.js";
import { logger } from "./logger.js";

const sweepStates = (services: BotServices): void => {
  const removed = {
    sessions: services.sessions.sweepExpired(),
    wizards: services.wizard.sweepExpired(),
    thresholdPrompts: services.pending.sweepExpired(),
  };
  if (removed.sessions + removed.wizards + removed.thresholdPrompts > 0) {
    logger.info("Expired states swept", removed);
  }
};

const bootstrap = async (): Promise<void> => {
  const config = loadConfig();
  logger.info("Bootstrapping temperature bot", {
    dataDir: config.dataDir,
    transport: config.transport,
    superadmins: config.superadmins.length,
  });
  const store = new JsonStore(config.dataDir);
  await store.init();

  const admins = new AdminService(store);
  const devices = new DeviceCatalog(store);
  const access = new AccessService(admins, devices, config.superadmins);
  logger.info("Device catalog loaded", { groups: (await devices.listGroups()).length });

  const sessions = new SessionRegistry({ ttlMs: config.ttl.sessionMs });
  const messenger = new TelegramMessenger(new Api(config.botToken));
  const services: BotServices = {
    sessions,
    wizard: new WizardStateMachine({ isValidName, isValidPosition }, { ttlMs: config.ttl.wizardMs }),
    pending: new ThresholdContextStore({ ttlMs: config.ttl.thresholdMs }),
    menus: new MenuSynchronizer({ sessions, messenger, access }),
    messenger,
    access,
    admins,
    devices,
    thresholds: new ThresholdService(store, devices),
    queue: new KeyedQueue<number>(),
    maxMessageLength: config.maxMessageLength,
  };

  const bot = createTelegramBot(config.botToken, services);
  await bot.api.setMyCommands(botCommandList);

  if (config.sweepIntervalMs > 0) {
    const timer = setInterval(() => sweepStates(services), config.sweepIntervalMs);
    timer.unref();
  }

  const shutdown = (signal: string) => {
    logger.info("Stopping bot", { signal });
    bot.stop().catch((error: unknown) => {
      logger.error("Failed to stop bot", { message: error instanceof Error ? error.message : String(error) });
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  if (config.transport === "polling") {
    logger.info("Bot starting", { mode: "polling" });
    await bot.start();
    logger.info("Bot stopped");
  } else {
    throw new Error("Webhook mode is not implemented");
  }
};

bootstrap().catch((error) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  logger.error("Bootstrap failed", { message });
  process.exitCode = 1;
});
