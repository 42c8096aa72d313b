import type { Context } from "grammy";

import type { AdminService } from "../admins/adminService.js";
import type { AccessService } from "../auth/access.js";
import type { DeviceCatalog } from "../devices/deviceCatalog.js";
import type { MenuSynchronizer } from "../menu/synchronizer.js";
import type { ChatMessenger } from "../relay/telegramMessenger.js";
import type { KeyedQueue } from "../state/keyedQueue.js";
import type { SessionRegistry } from "../state/sessionRegistry.js";
import type { ThresholdContextStore } from "../state/thresholdContext.js";
import type { WizardStateMachine } from "../state/wizardMachine.js";
import type { ThresholdService } from "../thresholds/thresholdService.js";

export interface BotServices {
  sessions: SessionRegistry;
  wizard: WizardStateMachine;
  pending: ThresholdContextStore;
  menus: MenuSynchronizer;
  messenger: ChatMessenger;
  access: AccessService;
  admins: AdminService;
  devices: DeviceCatalog;
  thresholds: ThresholdService;
  queue: KeyedQueue<number>;
  maxMessageLength: number;
}

export type BotContext = Context & {
  services: BotServices;
};

/** Who an update came from. Registration state is keyed by chat, menus by user. */
export interface Actor {
  userId: number;
  chatId: number;
}
