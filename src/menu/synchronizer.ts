import type { InlineKeyboard } from "grammy";

import type { MenuScope } from "../auth/types.js";
import { logger } from "../logger.js";
import type { ChatMessenger } from "../relay/telegramMessenger.js";
import type { Clock } from "../state/expiringMap.js";
import type { SessionRegistry, UserSession } from "../state/sessionRegistry.js";
import { composeRejection, type InputIssue } from "./feedback.js";
import { buildDefaultControls } from "./keyboards.js";
import { pickMarker, visibleMarker } from "./marker.js";
import type { MenuContext, MenuKind } from "./menuKinds.js";

const log = logger.child("menu-sync");

export type SyncEvent =
  | { type: "rejected"; issue: InputIssue; headline?: string }
  | { type: "success"; text: string }
  | { type: "transition"; text: string; kind: MenuKind; context?: MenuContext };

export interface SyncRequest {
  userId: number;
  event: SyncEvent;
  /** Overrides the controls derived from the menu kind. */
  controls?: InlineKeyboard;
}

export type SyncOutcome =
  | { handled: true; messageId: number; attempts: number }
  | { handled: false; reason: "no_session" | "conflict" | "edit_failed" };

export interface ScopeResolver {
  resolveScope(userId: number): Promise<MenuScope>;
}

export interface MenuSynchronizerDeps {
  sessions: SessionRegistry;
  messenger: ChatMessenger;
  access: ScopeResolver;
  clock?: Clock;
}

interface Render {
  kind: MenuKind;
  context: MenuContext;
  text: string;
}

const planRender = (session: UserSession, event: SyncEvent): Render => {
  switch (event.type) {
    case "rejected":
      return {
        kind: session.menuKind,
        context: session.menuContext,
        text: composeRejection(session.menuKind, session.menuContext, event.issue, event.headline),
      };
    case "success":
      return { kind: session.menuKind, context: session.menuContext, text: event.text };
    case "transition":
      return { kind: event.kind, context: event.context ?? {}, text: event.text };
  }
};

/**
 * Writes the outcome of an event into the user's live message. A
 * `handled: false` outcome means the caller has to post a fresh message.
 */
export class MenuSynchronizer {
  private readonly clock: Clock;

  constructor(private readonly deps: MenuSynchronizerDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  async render(request: SyncRequest): Promise<SyncOutcome> {
    const { userId, event } = request;
    const session = this.deps.sessions.get(userId);
    if (!session) {
      log.debug("No live menu to update", { userId, activeMenus: this.deps.sessions.size() });
      return { handled: false, reason: "no_session" };
    }

    const plan = planRender(session, event);
    const controls =
      request.controls ??
      buildDefaultControls(plan.kind, plan.context, await this.deps.access.resolveScope(userId));
    const { chatId, messageId } = session.messageRef;

    const marker = pickMarker(this.clock(), session.marker);
    const first = await this.deps.messenger.editMessage(chatId, messageId, `${plan.text}${marker}`, controls);
    if (first.status === "ok") {
      this.retrack(session, plan, marker);
      return { handled: true, messageId, attempts: 1 };
    }
    if (first.status === "failed") {
      log.warn("Live menu edit failed", { userId, kind: session.menuKind, error: first.error });
      return { handled: false, reason: "edit_failed" };
    }

    const fallbackMarker = visibleMarker(this.clock());
    const second = await this.deps.messenger.editMessage(
      chatId,
      messageId,
      `${plan.text}${fallbackMarker}`,
      controls,
    );
    if (second.status === "ok") {
      this.retrack(session, plan, fallbackMarker);
      return { handled: true, messageId, attempts: 2 };
    }

    log.error("Live menu edit failed after retry", {
      userId,
      kind: session.menuKind,
      status: second.status,
      error: second.status === "failed" ? second.error : null,
    });
    return { handled: false, reason: second.status === "not_modified" ? "conflict" : "edit_failed" };
  }

  private retrack(session: UserSession, plan: Render, marker: string): void {
    this.deps.sessions.track(
      session.userId,
      session.chatId,
      session.messageRef.messageId,
      plan.kind,
      plan.context,
      marker,
    );
    log.info("Live menu updated", { userId: session.userId, kind: plan.kind });
  }
}
