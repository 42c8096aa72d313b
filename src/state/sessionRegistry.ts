import type { MenuContext, MenuKind } from "../menu/menuKinds.js";
import { resolveStore, type Clock, type ExpiringStore, type StoreOptions } from "./expiringMap.js";

export interface MessageRef {
  chatId: number;
  messageId: number;
}

export interface UserSession {
  userId: number;
  chatId: number;
  messageRef: MessageRef;
  menuKind: MenuKind;
  menuContext: MenuContext;
  /** Uniqueness marker last appended to the message text, if any. */
  marker?: string;
  updatedAt: number;
}

export const DEFAULT_SESSION_TTL_MS = 3600 * 1000;

/** The single live interactive message per user. */
export class SessionRegistry {
  private readonly store: ExpiringStore<number, UserSession>;
  private readonly clock: Clock;

  constructor(options: StoreOptions<number, UserSession> = {}) {
    const resolved = resolveStore(options, DEFAULT_SESSION_TTL_MS);
    this.store = resolved.store;
    this.clock = resolved.clock;
  }

  track(
    userId: number,
    chatId: number,
    messageId: number,
    kind: MenuKind,
    context: MenuContext = {},
    marker?: string,
  ): UserSession {
    const session: UserSession = {
      userId,
      chatId,
      messageRef: { chatId, messageId },
      menuKind: kind,
      menuContext: { ...context },
      ...(marker ? { marker } : {}),
      updatedAt: this.clock(),
    };
    this.store.set(userId, session);
    return session;
  }

  get(userId: number): UserSession | undefined {
    return this.store.get(userId);
  }

  isKind(userId: number, kind: MenuKind): boolean {
    return this.get(userId)?.menuKind === kind;
  }

  clear(userId: number): void {
    this.store.delete(userId);
  }

  sweepExpired(): number {
    return this.store.sweep();
  }

  size(): number {
    return this.store.size();
  }

  kindStats(): Partial<Record<MenuKind, number>> {
    const stats: Partial<Record<MenuKind, number>> = {};
    for (const session of this.store.values()) {
      stats[session.menuKind] = (stats[session.menuKind] ?? 0) + 1;
    }
    return stats;
  }
}
