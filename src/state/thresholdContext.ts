import { resolveStore, type Clock, type ExpiringStore, type StoreOptions } from "./expiringMap.js";

export const THRESHOLD_OPERATIONS = [
  "single_device",
  "whole_group",
  "all_user_groups",
  "all_system",
] as const;

export type ThresholdOperation = (typeof THRESHOLD_OPERATIONS)[number];

export const ALL_DEVICES = "ALL";
export const USER_GROUPS = "USER";
export const SYSTEM_GROUPS = "SYSTEM";

export interface ThresholdEditRequest {
  userId: number;
  chatId: number;
  /** Message that receives the outcome once the numbers arrive. */
  targetMessageId: number;
  operation: ThresholdOperation;
  groupKey: string;
  deviceKey: string;
  createdAt: number;
}

export const DEFAULT_THRESHOLD_TTL_MS = 600 * 1000;

export const isThresholdOperation = (value: string): value is ThresholdOperation =>
  (THRESHOLD_OPERATIONS as readonly string[]).includes(value);

/**
 * One pending "send me min and max" prompt per user. A newer prompt replaces
 * the older one.
 */
export class ThresholdContextStore {
  private readonly store: ExpiringStore<number, ThresholdEditRequest>;
  private readonly clock: Clock;

  constructor(options: StoreOptions<number, ThresholdEditRequest> = {}) {
    const resolved = resolveStore(options, DEFAULT_THRESHOLD_TTL_MS);
    this.store = resolved.store;
    this.clock = resolved.clock;
  }

  setPending(
    userId: number,
    chatId: number,
    messageId: number,
    operation: ThresholdOperation,
    groupKey: string,
    deviceKey: string,
  ): ThresholdEditRequest {
    const request: ThresholdEditRequest = {
      userId,
      chatId,
      targetMessageId: messageId,
      operation,
      groupKey,
      deviceKey,
      createdAt: this.clock(),
    };
    this.store.set(userId, request);
    return request;
  }

  getPending(userId: number): ThresholdEditRequest | undefined {
    return this.store.get(userId);
  }

  hasPending(userId: number): boolean {
    return this.store.get(userId) !== undefined;
  }

  clearPending(userId: number): void {
    this.store.delete(userId);
  }

  sweepExpired(): number {
    return this.store.sweep();
  }

  size(): number {
    return this.store.size();
  }
}
