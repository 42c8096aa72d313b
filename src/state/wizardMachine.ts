import { resolveStore, type Clock, type ExpiringStore, type StoreOptions } from "./expiringMap.js";

export type WizardStep = "name" | "groups" | "position" | "completed";

export interface WizardState {
  chatId: number;
  step: WizardStep;
  name: string;
  groups: ReadonlySet<string>;
  position: string;
  startedAt: number;
}

export interface WizardOutcome {
  name: string;
  groups: string[];
  position: string;
}

export interface WizardValidators {
  isValidName: (text: string) => boolean;
  isValidPosition: (text: string) => boolean;
}

export type WizardFailure = "state_mismatch" | "validation_rejected" | "empty_selection";

export type WizardResult<T = object> = ({ ok: true } & T) | { ok: false; reason: WizardFailure };

export interface StoredWizardState {
  chatId: number;
  step: WizardStep;
  name: string;
  groups: Set<string>;
  position: string;
  startedAt: number;
}

export const DEFAULT_WIZARD_TTL_MS = 1800 * 1000;

const mismatch = { ok: false, reason: "state_mismatch" } as const;

/**
 * Registration flow per chat: name, then groups, then position. Calls made
 * in the wrong step return a failure value; duplicate taps and stale retries
 * land here routinely.
 */
export class WizardStateMachine {
  private readonly store: ExpiringStore<number, StoredWizardState>;
  private readonly clock: Clock;

  constructor(
    private readonly validators: WizardValidators,
    options: StoreOptions<number, StoredWizardState> = {},
  ) {
    const resolved = resolveStore(options, DEFAULT_WIZARD_TTL_MS);
    this.store = resolved.store;
    this.clock = resolved.clock;
  }

  start(chatId: number): WizardState {
    const existing = this.store.get(chatId);
    if (existing) return snapshot(existing);
    const state: StoredWizardState = {
      chatId,
      step: "name",
      name: "",
      groups: new Set(),
      position: "",
      startedAt: this.clock(),
    };
    this.store.set(chatId, state);
    return snapshot(state);
  }

  get(chatId: number): WizardState | undefined {
    const state = this.store.get(chatId);
    return state ? snapshot(state) : undefined;
  }

  stepOf(chatId: number): WizardStep | "not_started" {
    return this.store.get(chatId)?.step ?? "not_started";
  }

  isActive(chatId: number): boolean {
    return this.store.get(chatId) !== undefined;
  }

  submitName(chatId: number, text: string): WizardResult {
    const state = this.inStep(chatId, "name");
    if (!state) return mismatch;
    const name = text.trim();
    if (!this.validators.isValidName(name)) {
      return { ok: false, reason: "validation_rejected" };
    }
    this.save({ ...state, name, groups: new Set(), step: "groups" });
    return { ok: true };
  }

  toggleGroup(chatId: number, group: string): WizardResult<{ selected: boolean }> {
    const state = this.inStep(chatId, "groups");
    if (!state) return mismatch;
    const groups = new Set(state.groups);
    const selected = !groups.has(group);
    if (selected) {
      groups.add(group);
    } else {
      groups.delete(group);
    }
    this.save({ ...state, groups });
    return { ok: true, selected };
  }

  finishGroups(chatId: number): WizardResult {
    const state = this.inStep(chatId, "groups");
    if (!state) return mismatch;
    if (state.groups.size === 0) return { ok: false, reason: "empty_selection" };
    this.save({ ...state, step: "position" });
    return { ok: true };
  }

  submitPosition(chatId: number, text: string): WizardResult {
    const state = this.inStep(chatId, "position");
    if (!state) return mismatch;
    const position = text.trim();
    if (!this.validators.isValidPosition(position)) {
      return { ok: false, reason: "validation_rejected" };
    }
    this.save({ ...state, position, step: "completed" });
    return { ok: true };
  }

  /** Hands out the collected answers once; the state is gone afterwards. */
  consumeCompleted(chatId: number): WizardOutcome | undefined {
    const state = this.inStep(chatId, "completed");
    if (!state) return undefined;
    this.store.delete(chatId);
    return { name: state.name, groups: [...state.groups], position: state.position };
  }

  reset(chatId: number): void {
    this.store.delete(chatId);
  }

  sweepExpired(): number {
    return this.store.sweep();
  }

  stepStats(): Partial<Record<WizardStep, number>> {
    const stats: Partial<Record<WizardStep, number>> = {};
    for (const state of this.store.values()) {
      stats[state.step] = (stats[state.step] ?? 0) + 1;
    }
    return stats;
  }

  /** Writes a transition back; the store may hand out copies. */
  private save(state: StoredWizardState): void {
    this.store.set(state.chatId, state);
  }

  private inStep(chatId: number, step: WizardStep): StoredWizardState | undefined {
    const state = this.store.get(chatId);
    return state?.step === step ? state : undefined;
  }
}

const snapshot = (state: StoredWizardState): WizardState => ({
  ...state,
  groups: new Set(state.groups),
});
