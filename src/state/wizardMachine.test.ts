import { beforeEach, describe, expect, it } from "vitest";

import { fakeClock } from "../testing/fakes.js";
import { isValidName, isValidPosition } from "../validators.js";
import { ExpiringMap, type ExpiringStore } from "./expiringMap.js";
import { WizardStateMachine, type StoredWizardState } from "./wizardMachine.js";

const CHAT = 42;

describe("WizardStateMachine", () => {
  let clock: ReturnType<typeof fakeClock>;
  let wizard: WizardStateMachine;

  beforeEach(() => {
    clock = fakeClock();
    wizard = new WizardStateMachine({ isValidName, isValidPosition }, { clock: clock.now });
  });

  const reachPosition = () => {
    wizard.start(CHAT);
    wizard.submitName(CHAT, "Smith John Robert");
    wizard.toggleGroup(CHAT, "North");
    wizard.finishGroups(CHAT);
  };

  it("starts at the name step and is idempotent", () => {
    const first = wizard.start(CHAT);
    expect(first.step).toBe("name");
    expect(wizard.submitName(CHAT, "Smith John Robert")).toEqual({ ok: true });

    const again = wizard.start(CHAT);
    expect(again.step).toBe("groups");
    expect(again.name).toBe("Smith John Robert");
  });

  it("reports not_started without a state", () => {
    expect(wizard.stepOf(CHAT)).toBe("not_started");
    expect(wizard.isActive(CHAT)).toBe(false);
    expect(wizard.get(CHAT)).toBeUndefined();
  });

  it("rejects an invalid name without leaving the step", () => {
    wizard.start(CHAT);
    expect(wizard.submitName(CHAT, "john")).toEqual({ ok: false, reason: "validation_rejected" });
    expect(wizard.stepOf(CHAT)).toBe("name");
  });

  it("stores the trimmed name and moves to groups with an empty selection", () => {
    wizard.start(CHAT);
    wizard.submitName(CHAT, "  Smith John Robert  ");
    const state = wizard.get(CHAT);
    expect(state?.name).toBe("Smith John Robert");
    expect(state?.step).toBe("groups");
    expect(state?.groups.size).toBe(0);
  });

  it("returns state_mismatch for calls in the wrong step", () => {
    expect(wizard.submitName(CHAT, "Smith John Robert")).toEqual({ ok: false, reason: "state_mismatch" });
    wizard.start(CHAT);
    expect(wizard.toggleGroup(CHAT, "North")).toEqual({ ok: false, reason: "state_mismatch" });
    expect(wizard.finishGroups(CHAT)).toEqual({ ok: false, reason: "state_mismatch" });
    expect(wizard.submitPosition(CHAT, "Director")).toEqual({ ok: false, reason: "state_mismatch" });
    expect(wizard.stepOf(CHAT)).toBe("name");
  });

  it("toggles group membership", () => {
    wizard.start(CHAT);
    wizard.submitName(CHAT, "Smith John Robert");

    expect(wizard.toggleGroup(CHAT, "North")).toEqual({ ok: true, selected: true });
    expect(wizard.toggleGroup(CHAT, "South")).toEqual({ ok: true, selected: true });
    expect(wizard.toggleGroup(CHAT, "North")).toEqual({ ok: true, selected: false });
    expect([...(wizard.get(CHAT)?.groups ?? [])]).toEqual(["South"]);
  });

  it("refuses to finish an empty selection", () => {
    wizard.start(CHAT);
    wizard.submitName(CHAT, "Smith John Robert");
    expect(wizard.finishGroups(CHAT)).toEqual({ ok: false, reason: "empty_selection" });
    expect(wizard.stepOf(CHAT)).toBe("groups");
  });

  it("hands out the outcome exactly once", () => {
    reachPosition();
    expect(wizard.submitPosition(CHAT, " Shift supervisor ")).toEqual({ ok: true });
    expect(wizard.stepOf(CHAT)).toBe("completed");

    expect(wizard.consumeCompleted(CHAT)).toEqual({
      name: "Smith John Robert",
      groups: ["North"],
      position: "Shift supervisor",
    });
    expect(wizard.consumeCompleted(CHAT)).toBeUndefined();
    expect(wizard.isActive(CHAT)).toBe(false);
  });

  it("rejects a too short position", () => {
    reachPosition();
    expect(wizard.submitPosition(CHAT, "x")).toEqual({ ok: false, reason: "validation_rejected" });
    expect(wizard.stepOf(CHAT)).toBe("position");
  });

  it("does not consume an unfinished wizard", () => {
    reachPosition();
    expect(wizard.consumeCompleted(CHAT)).toBeUndefined();
    expect(wizard.stepOf(CHAT)).toBe("position");
  });

  it("returns snapshots that cannot change the stored state", () => {
    wizard.start(CHAT);
    wizard.submitName(CHAT, "Smith John Robert");
    wizard.toggleGroup(CHAT, "North");

    const snapshot = wizard.get(CHAT);
    expect(snapshot?.groups.has("North")).toBe(true);
    if (snapshot?.groups instanceof Set) snapshot.groups.clear();
    expect(wizard.get(CHAT)?.groups.has("North")).toBe(true);
  });

  it("expires after the inactivity window and refreshes on each transition", () => {
    wizard.start(CHAT);
    clock.advance(1500 * 1000);
    wizard.submitName(CHAT, "Smith John Robert");
    clock.advance(1500 * 1000);
    expect(wizard.stepOf(CHAT)).toBe("groups");

    clock.advance(1800 * 1000 + 1);
    expect(wizard.stepOf(CHAT)).toBe("not_started");
  });

  it("resets, sweeps and counts steps", () => {
    wizard.start(1);
    wizard.start(2);
    wizard.submitName(2, "Smith John Robert");
    wizard.start(3);
    expect(wizard.stepStats()).toEqual({ name: 2, groups: 1 });

    wizard.reset(3);
    expect(wizard.isActive(3)).toBe(false);

    clock.advance(1800 * 1000 + 1);
    expect(wizard.sweepExpired()).toBe(2);
  });

  it("keeps transitions when the store hands out copies", () => {
    const inner = new ExpiringMap<number, StoredWizardState>(60_000, clock.now);
    const copy = (state: StoredWizardState): StoredWizardState => ({ ...state, groups: new Set(state.groups) });
    const copying: ExpiringStore<number, StoredWizardState> = {
      get: (key) => {
        const state = inner.get(key);
        return state ? copy(state) : undefined;
      },
      set: (key, value) => inner.set(key, copy(value)),
      delete: (key) => inner.delete(key),
      touch: (key) => inner.touch(key),
      sweep: () => inner.sweep(),
      size: () => inner.size(),
      values: () => inner.values().map(copy),
    };
    clock.advance(5);
    const isolated = new WizardStateMachine({ isValidName, isValidPosition }, { store: copying, clock: clock.now });

    isolated.start(CHAT);
    expect(isolated.submitName(CHAT, "Smith John Robert")).toEqual({ ok: true });
    expect(isolated.toggleGroup(CHAT, "North")).toEqual({ ok: true, selected: true });
    expect(isolated.finishGroups(CHAT)).toEqual({ ok: true });
    expect(isolated.submitPosition(CHAT, "Storekeeper")).toEqual({ ok: true });

    expect(isolated.get(CHAT)?.startedAt).toBe(5);
    expect(isolated.consumeCompleted(CHAT)).toEqual({
      name: "Smith John Robert",
      groups: ["North"],
      position: "Storekeeper",
    });
  });
});
