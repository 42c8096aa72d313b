import type { DeviceCatalog } from "../devices/deviceCatalog.js";
import { ALL_DEVICES, type ThresholdEditRequest } from "../state/thresholdContext.js";
import type { JsonStore } from "../store/jsonStore.js";
import type { ThresholdRecord } from "../store/types.js";
import type { ThresholdPair } from "../validators.js";

const now = () => new Date().toISOString();

export const DEFAULT_BAND: ThresholdPair = { min: 18, max: 25 };

export type ThresholdTarget = Pick<ThresholdEditRequest, "operation" | "groupKey" | "deviceKey">;

export class ThresholdService {
  constructor(
    private readonly store: JsonStore,
    private readonly devices: DeviceCatalog,
  ) {}

  /** Effective band of a device: its own, else its group's, else the default. */
  async get(groupKey: string, deviceKey: string): Promise<ThresholdPair> {
    const records = await this.store.read("thresholds");
    const own = records.find((item) => item.groupKey === groupKey && item.deviceKey === deviceKey);
    const group = records.find((item) => item.groupKey === groupKey && item.deviceKey === ALL_DEVICES);
    const found = own ?? group;
    return found ? { min: found.min, max: found.max } : { ...DEFAULT_BAND };
  }

  /**
   * Stores the band for every target of the operation and returns the
   * group keys written. `userGroups` bounds the `all_user_groups` fan-out.
   * A group-wide band replaces the device bands inside those groups.
   */
  async apply(
    target: ThresholdTarget,
    pair: ThresholdPair,
    updatedBy: number,
    userGroups: readonly string[],
  ): Promise<string[]> {
    const keys = await this.resolveTargets(target, userGroups);
    if (keys.length === 0) return [];

    const updatedAt = now();
    const wholeGroups = new Set(keys.filter((key) => key.deviceKey === ALL_DEVICES).map((key) => key.groupKey));
    await this.store.update("thresholds", (current) => {
      const records = current.filter((item) => !(wholeGroups.has(item.groupKey) && item.deviceKey !== ALL_DEVICES));
      for (const { groupKey, deviceKey } of keys) {
        const next: ThresholdRecord = { groupKey, deviceKey, min: pair.min, max: pair.max, updatedBy, updatedAt };
        const index = records.findIndex((item) => item.groupKey === groupKey && item.deviceKey === deviceKey);
        if (index >= 0) {
          records[index] = next;
        } else {
          records.push(next);
        }
      }
      return records;
    });
    return [...new Set(keys.map((key) => key.groupKey))];
  }

  private async resolveTargets(
    target: ThresholdTarget,
    userGroups: readonly string[],
  ): Promise<Array<{ groupKey: string; deviceKey: string }>> {
    switch (target.operation) {
      case "single_device":
        return [{ groupKey: target.groupKey, deviceKey: target.deviceKey }];
      case "whole_group":
        return [{ groupKey: target.groupKey, deviceKey: ALL_DEVICES }];
      case "all_user_groups":
        return userGroups.map((groupKey) => ({ groupKey, deviceKey: ALL_DEVICES }));
      case "all_system":
        return (await this.devices.listGroups()).map((groupKey) => ({ groupKey, deviceKey: ALL_DEVICES }));
    }
  }
}
