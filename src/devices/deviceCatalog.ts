import type { JsonStore } from "../store/jsonStore.js";

/** Groups and devices known to the monitoring side. */
export class DeviceCatalog {
  constructor(private readonly store: JsonStore) {}

  async listGroups(): Promise<string[]> {
    const devices = await this.store.read("devices");
    return [...new Set(devices.map((device) => device.groupKey))].sort((a, b) => a.localeCompare(b));
  }

  async devicesByGroup(): Promise<Record<string, string[]>> {
    const devices = await this.store.read("devices");
    const byGroup: Record<string, string[]> = {};
    for (const device of devices) {
      const keys = byGroup[device.groupKey] ?? [];
      keys.push(device.deviceKey);
      byGroup[device.groupKey] = keys;
    }
    for (const keys of Object.values(byGroup)) {
      keys.sort((a, b) => a.localeCompare(b));
    }
    return byGroup;
  }

  async devicesOf(groupKey: string): Promise<string[]> {
    return (await this.devicesByGroup())[groupKey] ?? [];
  }

  async hasDevice(groupKey: string, deviceKey: string): Promise<boolean> {
    const devices = await this.store.read("devices");
    return devices.some((device) => device.groupKey === groupKey && device.deviceKey === deviceKey);
  }
}
