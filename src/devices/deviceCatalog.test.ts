import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createTempStore } from "../testing/tempStore.js";
import { DeviceCatalog } from "./deviceCatalog.js";

describe("DeviceCatalog", () => {
  let cleanup: () => Promise<void>;
  let catalog: DeviceCatalog;

  beforeEach(async () => {
    const temp = await createTempStore();
    cleanup = temp.cleanup;
    await temp.store.write("devices", [
      { deviceKey: "D9", groupKey: "B" },
      { deviceKey: "D2", groupKey: "A" },
      { deviceKey: "D1", groupKey: "B" },
    ]);
    catalog = new DeviceCatalog(temp.store);
  });

  afterEach(async () => {
    await cleanup();
  });

  it("lists groups and their devices in order", async () => {
    await expect(catalog.listGroups()).resolves.toEqual(["A", "B"]);
    await expect(catalog.devicesOf("B")).resolves.toEqual(["D1", "D9"]);
    await expect(catalog.devicesOf("C")).resolves.toEqual([]);
  });

  it("checks device membership by group", async () => {
    await expect(catalog.hasDevice("B", "D9")).resolves.toBe(true);
    await expect(catalog.hasDevice("A", "D9")).resolves.toBe(false);
  });
});
