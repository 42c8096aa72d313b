export const STORE_FILES = {
  admins: "admins.json",
  thresholds: "thresholds.json",
  devices: "devices.json",
} as const;

export type StoreFileKey = keyof typeof STORE_FILES;
