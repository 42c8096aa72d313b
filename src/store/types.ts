export type AdminRole = "admin" | "superadmin";

export interface AdminRecord {
  telegramUserId: number;
  name: string;
  position: string;
  groups: string[];
  role: AdminRole;
  createdAt: string;
}

export interface ThresholdRecord {
  groupKey: string;
  /** `ALL` for the band shared by a whole group. */
  deviceKey: string;
  min: number;
  max: number;
  updatedBy: number;
  updatedAt: string;
}

/** Written by the monitoring side; read-only here. */
export interface DeviceRecord {
  deviceKey: string;
  groupKey: string;
}
