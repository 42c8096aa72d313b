import { isValidKey } from "../validators.js";
import type { AdminRecord, DeviceRecord, ThresholdRecord } from "./types.js";

const isNumber = (value: unknown): value is number => typeof value === "number" && Number.isFinite(value);
const isString = (value: unknown): value is string => typeof value === "string";
const isStringArray = (value: unknown): value is string[] => Array.isArray(value) && value.every(isString);

export const isAdminRecord = (value: unknown): value is AdminRecord => {
  if (!value || typeof value !== "object") return false;
  const obj = value as Partial<AdminRecord>;
  return (
    isNumber(obj.telegramUserId) &&
    isString(obj.name) &&
    isString(obj.position) &&
    isStringArray(obj.groups) &&
    (obj.role === "admin" || obj.role === "superadmin") &&
    isString(obj.createdAt)
  );
};

export const isThresholdRecord = (value: unknown): value is ThresholdRecord => {
  if (!value || typeof value !== "object") return false;
  const obj = value as Partial<ThresholdRecord>;
  return (
    isString(obj.groupKey) &&
    isString(obj.deviceKey) &&
    isNumber(obj.min) &&
    isNumber(obj.max) &&
    isNumber(obj.updatedBy) &&
    isString(obj.updatedAt)
  );
};

export const isDeviceRecord = (value: unknown): value is DeviceRecord => {
  if (!value || typeof value !== "object") return false;
  const obj = value as Partial<DeviceRecord>;
  return isString(obj.deviceKey) && isString(obj.groupKey) && isValidKey(obj.deviceKey) && isValidKey(obj.groupKey);
};
