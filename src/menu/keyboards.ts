import { InlineKeyboard } from "grammy";

import type { MenuScope, Role } from "../auth/types.js";
import { ALL_DEVICES, SYSTEM_GROUPS, USER_GROUPS } from "../state/thresholdContext.js";
import { callbackData } from "./callbackData.js";
import type { MenuContext, MenuKind } from "./menuKinds.js";

const MAX_DEVICE_BUTTONS = 10;

export const HELP_SECTIONS = {
  usage: "📖 Usage",
  thresholds: "🌡️ Thresholds",
  registration: "📝 Registration",
} as const;

export type HelpSection = keyof typeof HELP_SECTIONS;

export const isHelpSection = (value: string): value is HelpSection => Object.hasOwn(HELP_SECTIONS, value);

const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const rows: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    rows.push(items.slice(i, i + size));
  }
  return rows;
};

const sorted = (items: readonly string[]): string[] => [...items].sort((a, b) => a.localeCompare(b));

export const parseSelection = (value: string | undefined): string[] =>
  (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);

export const buildMainKeyboard = (role: Role): InlineKeyboard => {
  const keyboard = new InlineKeyboard();
  if (role === "unregistered") {
    return keyboard.text("📝 Register", callbackData.regStart);
  }
  keyboard
    .text("📊 My data", callbackData.myData)
    .text("🌡️ Groups", callbackData.groups)
    .row()
    .text("⚙️ Thresholds", callbackData.thresholdGroups)
    .text("📈 Statistics", callbackData.stats)
    .row();
  if (role === "superadmin") {
    keyboard.text("👥 Administrators", callbackData.admins).row();
  }
  return keyboard.text("❓ Help", callbackData.help);
};

export const buildHelpKeyboard = (): InlineKeyboard => {
  const keyboard = new InlineKeyboard();
  for (const [section, label] of Object.entries(HELP_SECTIONS)) {
    keyboard.text(label, callbackData.helpSection(section)).row();
  }
  return keyboard.text("⬅️ Main menu", callbackData.main);
};

export const buildGroupListKeyboard = (groups: readonly string[], selected?: string): InlineKeyboard => {
  const keyboard = new InlineKeyboard();
  if (groups.length === 0) {
    keyboard.text("⚠️ No groups available", callbackData.noop).row();
  }
  for (const row of chunk(sorted(groups), 3)) {
    for (const group of row) {
      keyboard.text(group === selected ? `✅${group}` : group, callbackData.groupInfo(group));
    }
    keyboard.row();
  }
  if (groups.length > 0) {
    keyboard.text("🌐 All data", callbackData.allData).row();
  }
  return keyboard.text("⬅️ Back", callbackData.main);
};

export const buildThresholdGroupsKeyboard = (scope: MenuScope): InlineKeyboard => {
  const keyboard = new InlineKeyboard();
  for (const row of chunk(scope.groups, 2)) {
    for (const group of row) {
      keyboard.text(`⚙️ ${group}`, callbackData.thresholdGroup(group));
    }
    keyboard.row();
  }
  if (scope.groups.length > 0) {
    keyboard.text("🗂 All my groups", callbackData.thresholdUser).row();
  }
  if (scope.role === "superadmin") {
    keyboard.text("🌐 Whole system", callbackData.thresholdSystem).row();
  }
  return keyboard.text("⬅️ Main menu", callbackData.main);
};

export const buildThresholdDevicesKeyboard = (group: string, devices: readonly string[]): InlineKeyboard => {
  const keyboard = new InlineKeyboard()
    .text(`🔧 Whole group ${group}`, callbackData.thresholdSet(group, ALL_DEVICES))
    .row();
  for (const device of devices.slice(0, MAX_DEVICE_BUTTONS)) {
    keyboard.text(`🌡️ ${device}`, callbackData.thresholdSet(group, device)).row();
  }
  return keyboard
    .text("🔙 Back to groups", callbackData.thresholdGroups)
    .text("🏠 Main menu", callbackData.main);
};

export const buildThresholdPromptKeyboard = (context: MenuContext): InlineKeyboard => {
  const keyboard = new InlineKeyboard();
  const group = context.groupKey ?? "";
  if (!group || group === USER_GROUPS || group === SYSTEM_GROUPS) {
    keyboard.text("🔙 Back to groups", callbackData.thresholdGroups);
  } else {
    keyboard.text("⬅️ Back to group", callbackData.thresholdGroup(group));
  }
  return keyboard.row().text("🏠 Main menu", callbackData.main);
};

export const buildRegistrationGroupsKeyboard = (
  available: readonly string[],
  selected: readonly string[],
): InlineKeyboard => {
  const keyboard = new InlineKeyboard();
  if (available.length === 0) {
    return keyboard.text("⚠️ Groups are temporarily unavailable", callbackData.noop);
  }
  for (const row of chunk(sorted(available), 3)) {
    for (const group of row) {
      keyboard.text(selected.includes(group) ? `✅ ${group}` : group, callbackData.regToggle(group));
    }
    keyboard.row();
  }
  if (selected.length > 0) {
    keyboard.text(`✅ Finish selection (${selected.length})`, callbackData.regFinish);
  } else {
    keyboard.text("⚠️ Pick at least one group", callbackData.regNeedGroup);
  }
  return keyboard.row().text("🔄 Start over", callbackData.regReset);
};

const backToMain = (refresh?: string): InlineKeyboard => {
  const keyboard = new InlineKeyboard();
  if (refresh) keyboard.text("🔄 Refresh", refresh);
  return keyboard.text("⬅️ Main menu", callbackData.main);
};

/**
 * Controls of a menu as derived from its kind and context alone. Rendered
 * keyboards are never stored, so this has to reproduce them exactly.
 */
export const buildDefaultControls = (
  kind: MenuKind,
  context: MenuContext,
  scope: MenuScope,
): InlineKeyboard => {
  switch (kind) {
    case "main":
      return buildMainKeyboard(scope.role);
    case "help":
      return buildHelpKeyboard();
    case "my_data":
      return backToMain(callbackData.myData);
    case "stats":
      return backToMain(callbackData.stats);
    case "admin_list":
      return backToMain();
    case "group_list":
      return buildGroupListKeyboard(scope.groups);
    case "group_info":
      return buildGroupListKeyboard(scope.groups, context.groupKey);
    case "threshold_groups":
      return buildThresholdGroupsKeyboard(scope);
    case "threshold_devices": {
      const group = context.groupKey ?? "";
      return buildThresholdDevicesKeyboard(group, scope.devicesByGroup[group] ?? []);
    }
    case "threshold_prompt":
      return buildThresholdPromptKeyboard(context);
    case "wizard_step":
      if (context.step === "groups") {
        return buildRegistrationGroupsKeyboard(scope.allGroups, parseSelection(context.selected));
      }
      return new InlineKeyboard().text("🔄 Start over", callbackData.regReset);
  }
};
