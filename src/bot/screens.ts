import type { InlineKeyboard } from "grammy";

import type { MenuScope } from "../auth/types.js";
import { escapeMarkdown, operationOf } from "../menu/feedback.js";
import { buildDefaultControls, HELP_SECTIONS, type HelpSection } from "../menu/keyboards.js";
import type { MenuContext, MenuKind } from "../menu/menuKinds.js";
import type { WizardState, WizardStep } from "../state/wizardMachine.js";
import type { AdminRecord } from "../store/types.js";
import type { ThresholdTarget } from "../thresholds/thresholdService.js";
import type { ThresholdPair } from "../validators.js";

export interface Screen {
  text: string;
  kind: MenuKind;
  context: MenuContext;
  controls: InlineKeyboard;
}

const screen = (scope: MenuScope, kind: MenuKind, text: string, context: MenuContext = {}): Screen => ({
  text,
  kind,
  context,
  controls: buildDefaultControls(kind, context, scope),
});

const band = (pair: ThresholdPair): string => `${pair.min}°C … ${pair.max}°C`;

export const mainScreen = (scope: MenuScope, headline?: string): Screen => {
  const intro =
    scope.role === "unregistered"
      ? "👋 *Welcome!*\n\nRegister to get access to warehouse temperature monitoring."
      : "🏠 *Main menu*\n\nChoose an action:";
  return screen(scope, "main", headline ? `${headline}\n\n${intro}` : intro);
};

export const helpScreen = (scope: MenuScope): Screen =>
  screen(scope, "help", "❓ *Help*\n\nPick a topic below.");

const HELP_TEXT: Record<HelpSection, string> = {
  usage:
    "📖 *Usage*\n\nEverything is driven by the buttons of the menu message. " +
    "Typed text is only read while the bot asks for it.",
  thresholds:
    "🌡️ *Thresholds*\n\nOpen ⚙️ Thresholds, pick a group and a device (or the whole group), " +
    "then send two numbers: `min max`, for example `18 25`. Allowed range: -50°C to 100°C.",
  registration:
    "📝 *Registration*\n\nThree steps: full name, work groups, job title. " +
    "Send /reset to start over.",
};

export const helpSectionScreen = (scope: MenuScope, section: HelpSection): Screen =>
  screen(scope, "help", `${HELP_TEXT[section]}\n\n_${HELP_SECTIONS[section]}_`);

export const myDataScreen = (
  scope: MenuScope,
  record: AdminRecord | null,
  bands: Record<string, ThresholdPair>,
): Screen => {
  const lines = ["📊 *My data*", ""];
  if (record) {
    lines.push(`👤 ${escapeMarkdown(record.name)}`, `💼 ${escapeMarkdown(record.position)}`);
  }
  lines.push(`🔐 Role: ${scope.role}`, "");
  if (scope.groups.length === 0) {
    lines.push("No groups assigned.");
  }
  for (const group of scope.groups) {
    const pair = bands[group];
    lines.push(`🏢 ${escapeMarkdown(group)}${pair ? `: ${band(pair)}` : ""}`);
  }
  return screen(scope, "my_data", lines.join("\n"));
};

export const groupListScreen = (scope: MenuScope): Screen =>
  screen(scope, "group_list", "🌡️ *Groups*\n\nPick a group to see its devices:");

export const allDataScreen = (scope: MenuScope): Screen => {
  const lines = ["🌐 *All data*", ""];
  for (const group of scope.groups) {
    const count = scope.devicesByGroup[group]?.length ?? 0;
    lines.push(`🏢 ${escapeMarkdown(group)}: ${count} device(s)`);
  }
  if (scope.groups.length === 0) lines.push("No groups available.");
  return screen(scope, "group_list", lines.join("\n"));
};

export const groupInfoScreen = (
  scope: MenuScope,
  group: string,
  devices: Array<{ deviceKey: string; band: ThresholdPair }>,
): Screen => {
  const lines = [`🏢 *Group ${escapeMarkdown(group)}*`, ""];
  for (const device of devices) {
    lines.push(`🌡️ \`${device.deviceKey}\`: ${band(device.band)}`);
  }
  if (devices.length === 0) lines.push("No devices in this group.");
  return screen(scope, "group_info", lines.join("\n"), { groupKey: group });
};

export interface BotStats {
  activeMenus: number;
  menusByKind: Partial<Record<MenuKind, number>>;
  registrations: Partial<Record<WizardStep, number>>;
  pendingThresholds: number;
  admins: number;
  devices: number;
}

export const statsScreen = (scope: MenuScope, stats: BotStats): Screen => {
  const kinds = Object.entries(stats.menusByKind)
    .map(([kind, count]) => `${kind}: ${count}`)
    .join(", ");
  const steps = Object.entries(stats.registrations)
    .map(([step, count]) => `${step}: ${count}`)
    .join(", ");
  const text = [
    "📈 *Statistics*",
    "",
    `👥 Administrators: ${stats.admins}`,
    `🌡️ Devices: ${stats.devices}`,
    `🪟 Live menus: ${stats.activeMenus}${kinds ? ` (${escapeMarkdown(kinds)})` : ""}`,
    `📝 Registrations in progress: ${steps ? escapeMarkdown(steps) : "none"}`,
    `⏳ Pending threshold prompts: ${stats.pendingThresholds}`,
  ].join("\n");
  return screen(scope, "stats", text);
};

export const adminListScreen = (scope: MenuScope, admins: AdminRecord[]): Screen => {
  const lines = ["👥 *Administrators*", ""];
  for (const admin of admins) {
    lines.push(
      `• ${escapeMarkdown(admin.name)} (${escapeMarkdown(admin.position)}), ${admin.role}: ${escapeMarkdown(admin.groups.join(", "))}`,
    );
  }
  if (admins.length === 0) lines.push("Nobody has registered yet.");
  return screen(scope, "admin_list", lines.join("\n"));
};

export const thresholdGroupsScreen = (scope: MenuScope): Screen => {
  const text =
    scope.role === "superadmin"
      ? "⚙️ *Thresholds (superadmin)*\n\nPick a group:"
      : "⚙️ *Thresholds*\n\nPick one of your groups:";
  return screen(scope, "threshold_groups", text);
};

export const thresholdDevicesScreen = (scope: MenuScope, group: string): Screen => {
  const count = scope.devicesByGroup[group]?.length ?? 0;
  return screen(
    scope,
    "threshold_devices",
    `🌡️ *Group ${escapeMarkdown(group)}*\n\nDevices: ${count}\nPick a device or set the band for the whole group:`,
    { groupKey: group },
  );
};

export const thresholdContext = (target: ThresholdTarget): MenuContext => ({
  groupKey: target.groupKey,
  deviceKey: target.deviceKey,
  operation: target.operation,
});

const promptSuffix = "📝 Send the new values as:\n`min max`\nFor example: `18 25`";

const promptHeader = (scope: MenuScope, target: ThresholdTarget, current: ThresholdPair): string => {
  switch (operationOf(thresholdContext(target))) {
    case "single_device":
      return `⚙️ *Device* \`${target.deviceKey}\`\n🏢 Group: ${escapeMarkdown(target.groupKey)}\n\nCurrent band: ${band(current)}`;
    case "whole_group":
      return `⚙️ *Whole group ${escapeMarkdown(target.groupKey)}*\n\nCurrent band: ${band(current)}`;
    case "all_user_groups":
      return `⚙️ *All my groups*\n\n${escapeMarkdown(scope.groups.join(", "))}`;
    case "all_system":
      return `⚙️ *Whole system*\n\nGroups: ${scope.allGroups.length}`;
  }
};

export const thresholdPromptScreen = (scope: MenuScope, target: ThresholdTarget, current: ThresholdPair): Screen =>
  screen(
    scope,
    "threshold_prompt",
    `${promptHeader(scope, target, current)}\n\n${promptSuffix}`,
    thresholdContext(target),
  );

export const thresholdSavedText = (target: ThresholdTarget, pair: ThresholdPair, groups: string[]): string => {
  const lines = ["✅ *Thresholds updated*", ""];
  switch (target.operation) {
    case "single_device":
      lines.push(`🌡️ Device: \`${target.deviceKey}\``, `🏢 Group: ${escapeMarkdown(target.groupKey)}`);
      break;
    case "whole_group":
      lines.push(`🏢 Group: ${escapeMarkdown(target.groupKey)}`);
      break;
    case "all_user_groups":
      lines.push(`🗂 Groups: ${escapeMarkdown(groups.join(", "))}`);
      break;
    case "all_system":
      lines.push(`🌐 All groups (${groups.length})`);
      break;
  }
  lines.push(`🌡️ Minimum: ${pair.min}°C`, `🌡️ Maximum: ${pair.max}°C`);
  return lines.join("\n");
};

export const wizardContext = (state: WizardState): MenuContext =>
  state.step === "groups" ? { step: "groups", selected: [...state.groups].join(",") } : { step: state.step };

export const wizardNameScreen = (scope: MenuScope): Screen =>
  screen(
    scope,
    "wizard_step",
    "👋 *Registration*\n\n🔹 *Step 1/3: send your full name*\n\n" +
      "• 3 to 5 words (Last First Middle)\n• 2 to 15 letters each\n• every word starts with a capital letter\n\n" +
      "Example: Smith John Robert",
    { step: "name" },
  );

export const wizardGroupsScreen = (scope: MenuScope, state: WizardState): Screen =>
  screen(
    scope,
    "wizard_step",
    `✅ *Name saved:* ${escapeMarkdown(state.name)}\n\n🔹 *Step 2/3: pick your work groups*\n\n` +
      `Groups in the system: ${scope.allGroups.length}\nSelected: ${state.groups.size}\n\n` +
      "Tap groups to select them, then press *Finish selection*.",
    wizardContext(state),
  );

export const wizardPositionScreen = (scope: MenuScope, state: WizardState): Screen =>
  screen(
    scope,
    "wizard_step",
    `✅ *Name:* ${escapeMarkdown(state.name)}\n✅ *Groups:* ${escapeMarkdown([...state.groups].join(", "))}\n\n` +
      "🔹 *Step 3/3: send your job title*\n\nAt least 2 characters.",
    { step: "position" },
  );

export const wizardScreenFor = (scope: MenuScope, state: WizardState): Screen => {
  switch (state.step) {
    case "name":
      return wizardNameScreen(scope);
    case "groups":
      return wizardGroupsScreen(scope, state);
    case "position":
    case "completed":
      return wizardPositionScreen(scope, state);
  }
};

export const registrationDoneScreen = (scope: MenuScope, record: AdminRecord): Screen =>
  mainScreen(
    scope,
    "🎉 *Registration complete!*\n\n" +
      `👤 ${escapeMarkdown(record.name)}\n💼 ${escapeMarkdown(record.position)}\n` +
      `🏢 ${escapeMarkdown(record.groups.join(", "))}\n🔐 Role: ${scope.role}`,
  );
