import { SYSTEM_GROUPS, USER_GROUPS, isThresholdOperation } from "../state/thresholdContext.js";
import type { ThresholdOperation } from "../state/thresholdContext.js";
import type { MenuContext, MenuKind } from "./menuKinds.js";

export const INPUT_ISSUES = {
  free_text: "📝 free text",
  invalid_chars: "❌ forbidden characters",
  too_long: "❌ message too long",
  unsupported_media: "📎 unsupported content",
  wrong_format: "❌ wrong format (expected: min max)",
  not_numbers: "❌ values must be numbers",
  min_not_below_max: "❌ minimum must be lower than maximum",
  out_of_range: "❌ values outside the allowed range (-50°C to 100°C)",
  invalid_name: "❌ full name does not match the rules",
  invalid_position: "❌ job title is too short",
  save_failed: "💥 could not save",
  internal: "💥 internal error",
} as const;

export type InputIssue = keyof typeof INPUT_ISSUES;

export const DEFAULT_HEADLINE = "Unsupported message";

// Issues answered with "how to type the numbers" rather than "use text".
const THRESHOLD_FORMAT_ISSUES: ReadonlySet<InputIssue> = new Set<InputIssue>([
  "free_text",
  "invalid_chars",
  "wrong_format",
  "not_numbers",
  "min_not_below_max",
  "out_of_range",
]);

export const operationOf = (context: MenuContext): ThresholdOperation => {
  const declared = context.operation;
  if (declared && isThresholdOperation(declared)) return declared;
  if (context.groupKey === SYSTEM_GROUPS) return "all_system";
  if (context.groupKey === USER_GROUPS) return "all_user_groups";
  return context.deviceKey === "ALL" ? "whole_group" : "single_device";
};

export const thresholdGuidance = (context: MenuContext): string => {
  switch (operationOf(context)) {
    case "all_system":
      return "To set thresholds for every sensor in the system send: `min max`\nExample: `18 25`";
    case "all_user_groups":
      return "To set thresholds for all your sensors send: `min max`\nExample: `18 25`";
    case "whole_group":
      return `For group \`${context.groupKey}\` send the thresholds as: \`min max\`\nExample: \`18 25\``;
    case "single_device":
      return `For device \`${context.deviceKey}\` send the thresholds as: \`min max\`\nExample: \`10 35\``;
  }
};

const wizardGuidance = (step: string | undefined): string => {
  switch (step) {
    case "name":
      return "To register, send your full name: Last First Middle.";
    case "groups":
      return "Pick your groups with the buttons below, then press Finish.";
    case "position":
      return "Send your job title, for example: Director, Shift supervisor.";
    default:
      return "Continue the registration.";
  }
};

/** Error text for a rejected input, worded for the menu the user is looking at. */
export const composeRejection = (
  kind: MenuKind,
  context: MenuContext,
  issue: InputIssue,
  headline = DEFAULT_HEADLINE,
): string => {
  const detected = `Detected: ${INPUT_ISSUES[issue]}`;

  if (issue === "save_failed" || issue === "internal") {
    return `❌ *${headline}*\n\n${detected}\n\nPlease try again.`;
  }

  if (kind === "threshold_prompt") {
    if (THRESHOLD_FORMAT_ISSUES.has(issue)) {
      return `❌ *Invalid threshold values*\n\n${detected}\n\n${thresholdGuidance(context)}`;
    }
    return `❌ *${headline}*\n\n${detected}\n\nUse plain text messages to set thresholds.`;
  }

  if (kind === "wizard_step") {
    return `❌ *${headline}*\n\n${detected}\n\n${wizardGuidance(context.step)}`;
  }

  return `❌ *${headline}*\n\n${detected}\n\nUse the menu buttons to navigate.`;
};

/** Escapes user supplied text for Telegram's legacy Markdown. */
export const escapeMarkdown = (text: string): string => text.replace(/([_*`[])/g, "\\$1");
