export const MENU_KINDS = [
  "main",
  "help",
  "my_data",
  "group_list",
  "group_info",
  "threshold_groups",
  "threshold_devices",
  "threshold_prompt",
  "wizard_step",
  "stats",
  "admin_list",
] as const;

export type MenuKind = (typeof MENU_KINDS)[number];

/**
 * Semantic parameters of a rendered menu. Keys in use: `groupKey`,
 * `deviceKey`, `operation`, `step`, `selected` (comma-joined group keys).
 */
export type MenuContext = Readonly<Record<string, string>>;
