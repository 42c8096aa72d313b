export const callbackData = {
  main: "menu:main",
  help: "menu:help",
  myData: "menu:mine",
  groups: "menu:groups",
  allData: "menu:all",
  stats: "menu:stats",
  admins: "menu:admins",
  noop: "noop",
  groupInfo: (group: string) => `group:${group}`,
  helpSection: (section: string) => `help:${section}`,
  thresholdGroups: "thr:groups",
  thresholdUser: "thr:user",
  thresholdSystem: "thr:system",
  thresholdGroup: (group: string) => `thr:group:${group}`,
  thresholdSet: (group: string, device: string) => `thr:set:${group}:${device}`,
  regStart: "reg:start",
  regFinish: "reg:finish",
  regNeedGroup: "reg:need",
  regReset: "reg:reset",
  regToggle: (group: string) => `reg:toggle:${group}`,
} as const;

export const callbackPatterns = {
  groupInfo: /^group:(.+)$/,
  helpSection: /^help:(.+)$/,
  thresholdGroup: /^thr:group:(.+)$/,
  thresholdSet: /^thr:set:([^:]+):(.+)$/,
  regToggle: /^reg:toggle:(.+)$/,
} as const;

export const isWizardCallback = (data: string): boolean => data.startsWith("reg:");
