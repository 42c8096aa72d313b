import { describe, expect, it } from "vitest";

import type { MenuScope } from "../auth/types.js";
import { buttons, callbackValues } from "../testing/fakes.js";
import { MAX_KEY_LENGTH } from "../validators.js";
import { callbackPatterns, isWizardCallback } from "./callbackData.js";
import {
  buildDefaultControls,
  buildMainKeyboard,
  buildRegistrationGroupsKeyboard,
  buildThresholdDevicesKeyboard,
  buildThresholdPromptKeyboard,
  isHelpSection,
} from "./keyboards.js";

const adminScope: MenuScope = {
  role: "admin",
  groups: ["G1", "G2"],
  allGroups: ["G1", "G2", "G3"],
  devicesByGroup: { G1: ["D7", "D8"], G2: [], G3: ["D1"] },
};

describe("buildMainKeyboard", () => {
  it("offers only registration to unregistered users", () => {
    expect(buttons(buildMainKeyboard("unregistered"))).toEqual([[["📝 Register", "reg:start"]]]);
  });

  it("lays out the admin menu", () => {
    expect(buttons(buildMainKeyboard("admin"))).toEqual([
      [
        ["📊 My data", "menu:mine"],
        ["🌡️ Groups", "menu:groups"],
      ],
      [
        ["⚙️ Thresholds", "thr:groups"],
        ["📈 Statistics", "menu:stats"],
      ],
      [["❓ Help", "menu:help"]],
    ]);
  });

  it("adds the administrator list for superadmins", () => {
    expect(callbackValues(buildMainKeyboard("superadmin"))).toContain("menu:admins");
    expect(callbackValues(buildMainKeyboard("admin"))).not.toContain("menu:admins");
  });
});

describe("buildThresholdPromptKeyboard", () => {
  it("goes back to the device list of a concrete group", () => {
    expect(buttons(buildThresholdPromptKeyboard({ groupKey: "G1", deviceKey: "D7" }))).toEqual([
      [["⬅️ Back to group", "thr:group:G1"]],
      [["🏠 Main menu", "menu:main"]],
    ]);
  });

  it("goes back to the group list for multi-group targets", () => {
    for (const groupKey of ["USER", "SYSTEM"]) {
      expect(buttons(buildThresholdPromptKeyboard({ groupKey, deviceKey: "ALL" }))[0]).toEqual([
        ["🔙 Back to groups", "thr:groups"],
      ]);
    }
  });
});

describe("buildThresholdDevicesKeyboard", () => {
  it("caps the device buttons at ten", () => {
    const devices = Array.from({ length: 12 }, (_, index) => `D${index + 1}`);
    const rows = buttons(buildThresholdDevicesKeyboard("G1", devices));

    expect(rows[0]).toEqual([["🔧 Whole group G1", "thr:set:G1:ALL"]]);
    expect(rows).toHaveLength(12);
    expect(rows[10]).toEqual([["🌡️ D10", "thr:set:G1:D10"]]);
    expect(rows[11]).toEqual([
      ["🔙 Back to groups", "thr:groups"],
      ["🏠 Main menu", "menu:main"],
    ]);
  });
});

describe("callback data size", () => {
  it("stays within 64 bytes for the longest keys", () => {
    const group = "G".repeat(MAX_KEY_LENGTH);
    const device = "D".repeat(MAX_KEY_LENGTH);
    const keyboards = [
      buildThresholdDevicesKeyboard(group, [device]),
      buildThresholdPromptKeyboard({ groupKey: group, deviceKey: device }),
      buildRegistrationGroupsKeyboard([group], [group]),
    ];

    const sizes = keyboards.flatMap((keyboard) => callbackValues(keyboard).map((data) => Buffer.byteLength(data)));
    expect(Math.max(...sizes)).toBe(63);
  });
});

describe("buildRegistrationGroupsKeyboard", () => {
  it("marks selected groups and enables finishing", () => {
    expect(buttons(buildRegistrationGroupsKeyboard(["South", "North"], ["North"]))).toEqual([
      [
        ["✅ North", "reg:toggle:North"],
        ["South", "reg:toggle:South"],
      ],
      [["✅ Finish selection (1)", "reg:finish"]],
      [["🔄 Start over", "reg:reset"]],
    ]);
  });

  it("asks for a selection when nothing is picked", () => {
    expect(buttons(buildRegistrationGroupsKeyboard(["North"], []))[1]).toEqual([
      ["⚠️ Pick at least one group", "reg:need"],
    ]);
  });

  it("shows a placeholder without groups", () => {
    expect(buttons(buildRegistrationGroupsKeyboard([], []))).toEqual([
      [["⚠️ Groups are temporarily unavailable", "noop"]],
    ]);
  });
});

describe("buildDefaultControls", () => {
  it("rebuilds the device list from the group in the context", () => {
    expect(callbackValues(buildDefaultControls("threshold_devices", { groupKey: "G1" }, adminScope))).toEqual([
      "thr:set:G1:ALL",
      "thr:set:G1:D7",
      "thr:set:G1:D8",
      "thr:groups",
      "menu:main",
    ]);
  });

  it("marks the open group in the group list", () => {
    expect(buttons(buildDefaultControls("group_info", { groupKey: "G2" }, adminScope))).toEqual([
      [
        ["G1", "group:G1"],
        ["✅G2", "group:G2"],
      ],
      [["🌐 All data", "menu:all"]],
      [["⬅️ Back", "menu:main"]],
    ]);
  });

  it("restores the wizard selection from the context", () => {
    const controls = buildDefaultControls("wizard_step", { step: "groups", selected: "G3,G1" }, adminScope);
    expect(buttons(controls)[0]).toEqual([
      ["✅ G1", "reg:toggle:G1"],
      ["G2", "reg:toggle:G2"],
      ["✅ G3", "reg:toggle:G3"],
    ]);
    expect(buttons(controls)[1]).toEqual([["✅ Finish selection (2)", "reg:finish"]]);
  });

  it("offers a restart on the text steps of the wizard", () => {
    expect(buttons(buildDefaultControls("wizard_step", { step: "name" }, adminScope))).toEqual([
      [["🔄 Start over", "reg:reset"]],
    ]);
  });

  it("lists the user's groups on the threshold menu", () => {
    expect(callbackValues(buildDefaultControls("threshold_groups", {}, adminScope))).toEqual([
      "thr:group:G1",
      "thr:group:G2",
      "thr:user",
      "menu:main",
    ]);
  });
});

describe("callback data", () => {
  it("splits the group and device of a threshold target", () => {
    const match = "thr:set:G1:D7".match(callbackPatterns.thresholdSet);
    expect(match?.slice(1)).toEqual(["G1", "D7"]);
  });

  it("recognises wizard buttons and help topics", () => {
    expect(isWizardCallback("reg:toggle:G1")).toBe(true);
    expect(isWizardCallback("menu:main")).toBe(false);
    expect(isHelpSection("thresholds")).toBe(true);
    expect(isHelpSection("toString")).toBe(false);
  });
});
