import { describe, expect, it } from "vitest";

import { composeRejection, escapeMarkdown, operationOf, thresholdGuidance } from "./feedback.js";

describe("operationOf", () => {
  it("prefers the declared operation", () => {
    expect(operationOf({ operation: "whole_group", groupKey: "G1", deviceKey: "D7" })).toBe("whole_group");
  });

  it("falls back to the group and device keys", () => {
    expect(operationOf({ groupKey: "SYSTEM", deviceKey: "ALL" })).toBe("all_system");
    expect(operationOf({ groupKey: "USER", deviceKey: "ALL" })).toBe("all_user_groups");
    expect(operationOf({ groupKey: "G1", deviceKey: "ALL" })).toBe("whole_group");
    expect(operationOf({ groupKey: "G1", deviceKey: "D7" })).toBe("single_device");
  });
});

describe("thresholdGuidance", () => {
  it("names the group for a whole group prompt", () => {
    expect(thresholdGuidance({ groupKey: "G1", deviceKey: "ALL" })).toBe(
      "For group `G1` send the thresholds as: `min max`\nExample: `18 25`",
    );
  });
});

describe("composeRejection", () => {
  it("explains the number format on a device prompt", () => {
    const text = composeRejection(
      "threshold_prompt",
      { groupKey: "G1", deviceKey: "D7", operation: "single_device" },
      "wrong_format",
    );
    expect(text).toBe(
      "❌ *Invalid threshold values*\n\n" +
        "Detected: ❌ wrong format (expected: min max)\n\n" +
        "For device `D7` send the thresholds as: `min max`\nExample: `10 35`",
    );
  });

  it("asks for plain text when a prompt receives media", () => {
    expect(composeRejection("threshold_prompt", { groupKey: "USER" }, "unsupported_media")).toBe(
      "❌ *Unsupported message*\n\nDetected: 📎 unsupported content\n\nUse plain text messages to set thresholds.",
    );
  });

  it("repeats the step instructions inside the wizard", () => {
    expect(composeRejection("wizard_step", { step: "name" }, "invalid_name", "Invalid full name")).toBe(
      "❌ *Invalid full name*\n\nDetected: ❌ full name does not match the rules\n\n" +
        "To register, send your full name: Last First Middle.",
    );
  });

  it("asks to retry after a failed save", () => {
    expect(composeRejection("threshold_prompt", { groupKey: "G1" }, "save_failed", "Could not save thresholds")).toBe(
      "❌ *Could not save thresholds*\n\nDetected: 💥 could not save\n\nPlease try again.",
    );
  });

  it("points to the buttons everywhere else", () => {
    expect(composeRejection("main", {}, "free_text")).toBe(
      "❌ *Unsupported message*\n\nDetected: 📝 free text\n\nUse the menu buttons to navigate.",
    );
  });
});

describe("escapeMarkdown", () => {
  it("escapes legacy markdown entities", () => {
    expect(escapeMarkdown("a_b*c`d[e")).toBe("a\\_b\\*c\\`d\\[e");
  });
});
