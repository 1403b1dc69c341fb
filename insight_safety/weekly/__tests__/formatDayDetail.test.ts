import { describe, expect, it } from "vitest";
import { classifyRisk } from "../../classification/classifyRisk.js";
import { formatDayDetail } from "../formatDayDetail.js";

describe("formatDayDetail", () => {
  it("collapses a quiet day to low flare risk", () => {
    expect(classifyRisk("Stable pressure keeps things calm")).toBe("low");
    expect(formatDayDetail("Stable pressure keeps things calm")).toBe("low flare risk");
  });

  it("keeps an elevated day's sanitized wording", () => {
    expect(classifyRisk("Rising humidity may cause stiff joints")).toBe("elevated");
    expect(formatDayDetail("Rising humidity may cause stiff joints")).toBe("Rising humidity may cause stiff joints");
  });

  it("strips leading bullets and numbering", () => {
    expect(formatDayDetail("• Moderate risk — cooler air")).toBe("Moderate risk — cooler air");
    expect(formatDayDetail("1) Humid afternoon")).toBe("Humid afternoon");
  });

  it("collapses a low-risk descriptor", () => {
    expect(formatDayDetail("Low flare risk — steady pressure")).toBe("low flare risk");
  });

  it("removes measurements from kept details", () => {
    expect(formatDayDetail("Humidity near 85% — joints may be stiff")).toBe("Humidity — joints may be stiff");
  });

  it("treats empty text as low flare risk", () => {
    expect(formatDayDetail("  ")).toBe("low flare risk");
  });
});
