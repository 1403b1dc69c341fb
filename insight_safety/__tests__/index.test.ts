import { describe, expect, it } from "vitest";
import * as insightSafety from "../index.js";

describe("public entry point", () => {
  it("exposes both formatters", () => {
    expect(insightSafety.formatDailyInsight("")).toBe(insightSafety.DEFAULT_DAILY_MESSAGE);
    expect(
      insightSafety.formatWeeklyInsight(undefined, { referenceDate: new Date("2024-05-06T12:00:00Z"), timeZone: "UTC" })
        .days
    ).toHaveLength(7);
  });

  it("exposes the pipeline components", () => {
    expect(insightSafety.formatDayDetail("Stable pressure keeps things calm")).toBe(insightSafety.LOW_FLARE_RISK);
    expect(insightSafety.areSimilar("Rest when needed.", "rest when needed.")).toBe(true);
    expect(insightSafety.classifyWeatherFactor("Gusty afternoon")).toBe("wind");
  });
});
