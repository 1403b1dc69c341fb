import { describe, expect, it } from "vitest";
import { sanitizeInsightText } from "../sanitizeInsightText.js";

describe("sanitizeInsightText", () => {
  it("returns an empty string for empty input", () => {
    expect(sanitizeInsightText("")).toBe("");
  });

  it("removes measurements together with their connective words", () => {
    expect(sanitizeInsightText("Temps near 65°F with humidity around 70% today.")).toBe(
      "Temps with humidity today."
    );
  });

  it("strips emphasis and line-break markup", () => {
    expect(sanitizeInsightText("**Pressure** steady at 1012 hPa.<br>Rest when needed.")).toBe(
      "Pressure steady. Rest when needed."
    );
  });

  it("drops the card header and a leading bullet", () => {
    expect(sanitizeInsightText("☀️ Daily Insight: - cooler air today")).toBe("Cooler air today");
  });

  it("removes jargon and directive phrasing", () => {
    expect(sanitizeInsightText("Barometric shifts ahead, you should rest.")).toBe("Shifts ahead, rest.");
  });

  it("re-capitalises sentences", () => {
    expect(sanitizeInsightText("rest now. then go!")).toBe("Rest now. Then go!");
  });

  it("is idempotent", () => {
    const inputs = [
      "Temps near 65°F with humidity around 70% today.",
      "Humidity around 80 percent, temps 60-70°F, and pressure 1010 mb.",
      "**Pressure** steady at 1012 hPa.<br>Rest when needed.",
      "- • _Cooler_ air , , try to rest ..",
      "You must. You should. Try to.",
      "☀️ Daily Insight:",
      "Isobars tighten along the trough; dew point near 12°C.",
    ];
    for (const input of inputs) {
      const once = sanitizeInsightText(input);
      expect(sanitizeInsightText(once)).toBe(once);
    }
  });
});
