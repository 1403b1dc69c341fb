import { describe, expect, it } from "vitest";
import { areSimilar } from "../areSimilar.js";

describe("areSimilar", () => {
  it("matches ignoring case and surrounding whitespace", () => {
    expect(areSimilar("Rest when needed.", "  rest when needed. ")).toBe(true);
  });

  it("matches when one text nearly contains the other", () => {
    expect(areSimilar("Pressure drops today", "Pressure drops today.")).toBe(true);
  });

  it("matches on word overlap regardless of order", () => {
    expect(areSimilar("cooler air makes joints stiff", "joints stiff cooler air makes")).toBe(true);
  });

  it("keeps unrelated lines apart", () => {
    expect(areSimilar("Rest", "Rest when needed today")).toBe(false);
    expect(areSimilar("", "Rest")).toBe(false);
  });

  it("uses the given thresholds", () => {
    expect(areSimilar("Rest when needed", "Rest when needed today")).toBe(true);
    expect(
      areSimilar("Rest when needed", "Rest when needed today", {
        similarity_containment_ratio: 0.9,
        similarity_jaccard_threshold: 0.9,
      })
    ).toBe(false);
  });

  it("is symmetric", () => {
    const pairs: [string, string][] = [
      ["Rest when needed.", "Rest when needed today."],
      ["Pressure drops today.", "Falling pressure can leave the body sluggish."],
      ["cooler air makes joints stiff", "joints stiff cooler air makes"],
      ["", "Rest"],
      ["Take short pauses.", "take short pauses"],
    ];
    for (const [a, b] of pairs) {
      expect(areSimilar(a, b)).toBe(areSimilar(b, a));
    }
  });
});
