import { describe, expect, it } from "vitest";
import { classifyRisk } from "../classifyRisk.js";

describe("classifyRisk", () => {
  it("treats a stable pattern as low", () => {
    expect(classifyRisk("Stable pressure keeps things calm")).toBe("low");
  });

  it("treats a risk marker as elevated", () => {
    expect(classifyRisk("Rising humidity may cause stiff joints")).toBe("elevated");
  });

  it("lets an explicit low marker win over risk markers", () => {
    expect(classifyRisk("Moderate breeze but low flare risk")).toBe("low");
  });

  it("treats gentle and mild as low", () => {
    expect(classifyRisk("Gentle and mild conditions")).toBe("low");
  });

  it("treats embedded weather detail as elevated", () => {
    expect(classifyRisk("Cooler air — joints ache")).toBe("elevated");
    expect(classifyRisk("Humidity climbs")).toBe("elevated");
  });

  it("does not read a hyphenated word as a joined clause", () => {
    expect(classifyRisk("A low-key day")).toBe("low");
    expect(classifyRisk("Cooler air - joints ache")).toBe("elevated");
  });

  it("defaults to low", () => {
    expect(classifyRisk("Clear skies")).toBe("low");
    expect(classifyRisk("Highlights of the week")).toBe("low");
  });
});
