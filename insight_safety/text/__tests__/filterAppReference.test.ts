import { describe, expect, it } from "vitest";
import { filterAppReference } from "../filterAppReference.js";

describe("filterAppReference", () => {
  it("drops an instruction aimed at the app", () => {
    expect(filterAppReference("Take one minute to jot how you feel in the app.")).toBeUndefined();
    expect(filterAppReference("Log your symptoms so the app can learn.")).toBeUndefined();
  });

  it("drops a one-minute jotting prompt even without naming the app", () => {
    expect(filterAppReference("Take one minute to jot down how your joints feel.")).toBeUndefined();
  });

  it("passes weather content through unchanged", () => {
    expect(filterAppReference("Cooler air can make muscles stiff.")).toBe("Cooler air can make muscles stiff.");
  });

  it("keeps a self-reference that carries no instruction", () => {
    expect(filterAppReference("The app shows cooler air today.")).toBe("The app shows cooler air today.");
  });

  it("drops a nudge that names the product", () => {
    expect(filterAppReference("Log how you feel in Flare tonight.")).toBeUndefined();
    expect(filterAppReference("Drop a quick update in Flare so the guidance stays personal.")).toBeUndefined();
  });

  it("does not read flare risk or flare-ups as the product", () => {
    expect(filterAppReference("Log how you feel: low flare risk today.")).toBe("Log how you feel: low flare risk today.");
    expect(filterAppReference("Jot down any flare-ups.")).toBe("Jot down any flare-ups.");
  });

  it("matches configured product names", () => {
    expect(filterAppReference("Teach SkyCare what matters most.", ["skycare"])).toBeUndefined();
    expect(filterAppReference("Teach SkyCare what matters most.")).toBe("Teach SkyCare what matters most.");
  });
});
