import { describe, expect, it } from "vitest";
import { createCollectingLogger } from "../../../logging/insightLog.js";
import { areSimilar } from "../../similarity/areSimilar.js";
import { containsVagueLanguage } from "../../vague/vagueLanguage.js";
import { DEFAULT_DAILY_MESSAGE, DEFAULT_DAILY_SUMMARY, formatDailyInsight } from "../formatDailyInsight.js";

const first = () => 0;

function splitCard(card: string): { summary: string; why: string; rest: string[] } {
  const [summary, whyLine, ...rest] = card.split("\n\n");
  return { summary, why: whyLine.replace(/^Why: /, ""), rest };
}

describe("formatDailyInsight", () => {
  it("returns the default message for an empty payload", () => {
    expect(formatDailyInsight(undefined)).toBe(DEFAULT_DAILY_MESSAGE);
    expect(formatDailyInsight("   ")).toBe(DEFAULT_DAILY_MESSAGE);
    expect(formatDailyInsight(42)).toBe(DEFAULT_DAILY_MESSAGE);
  });

  it("regenerates a why that repeats the summary and drops a duplicate sign-off", () => {
    const { logger, events } = createCollectingLogger();
    const card = formatDailyInsight(
      {
        summary: "Pressure drops today.",
        why: "Pressure drops today.",
        comfort_tip: "Rest when needed.",
        sign_off: "Rest when needed.",
      },
      { logger }
    );

    expect(card).toBe(
      [
        "Pressure drops today.",
        "",
        "Why: Falling pressure can leave the body sluggish and slow to get going.",
        "",
        "Comfort tip: Rest when needed.",
      ].join("\n")
    );
    expect(events.map((e) => e.event)).toEqual([
      "insight.payload.parsed",
      "insight.why.regenerated",
      "insight.sign_off.dropped",
    ]);
  });

  it("reads a JSON string payload with nested fields", () => {
    const raw = JSON.stringify({
      daily_insight: {
        summary_sentence: "Humid air lingers today.",
        why_line: "Damp air can make breathing and movement effortful.",
        comfort_tip: "Sip warm water through the day.",
        sign_off: "Wishing you a steadier day ahead.",
      },
    });

    expect(formatDailyInsight(raw)).toBe(
      [
        "Humid air lingers today.",
        "",
        "Why: Damp air can make breathing and movement effortful.",
        "",
        "Comfort tip: Sip warm water through the day.",
        "",
        "Wishing you a steadier day ahead.",
      ].join("\n")
    );
  });

  it("prefers the why override and fills missing closing lines from the approved catalogs", () => {
    const card = formatDailyInsight(
      { summary: "Cooler air arrives today.", why: "Ignored." },
      { whyOverride: "Cooler air can make muscles stiff and tense.", random: first }
    );

    expect(card).toBe(
      [
        "Cooler air arrives today.",
        "",
        "Why: Cooler air can make muscles stiff and tense.",
        "",
        "Comfort tip: Chinese medicine suggests a few minutes of tai chi to ease muscle tension.",
        "",
        "Move at the pace that feels right.",
      ].join("\n")
    );
  });

  it("replaces a vague comfort tip unless it names a care tradition", () => {
    const base = { summary: "Cooler air arrives today.", why: "Cooler air can make muscles stiff and tense." };
    const { logger, events } = createCollectingLogger();

    const replaced = formatDailyInsight({ ...base, comfort_tip: "A bit of rest may help." }, { random: first, logger });
    expect(splitCard(replaced).rest[0]).toBe(
      "Comfort tip: Chinese medicine suggests a few minutes of tai chi to ease muscle tension."
    );
    expect(events.find((e) => e.event === "insight.comfort_tip.replaced")?.reason).toBe("comfort_tip_rules");

    const kept = formatDailyInsight({ ...base, comfort_tip: "Chinese medicine suggests rest, which may help." });
    expect(splitCard(kept).rest[0]).toBe("Comfort tip: Chinese medicine suggests rest, which may help.");
  });

  it("replaces a comfort tip over the word limit", () => {
    const longTip = Array.from({ length: 21 }, () => "rest").join(" ");
    const card = formatDailyInsight(
      { summary: "Cooler air arrives today.", why: "Cooler air can make muscles stiff and tense.", comfort_tip: longTip },
      { random: first }
    );
    expect(splitCard(card).rest[0]).toBe(
      "Comfort tip: Chinese medicine suggests a few minutes of tai chi to ease muscle tension."
    );
  });

  it("strips a sign-off repeated inside the comfort tip", () => {
    const card = formatDailyInsight({
      summary: "Cooler air arrives today.",
      why: "Cooler air can make muscles stiff and tense.",
      comfort_tip: "Stay warm today. Take things slowly.",
      sign_off: "Take things slowly.",
    });
    expect(splitCard(card).rest).toEqual(["Comfort tip: Stay warm today.", "Take things slowly."]);
  });

  it("drops a sign-off that repeats the summary", () => {
    const card = formatDailyInsight({
      summary: "Take it slow today.",
      why: "Cooler air can make muscles stiff and tense.",
      comfort_tip: "Stay warm.",
      sign_off: "Take it slow today.",
    });
    expect(card).toBe(
      ["Take it slow today.", "", "Why: Cooler air can make muscles stiff and tense.", "", "Comfort tip: Stay warm."].join(
        "\n"
      )
    );
  });

  it("falls back to the default summary when the summary is an app nudge", () => {
    const { logger, events } = createCollectingLogger();
    const card = formatDailyInsight(
      {
        summary: "Log how you feel in the app today.",
        why: "Cooler air can make muscles stiff and tense.",
        comfort_tip: "Stay warm.",
        sign_off: "Wishing you a steadier day ahead.",
      },
      { logger }
    );
    expect(splitCard(card).summary).toBe(DEFAULT_DAILY_SUMMARY);
    expect(events).toContainEqual({
      event: "insight.field.app_reference_dropped",
      field: "summary",
      reason: "app_reference",
    });
  });

  it("formats legacy text with a catalog why and an approved sign-off", () => {
    const card = formatDailyInsight(
      "Barometric pressure drops today. Humidity feels heavy. Jot it in the app.",
      { random: first }
    );
    expect(card).toBe(
      [
        "Pressure drops today.",
        "",
        "Why: Falling pressure can leave the body sluggish and slow to get going.",
        "",
        "Move at the pace that feels right.",
      ].join("\n")
    );
  });

  it("drops a legacy sentence that nudges toward the product", () => {
    const card = formatDailyInsight(
      "Log your symptoms in Flare. Pressure drops today. Stiff joints may ache as the air shifts.",
      { random: first }
    );
    expect(splitCard(card).summary).toBe("Pressure drops today.");
  });

  it("uses the default why for a one-sentence legacy text", () => {
    const card = formatDailyInsight("Cooler air today.", { random: first });
    expect(splitCard(card).why).toBe("Steady pressure can ease tension in stiff joints.");
  });

  it("never leaves a vague or repeated why", () => {
    const payloads: unknown[] = [
      { summary: "Humidity rises today.", why: "Humidity feels heavy and may affect you." },
      { summary: "Conditions feel gentle.", why: "Conditions feel gentle." },
      { summary: "Wind picks up.", why: "The wind picks up." },
      "Temperatures dip tonight. The air feels different.",
      { summary: "Steady pressure can ease tension in stiff joints.", why: "" },
      { summary: "Humidity lingers.", why: "Humid feels heavy" },
      { summary: "Pressure holds.", why: "Conditions could feel easier" },
    ];
    for (const payload of payloads) {
      const { summary, why } = splitCard(formatDailyInsight(payload, { random: first }));
      expect(containsVagueLanguage(why)).toBe(false);
      expect(areSimilar(summary, why)).toBe(false);
    }
  });
});
