/**
 * Structured logging for insight formatting events.
 *
 * Formatters never log on their own: they receive an InsightLogger and the
 * default one is silent, so formatting stays free of side effects. Tools that
 * want observability pass `insightLog`, which emits one JSON line per event.
 */

export type InsightLogEvent =
  | "insight.payload.parsed"
  | "insight.daily.default_message"
  | "insight.field.app_reference_dropped"
  | "insight.field.defaulted"
  | "insight.why.vague_rewritten"
  | "insight.why.regenerated"
  | "insight.comfort_tip.replaced"
  | "insight.comfort_tip.dropped"
  | "insight.sign_off.dropped"
  | "insight.weekly.summary_repaired"
  | "insight.weekly.days_padded";

export type InsightLogData = {
  event: InsightLogEvent;
  field?: string;
  payload_kind?: string;
  reason?: string;
  count?: number;
  [key: string]: unknown;
};

export type InsightLogger = (data: InsightLogData) => void;

/**
 * Emit a structured log entry as a single JSON line.
 */
export function insightLog(data: InsightLogData): void {
  const logEntry = {
    timestamp: new Date().toISOString(),
    ...data,
  };

  console.log(JSON.stringify(logEntry));
}

export const silentInsightLogger: InsightLogger = () => {};

/**
 * Collects events in memory. Used by tools that report a summary and by tests.
 */
export function createCollectingLogger(): { logger: InsightLogger; events: InsightLogData[] } {
  const events: InsightLogData[] = [];
  return {
    logger: (data) => {
      events.push(data);
    },
    events,
  };
}
