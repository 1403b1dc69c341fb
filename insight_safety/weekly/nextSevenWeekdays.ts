export const WEEKDAY_ABBREVIATIONS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"] as const;
export const WEEKDAY_NAMES = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"] as const;

export type WeekdayAbbreviation = (typeof WEEKDAY_ABBREVIATIONS)[number];

/**
 * Day of week (0 = Sunday) of `date` in `timeZone`, or in the host zone when
 * none is given or the zone is unknown.
 */
function dayOfWeek(date: Date, timeZone?: string): number {
  if (timeZone === undefined) return date.getDay();
  try {
    const weekday = new Intl.DateTimeFormat("en-US", { timeZone, weekday: "long" }).format(date);
    const index = WEEKDAY_NAMES.findIndex((name) => name === weekday);
    return index >= 0 ? index : date.getDay();
  } catch {
    return date.getDay();
  }
}

/**
 * Abbreviations for the seven days after `referenceDate`, starting tomorrow.
 * Rotates a fixed list rather than adding days to a Date, so DST changes
 * cannot skip or repeat a day.
 */
export function nextSevenWeekdays(referenceDate: Date, timeZone?: string): WeekdayAbbreviation[] {
  const date = Number.isNaN(referenceDate.getTime()) ? new Date() : referenceDate;
  const today = dayOfWeek(date, timeZone);
  return Array.from({ length: 7 }, (_, offset) => WEEKDAY_ABBREVIATIONS[(today + offset + 1) % 7]);
}

export function weekdayName(abbreviation: WeekdayAbbreviation): string {
  return WEEKDAY_NAMES[WEEKDAY_ABBREVIATIONS.indexOf(abbreviation)];
}
