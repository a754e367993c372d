const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
] as const;

// Month, day, year, then either H[:MM] with an optional meridiem or noon/midnight.
const LAST_CHANGE_PATTERN =
  /^([a-z]+)\.?\s+(\d{1,2})\s+(\d{4})\s+(?:(noon|midnight)|(\d{1,2})(?::(\d{2}))?\s*(a\.?\s?m\.?|p\.?\s?m\.?)?)$/;

function monthIndex(token: string): number | undefined {
  if (token === "sept") {
    return 8;
  }
  const index = MONTHS.findIndex((month) => month === token || (token.length === 3 && month.startsWith(token)));
  return index >= 0 ? index : undefined;
}

function toHour24(hour: number, meridiem: string | undefined): number | undefined {
  if (!meridiem) {
    return hour <= 23 ? hour : undefined;
  }
  if (hour < 1 || hour > 12) {
    return undefined;
  }
  const isPm = meridiem.startsWith("p");
  if (hour === 12) {
    return isPm ? 12 : 0;
  }
  return isPm ? hour + 12 : hour;
}

/**
 * Parses the registry's "Last Change" text, e.g. `January 5, 2024, 10:30`,
 * `Jan. 5, 2024, 10:30 a.m.` or `Sept. 14, 2023, noon`, as a UTC timestamp.
 * Returns undefined for anything else.
 */
export function parseLastChange(raw: string): Date | undefined {
  const normalized = raw.replace(/,/g, " ").replace(/\s+/g, " ").trim().toLowerCase();
  const match = LAST_CHANGE_PATTERN.exec(normalized);
  if (!match) {
    return undefined;
  }

  const [, monthToken, dayText, yearText, namedTime, hourText, minuteText, meridiem] = match;
  const month = monthIndex(monthToken);
  if (month === undefined) {
    return undefined;
  }

  const day = Number.parseInt(dayText, 10);
  const year = Number.parseInt(yearText, 10);
  let hour: number | undefined;
  let minute = 0;
  if (namedTime) {
    hour = namedTime === "noon" ? 12 : 0;
  } else {
    hour = toHour24(Number.parseInt(hourText, 10), meridiem);
    minute = minuteText ? Number.parseInt(minuteText, 10) : 0;
  }
  if (hour === undefined || minute > 59) {
    return undefined;
  }

  const parsed = new Date(Date.UTC(year, month, day, hour, minute));
  // Date.UTC rolls over out-of-range days (Feb 30 -> Mar 2); reject those.
  if (parsed.getUTCMonth() !== month || parsed.getUTCDate() !== day) {
    return undefined;
  }
  return parsed;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Formats as `YYYY-MM-DD-HH-MM`, the form used in archive names. */
export function formatLastChange(date: Date): string {
  return [
    date.getUTCFullYear(),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
  ].join("-");
}
