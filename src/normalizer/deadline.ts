import * as chrono from "chrono-node";
import { DateTime } from "luxon";

export interface ResolvedTime {
  dateTime: DateTime;
  /** Zone the value was resolved in: IANA name, "UTC", or a fixed offset such as "UTC-8". */
  zone: string;
  hasTime: boolean;
}

const AFTER_CLOCK = String.raw`(?:\d(?:\s*[ap]m)?|\bnoon|\bmidnight)\s*`;

const ZONE_ABBREVIATIONS: ReadonlyArray<[RegExp, string]> = [
  [new RegExp(String.raw`${AFTER_CLOCK}(?:pt|pst|pdt)\b`, "i"), "America/Los_Angeles"],
  [new RegExp(String.raw`${AFTER_CLOCK}(?:mt|mst|mdt)\b`, "i"), "America/Denver"],
  [new RegExp(String.raw`${AFTER_CLOCK}(?:ct|cst|cdt)\b`, "i"), "America/Chicago"],
  [new RegExp(String.raw`${AFTER_CLOCK}(?:et|est|edt)\b`, "i"), "America/New_York"],
  [new RegExp(String.raw`${AFTER_CLOCK}(?:utc|gmt)\b`, "i"), "UTC"],
];

const WEEKDAYS: Record<string, number> = {
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6,
  sunday: 7,
};

const WEEKDAY_RE = /\b(monday|tuesday|wednesday|thursday|friday|saturday|sunday)\b/;
const CLOCK_12H = /\b(\d{1,2})(?::(\d{2}))?\s*(am|pm)\b/;
const CLOCK_24H = /\b(\d{1,2}):(\d{2})\b/;
const ISO_DATETIME =
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

export function isValidZone(zone: string): boolean {
  return DateTime.fromMillis(0, { zone }).isValid;
}

export function zoneForText(text: string, defaultZone: string): string {
  for (const [pattern, zone] of ZONE_ABBREVIATIONS) {
    if (pattern.test(text)) return zone;
  }
  return isValidZone(defaultZone) ? defaultZone : "UTC";
}

export function clockComponents(text: string): { hour: number; minute: number } | null {
  const lower = text.toLowerCase();
  if (lower.includes("noon")) return { hour: 12, minute: 0 };
  if (lower.includes("midnight")) return { hour: 0, minute: 0 };
  if (/\beod\b|end of (?:the )?(?:day|week|month)/.test(lower)) return { hour: 17, minute: 0 };

  const twelve = CLOCK_12H.exec(lower);
  if (twelve) {
    const hour = Number(twelve[1]);
    const minute = Number(twelve[2] ?? 0);
    if (hour >= 1 && hour <= 12 && minute <= 59) {
      const base = hour % 12;
      return { hour: twelve[3] === "pm" ? base + 12 : base, minute };
    }
  }

  const twentyFour = CLOCK_24H.exec(lower);
  if (twentyFour) {
    const hour = Number(twentyFour[1]);
    const minute = Number(twentyFour[2]);
    if (hour <= 23 && minute <= 59) return { hour, minute };
  }
  return null;
}

/** ISO-8601 text. With an offset it keeps its own; without one it is read in `defaultZone`. */
export function resolveIso(text: string, defaultZone: string): ResolvedTime | null {
  const trimmed = text.trim();
  const match = ISO_DATETIME.exec(trimmed);
  if (!match) return null;

  const normalized = trimmed.replace(" ", "T");
  const hasTime = normalized.includes("T");
  if (match[1]) {
    const dateTime = DateTime.fromISO(normalized, { setZone: true });
    if (!dateTime.isValid) return null;
    return { dateTime, zone: dateTime.zoneName ?? "UTC", hasTime };
  }

  const zone = isValidZone(defaultZone) ? defaultZone : "UTC";
  const dateTime = DateTime.fromISO(normalized, { zone });
  return dateTime.isValid ? { dateTime, zone, hasTime } : null;
}

function dayFromKeywords(lower: string, base: DateTime): DateTime | null {
  if (/\b(?:today|tonight|eod)\b|end of (?:the )?day/.test(lower)) return base;
  if (/\btomorrow\b/.test(lower)) return base.plus({ days: 1 });
  if (/end of (?:the )?week/.test(lower)) {
    // Friday of the current week; on a weekend, the coming Friday
    return base.plus({ days: (5 - base.weekday + 7) % 7 });
  }
  if (/end of (?:the )?month/.test(lower)) return base.endOf("month").startOf("day");

  const weekday = WEEKDAY_RE.exec(lower);
  if (!weekday) return null;
  let delta = (WEEKDAYS[weekday[1]] - base.weekday + 7) % 7;
  if (delta === 0) delta = 7;
  if (/\bnext\b/.test(lower)) delta += 7;
  return base.plus({ days: delta });
}

function resolveWithChrono(text: string, reference: Date, zone: string): ResolvedTime | null {
  const referenceLocal = DateTime.fromJSDate(reference, { zone: "utc" }).setZone(zone);
  const results = chrono.parse(
    text,
    { instant: reference, timezone: referenceLocal.offset },
    { forwardDate: true }
  );
  const parsed = results[0]?.start;
  if (!parsed) return null;

  const hasTime = parsed.isCertain("hour");
  if (parsed.isCertain("timezoneOffset")) {
    const dateTime = DateTime.fromJSDate(parsed.date(), { zone: "utc" }).setZone(zone);
    return dateTime.isValid ? { dateTime, zone, hasTime } : null;
  }

  const year = parsed.get("year");
  const month = parsed.get("month");
  const day = parsed.get("day");
  if (year == null || month == null || day == null) return null;

  const dateTime = DateTime.fromObject(
    {
      year,
      month,
      day,
      hour: hasTime ? parsed.get("hour") ?? 0 : 0,
      minute: hasTime ? parsed.get("minute") ?? 0 : 0,
      second: 0,
    },
    { zone }
  );
  return dateTime.isValid ? { dateTime, zone, hasTime } : null;
}

/**
 * Resolve a natural-language time phrase against `reference`. Day keywords
 * and weekday names are handled directly; anything else goes to chrono.
 */
export function resolvePhrase(text: string, reference: Date, defaultZone: string): ResolvedTime | null {
  const trimmed = text.trim();
  if (!trimmed) return null;

  const zone = zoneForText(trimmed, defaultZone);
  const base = DateTime.fromJSDate(reference, { zone: "utc" }).setZone(zone);
  if (!base.isValid) return null;

  const lower = trimmed.toLowerCase();
  const day = dayFromKeywords(lower, base);
  if (day) {
    const clock = clockComponents(lower);
    const dateTime = day.set({
      hour: clock?.hour ?? 0,
      minute: clock?.minute ?? 0,
      second: 0,
      millisecond: 0,
    });
    return { dateTime, zone, hasTime: clock !== null };
  }

  return resolveWithChrono(trimmed, reference, zone);
}

/** Four-digit years only; anything else has no plain ISO-8601 form. */
function isRepresentable(dateTime: DateTime): boolean {
  return dateTime.isValid && dateTime.year >= 0 && dateTime.year <= 9999;
}

export function resolveDateText(text: string, reference: Date, defaultZone: string): ResolvedTime | null {
  const resolved = resolveIso(text, defaultZone) ?? resolvePhrase(text, reference, defaultZone);
  return resolved && isRepresentable(resolved.dateTime) ? resolved : null;
}

/** ISO-8601 with offset, or a bare date when `dateOnly` is allowed and no clock time was given. */
export function formatResolved(resolved: ResolvedTime, dateOnly = false): string | null {
  if (!isRepresentable(resolved.dateTime)) return null;
  if (dateOnly && !resolved.hasTime) return resolved.dateTime.toISODate();
  return resolved.dateTime.toISO({ suppressMilliseconds: true });
}
