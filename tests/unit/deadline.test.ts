import { describe, it, expect } from "vitest";
import { DateTime } from "luxon";
import {
  clockComponents,
  formatResolved,
  resolveDateText,
  resolveIso,
  zoneForText,
} from "../../src/normalizer/deadline.js";
import { REFERENCE } from "../helpers/fakes.js";

function resolveToIso(text: string, zone: string, dateOnly = false): string | null {
  const resolved = resolveDateText(text, REFERENCE, zone);
  return resolved ? formatResolved(resolved, dateOnly) : null;
}

describe("clockComponents", () => {
  it("reads 12h, 24h and named times", () => {
    expect(clockComponents("at 3pm")).toEqual({ hour: 15, minute: 0 });
    expect(clockComponents("12:30 am")).toEqual({ hour: 0, minute: 30 });
    expect(clockComponents("by 17:45")).toEqual({ hour: 17, minute: 45 });
    expect(clockComponents("noon")).toEqual({ hour: 12, minute: 0 });
    expect(clockComponents("EOD")).toEqual({ hour: 17, minute: 0 });
    expect(clockComponents("sometime")).toBeNull();
  });
});

describe("zoneForText", () => {
  it("prefers an abbreviation in the text", () => {
    expect(zoneForText("9am ET", "UTC")).toBe("America/New_York");
    expect(zoneForText("tomorrow", "Europe/Berlin")).toBe("Europe/Berlin");
    expect(zoneForText("friday at noon PT", "UTC")).toBe("America/Los_Angeles");
    expect(zoneForText("tomorrow", "Not/AZone")).toBe("UTC");
  });

  it("ignores abbreviations that do not follow a clock time", () => {
    expect(zoneForText("see Smith et al. by friday", "UTC")).toBe("UTC");
    expect(zoneForText("ct scan tomorrow", "Europe/Berlin")).toBe("Europe/Berlin");
    expect(resolveToIso("ct scan tomorrow", "UTC", true)).toBe("2026-02-11");
  });
});

describe("resolveIso", () => {
  it("keeps an explicit offset", () => {
    const resolved = resolveIso("2026-02-11T15:00:00-08:00", "UTC");
    expect(resolved?.zone).toBe("UTC-8");
    expect(resolved?.hasTime).toBe(true);
  });

  it("reads local times in the default zone", () => {
    const resolved = resolveIso("2026-02-11 09:30", "America/New_York");
    expect(resolved && formatResolved(resolved)).toBe("2026-02-11T09:30:00-05:00");
  });

  it("rejects non-ISO text", () => {
    expect(resolveIso("next week", "UTC")).toBeNull();
  });
});

describe("resolveDateText", () => {
  it("resolves tomorrow 3pm in a fixed offset zone", () => {
    expect(resolveToIso("tomorrow 3pm", "UTC-8")).toBe("2026-02-11T15:00:00-08:00");
  });

  it("resolves weekdays to the next occurrence", () => {
    // The reference is a Tuesday
    expect(resolveToIso("friday", "UTC", true)).toBe("2026-02-13");
    expect(resolveToIso("next friday", "UTC", true)).toBe("2026-02-20");
    expect(resolveToIso("Tuesday", "UTC", true)).toBe("2026-02-17");
  });

  it("resolves end of day", () => {
    expect(resolveToIso("by EOD", "UTC")).toBe("2026-02-10T17:00:00Z");
  });

  it("resolves end of week to Friday and end of month to its last day", () => {
    expect(resolveToIso("by end of the week", "UTC")).toBe("2026-02-13T17:00:00Z");
    expect(resolveToIso("end of week", "UTC-8")).toBe("2026-02-13T17:00:00-08:00");
    expect(resolveToIso("end of the month", "UTC")).toBe("2026-02-28T17:00:00Z");
  });

  it("rejects dates beyond four-digit years", () => {
    expect(resolveToIso("in 9000 years", "UTC")).toBeNull();
    const farOff = {
      dateTime: DateTime.fromObject({ year: 10000, month: 1, day: 1 }, { zone: "UTC" }),
      zone: "UTC",
      hasTime: false,
    };
    expect(formatResolved(farOff)).toBeNull();
    expect(formatResolved(farOff, true)).toBeNull();
  });

  it("uses a zone named in the phrase", () => {
    expect(resolveToIso("tomorrow 9am ET", "UTC")).toBe("2026-02-11T09:00:00-05:00");
  });

  it("resolves calendar dates", () => {
    expect(resolveToIso("March 3, 2026", "UTC", true)).toBe("2026-03-03");
  });

  it("returns null for text without a date", () => {
    expect(resolveToIso("whenever works", "UTC")).toBeNull();
    expect(resolveToIso("   ", "UTC")).toBeNull();
  });
});
