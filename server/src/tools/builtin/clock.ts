/**
 * clock.now — current date and time, optionally in an IANA timezone.
 */

import type { ToolDefinition } from "../types.js";

export interface ClockReading {
  iso: string;
  timezone: string;
  /** `YYYY-MM-DD HH:MM:SS` in the requested timezone */
  local: string;
  weekday: string;
}

export function readClock(date: Date, timezone: string): ClockReading {
  let parts: Intl.DateTimeFormatPart[];
  try {
    parts = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      weekday: "long",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    }).formatToParts(date);
  } catch (err) {
    throw new Error(`Unknown timezone "${timezone}"`, { cause: err });
  }

  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find(p => p.type === type)?.value ?? "";

  return {
    iso: date.toISOString(),
    timezone,
    local: `${part("year")}-${part("month")}-${part("day")} ${part("hour")}:${part("minute")}:${part("second")}`,
    weekday: part("weekday"),
  };
}

export function createClockTool(now: () => Date = () => new Date()): ToolDefinition {
  return {
    name: "clock.now",
    description: "Get the current date and time",
    parameters: {
      timezone: { type: "string", default: "UTC", description: "IANA timezone, e.g. Europe/Berlin" },
    },
    execute: (args) => {
      const timezone = typeof args.timezone === "string" && args.timezone.trim() ? args.timezone.trim() : "UTC";
      return readClock(now(), timezone);
    },
  };
}
