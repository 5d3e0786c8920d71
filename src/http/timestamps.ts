import { z } from "zod";

const isoDateSchema = z.string().date();
const isoDateTimeSchema = z.string().datetime({ offset: true, local: true });

const SPACE_SEPARATOR = /^(\d{4}-\d{2}-\d{2}) (\d)/;
const NUMERIC_OFFSET = /([+-])(\d{2}):?(\d{2})?$/;
const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

function isCalendarDate(candidate: string): boolean {
  const match = DATE_PREFIX.exec(candidate);
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const resolved = new Date(Date.UTC(year, month - 1, day));
  return resolved.getUTCFullYear() === year && resolved.getUTCMonth() === month - 1 && resolved.getUTCDate() === day;
}

function withExplicitZone(candidate: string): string {
  if (candidate.endsWith("Z")) return candidate;
  const offset = NUMERIC_OFFSET.exec(candidate);
  if (!offset || !candidate.includes("T") || offset.index <= candidate.indexOf("T")) {
    return `${candidate}Z`;
  }
  return `${candidate.slice(0, offset.index)}${offset[1]}${offset[2]}:${offset[3] ?? "00"}`;
}

/**
 * Parses an ISO-8601 date or date-time into UTC epoch milliseconds. A date-time
 * without an offset is read as UTC, never as server-local time. Anything that is
 * not ISO-8601, or names a day the calendar does not have, yields null.
 */
export function parseUtcTimestamp(raw: string): number | null {
  const candidate = String(raw || "")
    .trim()
    .replace(SPACE_SEPARATOR, "$1T$2")
    .replace(/z$/, "Z");
  if (!candidate || !isCalendarDate(candidate)) return null;

  if (isoDateSchema.safeParse(candidate).success) {
    return Date.parse(`${candidate}T00:00:00Z`);
  }
  if (!isoDateTimeSchema.safeParse(candidate).success) return null;

  const parsed = Date.parse(withExplicitZone(candidate));
  return Number.isFinite(parsed) ? parsed : null;
}

export function toIsoTimestamp(epochMs: number): string {
  return new Date(epochMs).toISOString();
}
