/**
 * Date-time text used by the FreshBooks API
 */

import { FreshBooksError, FB_ERROR_CODES } from "./errors.js";

/** "2023-05-01 12:00:00", read as UTC */
const PRIMARY_LAYOUT = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/** RFC 3339, e.g. "2023-05-01T12:00:00.250+02:00" */
const RFC3339_LAYOUT =
  /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?([Zz]|[+-]\d{2}:\d{2})$/;

interface Fields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toFields(match: RegExpExecArray): Fields | null {
  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;
  return { year, month, day, hour, minute, second };
}

function utcMillis(f: Fields, millis = 0): number {
  const date = new Date(0);
  // setUTCFullYear keeps years below 100 literal
  date.setUTCFullYear(f.year, f.month - 1, f.day);
  date.setUTCHours(f.hour, f.minute, f.second, millis);
  return date.getTime();
}

function parsePrimary(text: string): Date | null {
  const match = PRIMARY_LAYOUT.exec(text);
  if (!match) return null;
  const fields = toFields(match);
  return fields ? new Date(utcMillis(fields)) : null;
}

function parseRfc3339(text: string): Date | null {
  const match = RFC3339_LAYOUT.exec(text);
  if (!match) return null;
  const fields = toFields(match);
  if (!fields) return null;

  const millis = match[7] ? Number(match[7].slice(0, 3).padEnd(3, "0")) : 0;
  const zone = match[8];
  let offsetMinutes = 0;
  if (zone !== "Z" && zone !== "z") {
    const hours = Number(zone.slice(1, 3));
    const minutes = Number(zone.slice(4, 6));
    if (hours > 23 || minutes > 59) return null;
    offsetMinutes = (hours * 60 + minutes) * (zone[0] === "-" ? -1 : 1);
  }

  return new Date(utcMillis(fields, millis) - offsetMinutes * 60_000);
}

/**
 * Parse a timestamp from the API. The service's own layout is tried first,
 * then RFC 3339.
 */
export function parseTimestamp(text: string): Date {
  const value = text.trim();
  const parsed = parsePrimary(value) ?? parseRfc3339(value);
  if (!parsed) {
    throw new FreshBooksError(
      `Cannot parse timestamp "${text}"`,
      FB_ERROR_CODES.TIMESTAMP_PARSE_ERROR,
      undefined,
      { text }
    );
  }
  return parsed;
}

const pad = (n: number, width = 2): string => String(n).padStart(width, "0");

/** YYYY-MM-DD in UTC, used for date_from / date_to */
export function formatDate(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/** YYYY-MM-DD HH:MM:SS in UTC, used for update_from / update_to */
export function formatTimestamp(date: Date): string {
  return `${formatDate(date)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}
