import type { AuthEvent } from "@/analysis/types";

/**
 * IPv4 regex: matches dotted-quad addresses like 192.168.1.1
 */
const IPV4_REGEX = /\b(\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})\b/;

/**
 * Extract the first IPv4 address found in a log line.
 * Returns null if no IP address is found.
 */
export function extractIp(line: string): string | null {
  const match = line.match(IPV4_REGEX);
  return match ? match[1] : null;
}

type TimestampFormatName = "iso" | "apache" | "syslog";

/**
 * A timestamp format described as data: the pattern to search for and
 * the capture group holding each date/time field.
 * Formats without a year group take the caller's reference year.
 */
interface TimestampFormat {
  name: TimestampFormatName;
  pattern: RegExp;
  fields: {
    year?: number;
    month: number;
    day: number;
    hour: number;
    minute: number;
    second: number;
    offset?: number;
  };
}

/**
 * Known timestamp formats, tried in order:
 *   - ISO-like: 2025-01-15 10:30:45, 2025-01-15T10:30:45Z, 2025-01-15T10:30:45+05:00
 *   - Apache/Nginx combined: [15/Jan/2025:10:30:45 +0000]
 *   - Syslog: Jan 15 10:30:45
 * Timestamps without an offset are read as UTC.
 */
export const TIMESTAMP_FORMATS: readonly TimestampFormat[] = [
  {
    name: "iso",
    pattern:
      /\b(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(?:[.,]\d+)?(Z|[+-]\d{2}:?\d{2})?/,
    fields: { year: 1, month: 2, day: 3, hour: 4, minute: 5, second: 6, offset: 7 },
  },
  {
    name: "apache",
    pattern:
      /\[(\d{2})\/([A-Za-z]{3})\/(\d{4}):(\d{2}):(\d{2}):(\d{2})(?:\s([+-]\d{4}))?\]/,
    fields: { day: 1, month: 2, year: 3, hour: 4, minute: 5, second: 6, offset: 7 },
  },
  {
    name: "syslog",
    pattern: /\b([A-Z][a-z]{2})\s+(\d{1,2})\s+(\d{2}):(\d{2}):(\d{2})\b/,
    fields: { month: 1, day: 2, hour: 3, minute: 4, second: 5 },
  },
];

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

function parseMonth(value: string): number | null {
  if (/^\d+$/.test(value)) {
    const month = Number(value);
    return month >= 1 && month <= 12 ? month : null;
  }
  return MONTHS[value.toLowerCase()] ?? null;
}

/** "Z", "+05:00", "-0800" → minutes east of UTC */
function parseOffsetMinutes(value: string | undefined): number | null {
  if (!value || value === "Z") return 0;
  const match = value.match(/^([+-])(\d{2}):?(\d{2})$/);
  if (!match) return null;
  const minutes = Number(match[2]) * 60 + Number(match[3]);
  return match[1] === "-" ? -minutes : minutes;
}

function toEpoch(
  match: RegExpMatchArray,
  format: TimestampFormat,
  referenceYear: number
): number | null {
  const { fields } = format;
  const year = fields.year !== undefined ? Number(match[fields.year]) : referenceYear;
  const month = parseMonth(match[fields.month]);
  const day = Number(match[fields.day]);
  const hour = Number(match[fields.hour]);
  const minute = Number(match[fields.minute]);
  const second = Number(match[fields.second]);
  const offset = parseOffsetMinutes(
    fields.offset !== undefined ? match[fields.offset] : undefined
  );

  if (month === null || offset === null) return null;
  if (day < 1 || day > 31 || hour > 23 || minute > 59 || second > 59) return null;

  const utc = Date.UTC(year, month - 1, day, hour, minute, second);
  // Date.UTC rolls Feb 30 over into March
  if (new Date(utc).getUTCDate() !== day) return null;

  return utc - offset * 60_000;
}

/**
 * Try to extract a timestamp using the known formats, in order.
 * Returns epoch milliseconds or null if no format yields a valid date.
 */
export function extractTimestamp(
  line: string,
  referenceYear: number = new Date().getUTCFullYear()
): number | null {
  for (const format of TIMESTAMP_FORMATS) {
    const match = line.match(format.pattern);
    if (!match) continue;
    const ts = toEpoch(match, format, referenceYear);
    if (ts !== null) return ts;
  }
  return null;
}

/**
 * Username patterns, first match wins. Supports:
 *   - SSH: "Failed password for (invalid user )?<name> from ..."
 *   - SSH: "Invalid user <name> from ..."
 *     (sshd leaves the name empty when the client sent none)
 *   - SSH: "Accepted publickey for <name> from ..."
 *   - Generic: "Login failed for user <name>"
 *   - Key-value: "user=<name>" or "user: <name>"
 *   - Apache/Nginx authuser field: "<ip> - <name> [..."
 */
const USERNAME_PATTERNS: readonly RegExp[] = [
  /Failed password for (?:invalid user )?(\S*)\s+from/i,
  /Invalid user (\S*)\s+from/i,
  /Accepted \S+ for (\S+)\s+from/i,
  /Login failed for (?:user\s+)?([^\s;,]+)/i,
  /\buser(?:=|:\s*|\s)([^\s;,]+)/i,
  /^\d{1,3}(?:\.\d{1,3}){3}\s+\S+\s+([^\s[-]\S*)\s+\[\d{2}\/[A-Za-z]{3}\/\d{4}:/,
];

/**
 * Extract a username from common log formats.
 * Returns null if no username can be extracted, or the matching pattern
 * found an empty name.
 */
export function extractUsername(line: string): string | null {
  for (const pattern of USERNAME_PATTERNS) {
    const match = line.match(pattern);
    if (match) return match[1] === "" ? null : match[1];
  }
  return null;
}

/**
 * Return the first keyword (in the given order) contained in the line,
 * compared case-insensitively.
 */
export function matchKeyword(
  line: string,
  keywords: readonly string[]
): string | null {
  const lower = line.toLowerCase();
  return keywords.find((keyword) => lower.includes(keyword.toLowerCase())) ?? null;
}

/** Epoch ms → "YYYY-MM-DD HH:MM:SS" (UTC) */
export function formatTimestamp(ts: number): string {
  return new Date(ts).toISOString().slice(0, 19).replace("T", " ");
}

/**
 * Group failure events by source IP, keeping each IP's events in input order.
 * Non-failure events are dropped.
 */
export function groupFailuresByIp(
  events: readonly AuthEvent[]
): Map<string, AuthEvent[]> {
  const byIp = new Map<string, AuthEvent[]>();
  for (const event of events) {
    if (!event.isFailure) continue;
    const list = byIp.get(event.ip);
    if (list) {
      list.push(event);
    } else {
      byIp.set(event.ip, [event]);
    }
  }
  return byIp;
}

/** Highest metric first, ties broken by IP string ascending. */
export function compareByMetricThenIp(
  a: { metric: number; ip: string },
  b: { metric: number; ip: string }
): number {
  if (a.metric !== b.metric) return b.metric - a.metric;
  if (a.ip === b.ip) return 0;
  return a.ip < b.ip ? -1 : 1;
}
