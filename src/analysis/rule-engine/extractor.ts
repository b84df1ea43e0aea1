import type { AuthEvent } from "@/analysis/types";
import { DEFAULT_FAILED_LOGIN_KEYWORDS } from "@/lib/constants";
import { extractIp, extractTimestamp, extractUsername, matchKeyword } from "./utils";

export interface ExtractorOptions {
  /** Failure keywords, matched case-insensitively in order */
  keywords?: readonly string[];
  /** Year assumed for formats that carry none (syslog). Defaults to the current UTC year. */
  referenceYear?: number;
}

export interface ExtractionResult {
  events: AuthEvent[];
  totalLinesProcessed: number;
  /** Blank lines and lines without an IPv4 address */
  skippedLineCount: number;
  /** Lines holding only whitespace; counted in skippedLineCount too */
  blankLineCount: number;
}

/**
 * Turn one raw log line into an authentication event.
 *
 * Lines without an IPv4 address produce no event. A line whose timestamp
 * cannot be parsed still produces an event, with `timestamp: null`.
 */
export function extractEvent(
  line: string,
  options: ExtractorOptions = {}
): AuthEvent | null {
  const ip = extractIp(line);
  if (!ip) return null;

  const matchedKeyword = matchKeyword(
    line,
    options.keywords ?? DEFAULT_FAILED_LOGIN_KEYWORDS
  );

  return {
    timestamp: extractTimestamp(line, options.referenceYear),
    ip,
    username: extractUsername(line),
    isFailure: matchedKeyword !== null,
    matchedKeyword,
  };
}

/**
 * Extract events from every line, preserving line order.
 */
export function extractEvents(
  lines: readonly string[],
  options: ExtractorOptions = {}
): ExtractionResult {
  const events: AuthEvent[] = [];
  let skippedLineCount = 0;
  let blankLineCount = 0;

  for (const line of lines) {
    if (line.trim().length === 0) {
      skippedLineCount++;
      blankLineCount++;
      continue;
    }
    const event = extractEvent(line, options);
    if (event) {
      events.push(event);
    } else {
      skippedLineCount++;
    }
  }

  return {
    events,
    totalLinesProcessed: lines.length,
    skippedLineCount,
    blankLineCount,
  };
}
