import type {
  Alert,
  AlertsByKind,
  AuthEvent,
  IpFailureCount,
  Report,
  TimeRange,
} from "./types";
import { ALERT_KIND_ORDER } from "@/lib/constants";

function computeTimeRange(events: readonly AuthEvent[]): TimeRange | null {
  let start = Infinity;
  let end = -Infinity;
  for (const event of events) {
    if (event.timestamp === null) continue;
    if (event.timestamp < start) start = event.timestamp;
    if (event.timestamp > end) end = event.timestamp;
  }
  return start === Infinity ? null : { start, end };
}

/**
 * Failure counts per IP, highest first, ties by IP ascending.
 * Failures without a timestamp are counted too.
 */
function countFailuresByIp(events: readonly AuthEvent[]): IpFailureCount[] {
  const counts = new Map<string, number>();
  for (const event of events) {
    if (!event.isFailure) continue;
    counts.set(event.ip, (counts.get(event.ip) ?? 0) + 1);
  }

  return Array.from(counts, ([ip, count]) => ({ ip, count })).sort((a, b) => {
    if (a.count !== b.count) return b.count - a.count;
    return a.ip < b.ip ? -1 : a.ip > b.ip ? 1 : 0;
  });
}

/**
 * Merge extracted events and detector output into a report.
 *
 * Alerts keep each detector's own ordering and are grouped by kind in
 * display order (time-window, multiple usernames, threshold). No detection
 * logic is re-run here.
 */
export function assembleReport(
  events: readonly AuthEvent[],
  alertsByKind: AlertsByKind,
  sourcePath: string,
  generatedAt: Date = new Date()
): Report {
  const alerts: Alert[] = [];
  for (const kind of ALERT_KIND_ORDER) {
    alerts.push(...alertsByKind[kind]);
  }

  return {
    generatedAt: generatedAt.toISOString(),
    sourcePath,
    totalEntries: events.length,
    failedLoginCount: events.filter((e) => e.isFailure).length,
    timeRange: computeTimeRange(events),
    failedLoginsByIp: countFailuresByIp(events),
    alerts,
  };
}
