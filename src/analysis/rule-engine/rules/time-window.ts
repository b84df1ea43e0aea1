import type { AuthEvent, TimeWindowAlert } from "@/analysis/types";
import { compareByMetricThenIp, groupFailuresByIp } from "../utils";

interface DensestWindow {
  start: number;
  count: number;
}

/**
 * Slide a window of `windowMs` over ascending timestamps, starting it at each
 * event in turn. The window is half-open: [start, start + windowMs).
 * Equal timestamps sit next to each other, so the first of a run counts them all.
 * Ties keep the earliest start.
 */
function findDensestWindow(sorted: readonly number[], windowMs: number): DensestWindow {
  let best: DensestWindow = { start: sorted[0], count: 0 };
  let end = 0;

  for (let i = 0; i < sorted.length; i++) {
    const start = sorted[i];
    if (end < i) end = i;
    while (end < sorted.length && sorted[end] < start + windowMs) {
      end++;
    }
    const count = end - i;
    if (count > best.count) {
      best = { start, count };
    }
  }

  return best;
}

/**
 * Flag IPs whose failures cluster into a burst: at least `minCount` failures
 * inside any `windowMinutes` span. Failures without a timestamp are ignored.
 * One alert per IP, describing its densest window.
 */
export function detectTimeWindowBruteForce(
  events: readonly AuthEvent[],
  windowMinutes: number,
  minCount: number
): TimeWindowAlert[] {
  const alerts: TimeWindowAlert[] = [];
  const windowMs = windowMinutes * 60_000;

  for (const [ip, failures] of groupFailuresByIp(events)) {
    const timestamps: number[] = [];
    for (const failure of failures) {
      if (failure.timestamp !== null) timestamps.push(failure.timestamp);
    }
    if (timestamps.length === 0) continue;

    timestamps.sort((a, b) => a - b);
    const densest = findDensestWindow(timestamps, windowMs);
    if (densest.count < minCount) continue;

    alerts.push({
      kind: "TIME_WINDOW_BRUTE_FORCE",
      ip,
      metric: densest.count,
      severity: "HIGH",
      title: `Time-Window Brute Force: ${densest.count} failed auth attempts within ${windowMinutes} minutes from ${ip}`,
      detail: { windowStart: densest.start, windowMinutes, minCount },
    });
  }

  return alerts.sort(compareByMetricThenIp);
}
