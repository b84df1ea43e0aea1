import type { AuthEvent, ThresholdAlert } from "@/analysis/types";
import { compareByMetricThenIp, groupFailuresByIp } from "../utils";

/** Counts at this multiple of the threshold escalate to CRITICAL. */
const CRITICAL_MULTIPLIER = 5;

/**
 * Flag every IP whose total failed-auth count reaches the threshold.
 * A threshold of zero or less flags every IP with at least one failure.
 */
export function detectThresholdBruteForce(
  events: readonly AuthEvent[],
  threshold: number
): ThresholdAlert[] {
  const alerts: ThresholdAlert[] = [];
  const effective = Math.max(threshold, 1);

  for (const [ip, failures] of groupFailuresByIp(events)) {
    const count = failures.length;
    if (count < effective) continue;

    alerts.push({
      kind: "THRESHOLD_BRUTE_FORCE",
      ip,
      metric: count,
      severity: count >= effective * CRITICAL_MULTIPLIER ? "CRITICAL" : "HIGH",
      title: `Brute Force Attack: ${count} failed auth attempts from ${ip}`,
      detail: { threshold },
    });
  }

  return alerts.sort(compareByMetricThenIp);
}
