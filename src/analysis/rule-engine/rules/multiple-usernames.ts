import type { AuthEvent, MultipleUsernamesAlert } from "@/analysis/types";
import { compareByMetricThenIp, groupFailuresByIp } from "../utils";

/**
 * Flag IPs that failed authentication as many distinct usernames, a pattern
 * consistent with account enumeration or password spraying.
 * Only failure events count; usernames are compared verbatim.
 */
export function detectMultipleUsernames(
  events: readonly AuthEvent[],
  threshold: number
): MultipleUsernamesAlert[] {
  const alerts: MultipleUsernamesAlert[] = [];

  for (const [ip, failures] of groupFailuresByIp(events)) {
    const distinct = new Set<string>();
    for (const failure of failures) {
      if (failure.username !== null) distinct.add(failure.username);
    }
    if (distinct.size === 0 || distinct.size < threshold) continue;

    const usernames = [...distinct].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    alerts.push({
      kind: "MULTIPLE_USERNAMES",
      ip,
      metric: usernames.length,
      severity: "CRITICAL",
      title: `Multiple Usernames: ${usernames.length} distinct users targeted from ${ip}`,
      detail: { usernames, threshold },
    });
  }

  return alerts.sort(compareByMetricThenIp);
}
