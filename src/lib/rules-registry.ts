/**
 * Registry of the detection rules, for the `rules` command.
 * Describes each detector, its severity and its MITRE ATT&CK mapping.
 */

import type { AlertKind, AnalyzerConfig, Severity } from "@/analysis/types";
import { ALERT_KIND_LABELS, ALERT_KIND_ORDER } from "@/lib/constants";

export interface RuleDescriptor {
  kind: AlertKind;
  label: string;
  description: string;
  severity: Severity;
  mitreTactic: string;
  mitreTechnique: string;
  /** Human-readable trigger condition under the given configuration */
  trigger: (config: AnalyzerConfig) => string;
}

export const RULES_REGISTRY: Record<AlertKind, RuleDescriptor> = {
  TIME_WINDOW_BRUTE_FORCE: {
    kind: "TIME_WINDOW_BRUTE_FORCE",
    label: ALERT_KIND_LABELS.TIME_WINDOW_BRUTE_FORCE,
    description:
      "Finds the densest sliding window of failed logins per IP. Failures without a parseable timestamp are ignored.",
    severity: "HIGH",
    mitreTactic: "Credential Access",
    mitreTechnique: "T1110.001 - Password Guessing",
    trigger: (config) =>
      `>= ${config.timeWindowThreshold} failures within ${config.timeWindowMinutes} minutes`,
  },
  MULTIPLE_USERNAMES: {
    kind: "MULTIPLE_USERNAMES",
    label: ALERT_KIND_LABELS.MULTIPLE_USERNAMES,
    description:
      "Counts distinct usernames in failed logins per IP, a sign of account enumeration or password spraying.",
    severity: "CRITICAL",
    mitreTactic: "Credential Access",
    mitreTechnique: "T1110.003 - Password Spraying",
    trigger: (config) => `>= ${config.multipleUsernameThreshold} distinct usernames`,
  },
  THRESHOLD_BRUTE_FORCE: {
    kind: "THRESHOLD_BRUTE_FORCE",
    label: ALERT_KIND_LABELS.THRESHOLD_BRUTE_FORCE,
    description:
      "Counts all failed logins per IP over the whole log. Severity escalates to CRITICAL at five times the threshold.",
    severity: "HIGH",
    mitreTactic: "Credential Access",
    mitreTechnique: "T1110 - Brute Force",
    trigger: (config) => `>= ${config.bruteForceThreshold} failures`,
  },
};

/** Render the registry as plain text, in report display order. */
export function describeRules(config: AnalyzerConfig): string {
  const lines: string[] = [];
  for (const kind of ALERT_KIND_ORDER) {
    const rule = RULES_REGISTRY[kind];
    lines.push(`${rule.label} [${rule.severity}]`);
    lines.push(`  Trigger: ${rule.trigger(config)}`);
    lines.push(`  MITRE:   ${rule.mitreTactic} / ${rule.mitreTechnique}`);
    lines.push(`  ${rule.description}`);
    lines.push("");
  }
  lines.push(`Failure keywords: ${config.failedLoginKeywords.join(", ")}`);
  return lines.join("\n");
}
