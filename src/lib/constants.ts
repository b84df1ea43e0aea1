import type { AlertKind, AnalyzerConfig } from "@/analysis/types";

/** Keywords that classify a log line as a failed authentication (case-insensitive). */
export const DEFAULT_FAILED_LOGIN_KEYWORDS = [
  "failed password",
  "invalid user",
  "authentication failure",
  "401",
  "403",
  "unauthorized",
] as const;

export const DEFAULT_CONFIG: Readonly<AnalyzerConfig> = {
  bruteForceThreshold: 3,
  timeWindowThreshold: 5,
  timeWindowMinutes: 5,
  multipleUsernameThreshold: 3,
  failedLoginKeywords: DEFAULT_FAILED_LOGIN_KEYWORDS,
};

export const DEFAULT_CONFIG_PATH = "config.json";
export const CONFIG_PATH_ENV = "AUTHWATCH_CONFIG";

/** Order in which alert groups appear in a report. */
export const ALERT_KIND_ORDER: readonly AlertKind[] = [
  "TIME_WINDOW_BRUTE_FORCE",
  "MULTIPLE_USERNAMES",
  "THRESHOLD_BRUTE_FORCE",
];

export const ALERT_KIND_LABELS: Record<AlertKind, string> = {
  TIME_WINDOW_BRUTE_FORCE: "Time-Window Brute Force Attacks",
  MULTIPLE_USERNAMES: "Multiple Username Attempts",
  THRESHOLD_BRUTE_FORCE: "Brute Force Attacks (Threshold)",
};

/** Usernames listed per IP before the report collapses the rest into a count */
export const MAX_USERNAMES_SHOWN = 10;

export const REPORT_WIDTH = 60;
