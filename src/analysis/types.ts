export type Severity = "CRITICAL" | "HIGH" | "MEDIUM" | "LOW" | "INFO";

export type AlertKind =
  | "TIME_WINDOW_BRUTE_FORCE"
  | "MULTIPLE_USERNAMES"
  | "THRESHOLD_BRUTE_FORCE";

/**
 * A single authentication-related log line, reduced to the fields the
 * detectors care about. Only lines carrying an IPv4 address become events.
 */
export interface AuthEvent {
  /** Epoch milliseconds (UTC), null when no known timestamp format matched */
  readonly timestamp: number | null;
  readonly ip: string;
  readonly username: string | null;
  readonly isFailure: boolean;
  /** The configured keyword that classified the line as a failure */
  readonly matchedKeyword: string | null;
}

interface AlertBase {
  readonly ip: string;
  /** Count that triggered the alert (failures, window failures or usernames) */
  readonly metric: number;
  readonly severity: Severity;
  readonly title: string;
}

export interface ThresholdAlert extends AlertBase {
  readonly kind: "THRESHOLD_BRUTE_FORCE";
  readonly detail: { readonly threshold: number };
}

export interface TimeWindowAlert extends AlertBase {
  readonly kind: "TIME_WINDOW_BRUTE_FORCE";
  readonly detail: {
    readonly windowStart: number;
    readonly windowMinutes: number;
    readonly minCount: number;
  };
}

export interface MultipleUsernamesAlert extends AlertBase {
  readonly kind: "MULTIPLE_USERNAMES";
  readonly detail: {
    readonly usernames: readonly string[];
    readonly threshold: number;
  };
}

export type Alert = ThresholdAlert | TimeWindowAlert | MultipleUsernamesAlert;

export interface AlertsByKind {
  readonly TIME_WINDOW_BRUTE_FORCE: readonly TimeWindowAlert[];
  readonly MULTIPLE_USERNAMES: readonly MultipleUsernamesAlert[];
  readonly THRESHOLD_BRUTE_FORCE: readonly ThresholdAlert[];
}

export interface IpFailureCount {
  readonly ip: string;
  readonly count: number;
}

export interface TimeRange {
  readonly start: number;
  readonly end: number;
}

export interface Report {
  /** ISO 8601 */
  readonly generatedAt: string;
  readonly sourcePath: string;
  readonly totalEntries: number;
  readonly failedLoginCount: number;
  readonly timeRange: TimeRange | null;
  /** Sorted by count descending, then IP ascending */
  readonly failedLoginsByIp: readonly IpFailureCount[];
  /** Grouped by kind in display order: time-window, multiple usernames, threshold */
  readonly alerts: readonly Alert[];
}

export interface AnalyzerConfig {
  bruteForceThreshold: number;
  timeWindowThreshold: number;
  timeWindowMinutes: number;
  multipleUsernameThreshold: number;
  failedLoginKeywords: readonly string[];
}

export interface AnalysisResult {
  report: Report;
  events: readonly AuthEvent[];
  totalLinesProcessed: number;
  skippedLineCount: number;
  blankLineCount: number;
}
