import type { AlertsByKind, AnalyzerConfig, AuthEvent } from "@/analysis/types";
import { extractEvents } from "./extractor";
import { detectThresholdBruteForce } from "./rules/threshold";
import { detectTimeWindowBruteForce } from "./rules/time-window";
import { detectMultipleUsernames } from "./rules/multiple-usernames";

export interface RuleEngineOptions {
  /** Year assumed for syslog timestamps, which carry none */
  referenceYear?: number;
}

export interface RuleEngineResult {
  events: AuthEvent[];
  alerts: AlertsByKind;
  totalLinesProcessed: number;
  skippedLineCount: number;
  blankLineCount: number;
}

/**
 * Run the detectors over an already-extracted event list.
 * Each detector builds its own per-IP aggregate; none mutates the events.
 */
export function runDetectors(
  events: readonly AuthEvent[],
  config: AnalyzerConfig
): AlertsByKind {
  return {
    TIME_WINDOW_BRUTE_FORCE: detectTimeWindowBruteForce(
      events,
      config.timeWindowMinutes,
      config.timeWindowThreshold
    ),
    MULTIPLE_USERNAMES: detectMultipleUsernames(
      events,
      config.multipleUsernameThreshold
    ),
    THRESHOLD_BRUTE_FORCE: detectThresholdBruteForce(
      events,
      config.bruteForceThreshold
    ),
  };
}

/**
 * Run the rule-based detection engine against the lines of a log file.
 *
 * Two phases: every line is reduced to at most one AuthEvent, then the
 * threshold, time-window and multiple-username detectors run over the
 * shared event list.
 */
export function runRuleEngine(
  lines: readonly string[],
  config: AnalyzerConfig,
  options: RuleEngineOptions = {}
): RuleEngineResult {
  const extraction = extractEvents(lines, {
    keywords: config.failedLoginKeywords,
    referenceYear: options.referenceYear,
  });

  return {
    events: extraction.events,
    alerts: runDetectors(extraction.events, config),
    totalLinesProcessed: extraction.totalLinesProcessed,
    skippedLineCount: extraction.skippedLineCount,
    blankLineCount: extraction.blankLineCount,
  };
}
