import type { AnalysisResult, AnalyzerConfig } from "./types";
import { runRuleEngine } from "./rule-engine";
import { assembleReport } from "./report";
import { readLogFile } from "@/lib/log-file";

export interface AnalyzeOptions {
  /** Year assumed for syslog timestamps, which carry none */
  referenceYear?: number;
  /** Fixed report generation time; defaults to now */
  generatedAt?: Date;
  /** Log progress to stderr */
  verbose?: boolean;
}

function progress(options: AnalyzeOptions, message: string): void {
  if (options.verbose) console.error(`[Analyzer] ${message}`);
}

/**
 * Analyze in-memory log lines: extract events, run the detectors and
 * assemble the report. Synchronous and free of I/O.
 */
export function analyzeLines(
  lines: readonly string[],
  config: AnalyzerConfig,
  sourcePath: string,
  options: AnalyzeOptions = {}
): AnalysisResult {
  const result = runRuleEngine(lines, config, {
    referenceYear: options.referenceYear,
  });
  progress(
    options,
    `Extracted ${result.events.length} events from ${result.totalLinesProcessed} lines (${result.skippedLineCount} skipped)`
  );

  const report = assembleReport(
    result.events,
    result.alerts,
    sourcePath,
    options.generatedAt
  );
  progress(options, `Raised ${report.alerts.length} alerts`);

  return {
    report,
    events: result.events,
    totalLinesProcessed: result.totalLinesProcessed,
    skippedLineCount: result.skippedLineCount,
    blankLineCount: result.blankLineCount,
  };
}

/**
 * Read a log file and analyze it. File errors surface as LogFileError
 * before any analysis runs.
 */
export async function analyzeLogFile(
  filePath: string,
  config: AnalyzerConfig,
  options: AnalyzeOptions = {}
): Promise<AnalysisResult> {
  progress(options, `Reading ${filePath}`);
  const lines = await readLogFile(filePath);
  return analyzeLines(lines, config, filePath, options);
}
