import { Command, InvalidArgumentError, Option } from "commander";
import { analyzeLogFile } from "@/analysis/pipeline";
import { formatReport, type ReportFormat } from "@/analysis/render";
import { ConfigError, loadConfig } from "@/lib/config";
import { LogFileError, saveReport } from "@/lib/log-file";

export interface AnalyzeCommandOptions {
  logFile: string;
  output?: string;
  config?: string;
  format: ReportFormat;
  year?: number;
  verbose?: boolean;
}

export function parseYear(value: string): number {
  if (!/^\d{4}$/.test(value)) {
    throw new InvalidArgumentError("Year must be a four-digit number.");
  }
  return Number(value);
}

/**
 * Analyze a log file and print or save the report.
 * Returns the process exit code: 0 on success, 1 when the config or the
 * log file cannot be used.
 */
export async function runAnalyze(options: AnalyzeCommandOptions): Promise<number> {
  try {
    const config = await loadConfig(options.config);

    if (options.output) {
      console.log(`Analyzing: ${options.logFile}...`);
    }

    const result = await analyzeLogFile(options.logFile, config, {
      referenceYear: options.year,
      verbose: options.verbose,
    });

    if (result.blankLineCount === result.totalLinesProcessed) {
      console.log("No log entries found.");
      return 0;
    }

    const rendered = formatReport(result.report, options.format);
    if (options.output) {
      await saveReport(options.output, rendered);
      console.log(`Report saved to: ${options.output}`);
    } else {
      console.log(rendered);
    }
    return 0;
  } catch (error) {
    if (error instanceof ConfigError || error instanceof LogFileError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

export const analyzeCommand = new Command("analyze")
  .description("Analyze a log file for brute-force and username-enumeration activity")
  .requiredOption("-f, --log-file <path>", "Path to log file to analyze")
  .option("-o, --output <path>", "Save report to file instead of printing it")
  .option("-c, --config <path>", "Path to configuration file (default: config.json)")
  .addOption(
    new Option("--format <format>", "Report format")
      .choices(["text", "json"])
      .default("text")
  )
  .option("--year <yyyy>", "Year for syslog timestamps (default: current year)", parseYear)
  .option("--verbose", "Log analysis progress to stderr")
  .action(async (options: AnalyzeCommandOptions) => {
    process.exitCode = await runAnalyze(options);
  });
