import { readFile } from "fs/promises";
import { z } from "zod/v4";
import type { AnalyzerConfig } from "@/analysis/types";
import {
  CONFIG_PATH_ENV,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_PATH,
} from "@/lib/constants";

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

type ThresholdKey = Exclude<keyof AnalyzerConfig, "failedLoginKeywords">;

/** JSON key (under "detection") for each numeric setting. */
const THRESHOLD_FIELDS: readonly { key: ThresholdKey; jsonKey: string }[] = [
  { key: "bruteForceThreshold", jsonKey: "brute_force_threshold" },
  { key: "timeWindowThreshold", jsonKey: "time_window_threshold" },
  { key: "timeWindowMinutes", jsonKey: "time_window_minutes" },
  { key: "multipleUsernameThreshold", jsonKey: "multiple_username_threshold" },
];

const KEYWORDS_KEY = "failed_login_keywords";

const objectSchema = z.record(z.string(), z.unknown());
const thresholdSchema = z.number().int().positive();
const keywordsSchema = z.array(z.string().trim().min(1)).min(1);

export interface ResolvedConfig {
  config: AnalyzerConfig;
  /** One message per field that fell back to its default */
  warnings: string[];
}

/**
 * Validate a parsed config file field by field.
 *
 * Settings are read from the "detection" object, or from the top level when
 * "detection" does not name them. A missing field takes its default silently;
 * an invalid one takes its default with a warning. Only a root that is not
 * a JSON object is rejected outright.
 */
export function resolveConfig(raw: unknown): ResolvedConfig {
  const root = z.safeParse(objectSchema, raw);
  if (!root.success) {
    throw new ConfigError("Configuration must be a JSON object");
  }

  const warnings: string[] = [];
  const config: AnalyzerConfig = { ...DEFAULT_CONFIG };

  let detection: Record<string, unknown> = {};
  if (root.data.detection !== undefined) {
    const parsed = z.safeParse(objectSchema, root.data.detection);
    if (parsed.success) {
      detection = parsed.data;
    } else {
      warnings.push(`"detection" must be an object; using default thresholds`);
    }
  }

  const pick = (jsonKey: string): unknown =>
    jsonKey in detection ? detection[jsonKey] : root.data[jsonKey];

  for (const { key, jsonKey } of THRESHOLD_FIELDS) {
    const value = pick(jsonKey);
    if (value === undefined) continue;

    const result = z.safeParse(thresholdSchema, value);
    if (result.success) {
      config[key] = result.data;
    } else {
      warnings.push(
        `${jsonKey} must be a positive integer (got ${JSON.stringify(value)}); using default ${DEFAULT_CONFIG[key]}`
      );
    }
  }

  const keywords = root.data[KEYWORDS_KEY];
  if (keywords !== undefined) {
    const result = z.safeParse(keywordsSchema, keywords);
    if (result.success) {
      config.failedLoginKeywords = result.data;
    } else {
      warnings.push(
        `${KEYWORDS_KEY} must be a non-empty list of non-empty strings; using default keywords`
      );
    }
  }

  return { config, warnings };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Load the analyzer configuration.
 *
 * Path resolution: the argument, then $AUTHWATCH_CONFIG, then ./config.json.
 * Only the last may be missing (defaults are used); an unreadable file or
 * malformed JSON is a ConfigError.
 */
export async function loadConfig(configPath?: string): Promise<AnalyzerConfig> {
  const requested = configPath ?? process.env[CONFIG_PATH_ENV];
  const path = requested ?? DEFAULT_CONFIG_PATH;

  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (requested === undefined && isNotFound(error)) {
      return { ...DEFAULT_CONFIG };
    }
    throw new ConfigError(
      `Could not read config file '${path}': ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(
      `Config file '${path}' is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const { config, warnings } = resolveConfig(raw);
  for (const warning of warnings) {
    console.warn(`[Config] ${warning}`);
  }
  return config;
}
