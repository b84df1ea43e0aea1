import { describe, it, expect, vi, afterAll, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ConfigError, loadConfig, resolveConfig } from "../config";
import { DEFAULT_CONFIG } from "../constants";

const TMP_DIR = mkdtempSync(join(tmpdir(), "authwatch-config-"));

function tmpFile(name: string, content: string): string {
  const filePath = join(TMP_DIR, name);
  writeFileSync(filePath, content, "utf-8");
  return filePath;
}

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

afterAll(() => {
  rmSync(TMP_DIR, { recursive: true, force: true });
});

describe("resolveConfig", () => {
  it("returns defaults for an empty object", () => {
    expect(resolveConfig({})).toEqual({ config: DEFAULT_CONFIG, warnings: [] });
  });

  it("reads thresholds from the detection section", () => {
    const { config, warnings } = resolveConfig({
      detection: {
        brute_force_threshold: 10,
        time_window_threshold: 4,
        time_window_minutes: 2,
        multiple_username_threshold: 6,
      },
      failed_login_keywords: ["denied"],
    });
    expect(warnings).toEqual([]);
    expect(config).toEqual({
      bruteForceThreshold: 10,
      timeWindowThreshold: 4,
      timeWindowMinutes: 2,
      multipleUsernameThreshold: 6,
      failedLoginKeywords: ["denied"],
    });
  });

  it("accepts thresholds at the top level", () => {
    expect(resolveConfig({ brute_force_threshold: 7 }).config.bruteForceThreshold).toBe(7);
  });

  it("falls back per field for non-positive or non-numeric thresholds", () => {
    const { config, warnings } = resolveConfig({
      detection: {
        brute_force_threshold: 0,
        time_window_threshold: "five",
        time_window_minutes: 2.5,
        multiple_username_threshold: 4,
      },
    });
    expect(config.bruteForceThreshold).toBe(3);
    expect(config.timeWindowThreshold).toBe(5);
    expect(config.timeWindowMinutes).toBe(5);
    expect(config.multipleUsernameThreshold).toBe(4);
    expect(warnings).toEqual([
      "brute_force_threshold must be a positive integer (got 0); using default 3",
      'time_window_threshold must be a positive integer (got "five"); using default 5',
      "time_window_minutes must be a positive integer (got 2.5); using default 5",
    ]);
  });

  it("falls back for an empty keyword list", () => {
    const { config, warnings } = resolveConfig({ failed_login_keywords: [] });
    expect(config.failedLoginKeywords).toEqual(DEFAULT_CONFIG.failedLoginKeywords);
    expect(warnings).toEqual([
      "failed_login_keywords must be a non-empty list of non-empty strings; using default keywords",
    ]);
  });

  it("falls back for keyword lists holding non-strings", () => {
    const { warnings } = resolveConfig({ failed_login_keywords: ["denied", 401] });
    expect(warnings).toHaveLength(1);
  });

  it("warns when detection is not an object", () => {
    const { config, warnings } = resolveConfig({ detection: [1, 2] });
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(warnings).toEqual(['"detection" must be an object; using default thresholds']);
  });

  it("rejects a root that is not an object", () => {
    expect(() => resolveConfig([1, 2, 3])).toThrow(ConfigError);
    expect(() => resolveConfig(null)).toThrow("Configuration must be a JSON object");
  });
});

describe("loadConfig", () => {
  it("loads and validates a config file", async () => {
    const path = tmpFile(
      "valid.json",
      JSON.stringify({ detection: { brute_force_threshold: 8 } })
    );
    const config = await loadConfig(path);
    expect(config).toEqual({ ...DEFAULT_CONFIG, bruteForceThreshold: 8 });
  });

  it("prints a warning for each invalid field", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const path = tmpFile(
      "invalid-field.json",
      JSON.stringify({ detection: { multiple_username_threshold: -2 } })
    );
    const config = await loadConfig(path);
    expect(config.multipleUsernameThreshold).toBe(3);
    expect(warn).toHaveBeenCalledWith(
      "[Config] multiple_username_threshold must be a positive integer (got -2); using default 3"
    );
  });

  it("rejects malformed JSON", async () => {
    const path = tmpFile("broken.json", "{ detection: ");
    await expect(loadConfig(path)).rejects.toThrow(ConfigError);
    await expect(loadConfig(path)).rejects.toThrow(/is not valid JSON/);
  });

  it("rejects an explicitly requested file that does not exist", async () => {
    await expect(loadConfig(join(TMP_DIR, "missing.json"))).rejects.toThrow(
      /Could not read config file/
    );
  });

  it("uses the path from AUTHWATCH_CONFIG", async () => {
    const path = tmpFile("from-env.json", JSON.stringify({ time_window_minutes: 15 }));
    vi.stubEnv("AUTHWATCH_CONFIG", path);
    expect((await loadConfig()).timeWindowMinutes).toBe(15);
  });

  it("treats a missing AUTHWATCH_CONFIG file as an error", async () => {
    vi.stubEnv("AUTHWATCH_CONFIG", join(TMP_DIR, "nope.json"));
    await expect(loadConfig()).rejects.toBeInstanceOf(ConfigError);
  });
});
