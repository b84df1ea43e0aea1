import { describe, it, expect, vi, afterAll, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";
import { InvalidArgumentError } from "commander";
import { parseYear, runAnalyze } from "../analyze";
import { createProgram } from "../index";

const FIXTURE = fileURLToPath(
  new URL("../../analysis/__tests__/fixtures/auth-sample.log", import.meta.url)
);
const TMP_DIR = mkdtempSync(join(tmpdir(), "authwatch-cli-"));
const CONFIG_PATH = join(TMP_DIR, "config.json");
writeFileSync(CONFIG_PATH, JSON.stringify({ detection: { brute_force_threshold: 3 } }), "utf-8");

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

afterAll(() => {
  rmSync(TMP_DIR, { recursive: true, force: true });
});

describe("parseYear", () => {
  it("accepts a four-digit year", () => {
    expect(parseYear("2024")).toBe(2024);
  });

  it("rejects anything else", () => {
    expect(() => parseYear("24")).toThrow(InvalidArgumentError);
    expect(() => parseYear("next")).toThrow("Year must be a four-digit number.");
  });
});

describe("runAnalyze", () => {
  it("prints the report to stdout", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const code = await runAnalyze({
      logFile: FIXTURE,
      config: CONFIG_PATH,
      format: "json",
      year: 2025,
    });

    expect(code).toBe(0);
    expect(log).toHaveBeenCalledTimes(1);
    const printed: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(printed).toMatchObject({ totalEntries: 18, failedLoginCount: 14 });
  });

  it("saves the report when an output path is given", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const output = join(TMP_DIR, "out", "report.txt");
    const code = await runAnalyze({
      logFile: FIXTURE,
      output,
      config: CONFIG_PATH,
      format: "text",
      year: 2025,
    });

    expect(code).toBe(0);
    expect(log.mock.calls).toEqual([
      [`Analyzing: ${FIXTURE}...`],
      [`Report saved to: ${output}`],
    ]);
    const saved = readFileSync(output, "utf-8").split("\n");
    expect(saved[1]).toBe("Log Security Analysis Report");
    expect(saved[saved.length - 2]).toBe("=".repeat(60));
  });

  it("reports an empty log without rendering", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const empty = join(TMP_DIR, "empty.log");
    writeFileSync(empty, "", "utf-8");

    expect(await runAnalyze({ logFile: empty, config: CONFIG_PATH, format: "text" })).toBe(0);
    expect(log.mock.calls).toEqual([["No log entries found."]]);
  });

  it("treats a log of blank lines as empty", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const blank = join(TMP_DIR, "blank.log");
    writeFileSync(blank, "\n   \n\t\n", "utf-8");

    expect(await runAnalyze({ logFile: blank, config: CONFIG_PATH, format: "text" })).toBe(0);
    expect(log.mock.calls).toEqual([["No log entries found."]]);
  });

  it("still reports a log whose lines carry no IPs", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const noIps = join(TMP_DIR, "no-ips.log");
    writeFileSync(noIps, "kernel: eth0 link up\n", "utf-8");

    expect(
      await runAnalyze({ logFile: noIps, config: CONFIG_PATH, format: "json" })
    ).toBe(0);
    const printed: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(printed).toMatchObject({ totalEntries: 0, alerts: [] });
  });

  it("exits with 1 when the log file is missing", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const missing = join(TMP_DIR, "missing.log");

    expect(await runAnalyze({ logFile: missing, config: CONFIG_PATH, format: "text" })).toBe(1);
    expect(error).toHaveBeenCalledWith(
      `Error: Could not read log file '${missing}': file not found`
    );
  });

  it("exits with 1 when the config is malformed", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const broken = join(TMP_DIR, "broken.json");
    writeFileSync(broken, "[", "utf-8");

    expect(await runAnalyze({ logFile: FIXTURE, config: broken, format: "text" })).toBe(1);
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe("createProgram", () => {
  it("runs the analyze command from argv", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    await createProgram().parseAsync([
      "node",
      "authwatch",
      "analyze",
      "-f",
      FIXTURE,
      "-c",
      CONFIG_PATH,
      "--format",
      "json",
      "--year",
      "2025",
    ]);

    expect(process.exitCode).toBe(0);
    const printed: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(printed).toMatchObject({ sourcePath: FIXTURE, totalEntries: 18 });
  });
});
