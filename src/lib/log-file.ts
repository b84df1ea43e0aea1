import { createReadStream } from "fs";
import { mkdir, stat, writeFile } from "fs/promises";
import { dirname } from "path";
import { createInterface } from "readline";

export class LogFileError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LogFileError";
  }
}

function describeFsError(error: unknown): string {
  if (error instanceof Error && "code" in error) {
    if (error.code === "ENOENT") return "file not found";
    if (error.code === "EACCES") return "permission denied";
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read a log file into memory, one entry per line, in file order.
 * Blank lines are kept; the rule engine counts them as skipped.
 *
 * Fails before returning anything if the file is missing, unreadable or a
 * directory, so no report is built from partial input.
 */
export async function readLogFile(filePath: string): Promise<string[]> {
  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      throw new LogFileError(`Log file '${filePath}' is not a regular file`);
    }

    const rl = createInterface({
      input: createReadStream(filePath, { encoding: "utf-8" }),
      crlfDelay: Infinity,
    });

    const lines: string[] = [];
    for await (const line of rl) {
      lines.push(line);
    }
    return lines;
  } catch (error) {
    if (error instanceof LogFileError) throw error;
    throw new LogFileError(`Could not read log file '${filePath}': ${describeFsError(error)}`, {
      cause: error,
    });
  }
}

/**
 * Write a rendered report, creating parent directories as needed.
 */
export async function saveReport(outputPath: string, contents: string): Promise<void> {
  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, contents.endsWith("\n") ? contents : `${contents}\n`, "utf-8");
  } catch (error) {
    throw new LogFileError(`Could not write report '${outputPath}': ${describeFsError(error)}`, {
      cause: error,
    });
  }
}
