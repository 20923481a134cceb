import chalk, { type ChalkInstance } from "chalk";
import { resolveEntry } from "./aggregator.js";
import type { SizetreeConfig } from "./config.js";
import { RootUnreadableError } from "./errors.js";
import { createWarningPrinter } from "./log.js";
import { writeReport } from "./reporter.js";

export interface OutputStreams {
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
}

export interface RunOptions extends SizetreeConfig {
  color?: ChalkInstance;
}

/**
 * Scans `rootPath` and prints the report. Returns the process exit code:
 * 0 once the report is printed, 1 when the root was unreadable and that
 * was configured to be fatal.
 */
export async function runReport(
  rootPath: string,
  options: RunOptions,
  streams: OutputStreams = process,
): Promise<number> {
  const color = options.color ?? chalk;
  try {
    const root = await resolveEntry(rootPath, {
      concurrency: options.concurrency,
      failOnUnreadableRoot: options.failOnUnreadableRoot,
      onWarning: createWarningPrinter(streams.stderr, color),
    });
    writeReport(root, (line) => streams.stdout.write(line + "\n"), {
      pathWidth: options.pathWidth,
      color,
    });
    return 0;
  } catch (error) {
    if (error instanceof RootUnreadableError) {
      streams.stderr.write(color.red(`error: ${error.message}`) + "\n");
      return 1;
    }
    throw error;
  }
}
