import chalk, { type ChalkInstance } from "chalk";
import type { ScanWarning } from "./types.js";

const WARNING_TEXT: Record<ScanWarning["kind"], string> = {
  scan: "cannot list directory",
  entry: "skipping entry",
  metadata: "cannot read size of",
};

/** Whether the warning left a 0 B entry in the tree; skipped entries leave nothing. */
export function isZeroedWarning(warning: ScanWarning): boolean {
  return warning.kind !== "entry";
}

export function formatWarning(warning: ScanWarning): string {
  return `warning: ${WARNING_TEXT[warning.kind]} ${warning.path} (${warning.code})`;
}

/** Returns an `onWarning` sink that prints one line per warning to `stream` (stderr by default). */
export function createWarningPrinter(
  stream: { write(chunk: string): unknown } = process.stderr,
  color: ChalkInstance = chalk,
): (warning: ScanWarning) => void {
  return (warning) => {
    stream.write(color.yellow(formatWarning(warning)) + "\n");
  };
}
