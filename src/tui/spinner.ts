import type { ScanProgress } from "../types.js";
import { formatBytes, renderProgressBar } from "../utils.js";

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧"];

export function spinnerFrame(tick: number): string {
  return SPINNER_FRAMES[tick % SPINNER_FRAMES.length];
}

export function formatElapsed(startMs: number, now = Date.now()): string {
  const elapsed = Math.floor((now - startMs) / 1000);
  if (elapsed < 60) return `${elapsed}s`;
  const mins = Math.floor(elapsed / 60);
  const secs = elapsed % 60;
  return `${mins}m ${secs}s`;
}

/** Status line while a scan runs, e.g. "⠙ dirs [█████░░░] 12/40 · 310 files · 4.2 MB". */
export function formatScanStatus(progress: ScanProgress, tick: number, barWidth = 15): string {
  const bar = renderProgressBar(progress.resolved, progress.discovered, barWidth);
  return `${spinnerFrame(tick)} dirs ${bar} · ${progress.files} files · ${formatBytes(progress.bytes)}`;
}
