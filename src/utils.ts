export function formatBytes(bytes: number): string {
  if (bytes < 0) return "0 B";
  if (bytes < 1024) return `${bytes} B`;
  const units = ["B", "KB", "MB", "GB", "TB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  const val = bytes / Math.pow(1024, i);
  return val >= 100 ? `${Math.round(val)} ${units[i]}` : `${val.toFixed(1)} ${units[i]}`;
}

/** Share of `size` in `parentSize` with two decimals; "0.00" when the parent is empty. */
export function formatPercent(size: number, parentSize: number): string {
  if (parentSize <= 0) return "0.00";
  return ((size * 100) / parentSize).toFixed(2);
}

/**
 * Keep the head and tail of long paths so both the root and the leaf stay visible.
 * Never longer than `maxWidth` code points.
 */
export function formatPath(path: string, maxWidth = 50): string {
  const chars = Array.from(path);
  if (maxWidth <= 0 || chars.length <= maxWidth) return path;
  if (maxWidth < 4) return chars.slice(0, maxWidth).join("");
  const keep = Math.min(Math.floor(maxWidth * 0.4), Math.floor((maxWidth - 3) / 2));
  return `${chars.slice(0, keep).join("")}...${chars.slice(chars.length - keep).join("")}`;
}

export function padRight(str: string, len: number): string {
  return str.length >= len ? str : str + " ".repeat(len - str.length);
}

export function padLeft(str: string, len: number): string {
  return str.length >= len ? str : " ".repeat(len - str.length) + str;
}

export function renderProgressBar(done: number, total: number, width = 20): string {
  if (total <= 0) return `[${"░".repeat(width)}] 0/0`;
  const ratio = Math.min(done / total, 1);
  const filled = Math.round(ratio * width);
  const empty = width - filled;
  return `[${"█".repeat(filled)}${"░".repeat(empty)}] ${done}/${total}`;
}
