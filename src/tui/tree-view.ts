import { basename } from "node:path";
import type { Component } from "@mariozechner/pi-tui";
import { matchesKey, truncateToWidth } from "@mariozechner/pi-tui";
import chalk from "chalk";
import type { Entry } from "../types.js";
import { formatBytes, formatPercent, padLeft } from "../utils.js";

export interface TreeRow {
  entry: Entry;
  depth: number;
  parentSize: number;
}

/**
 * Collapsible view over a finished tree. Only the expanded set and the cursor
 * change; the entries themselves are read as the aggregator left them.
 */
export class TreeView implements Component {
  private root: Entry | null = null;
  private expanded = new Set<string>();
  private rows: TreeRow[] = [];
  private selectedIndex = 0;
  private scrollOffset = 0;
  maxVisible = 30;
  focused = true;

  setTree(root: Entry) {
    this.root = root;
    this.expanded = new Set([root.path]);
    this.selectedIndex = 0;
    this.scrollOffset = 0;
    this.rebuildRows();
  }

  getRows(): readonly TreeRow[] {
    return this.rows;
  }

  getSelected(): Entry | null {
    return this.rows[this.selectedIndex]?.entry ?? null;
  }

  invalidate(): void {}

  handleInput(data: string): void {
    const row = this.rows[this.selectedIndex];
    if (!row) return;

    if (matchesKey(data, "up") || matchesKey(data, "k")) {
      if (this.selectedIndex > 0) this.selectedIndex--;
    } else if (matchesKey(data, "down") || matchesKey(data, "j")) {
      if (this.selectedIndex < this.rows.length - 1) this.selectedIndex++;
    } else if (matchesKey(data, "right") || matchesKey(data, "l") || matchesKey(data, "enter")) {
      if (row.entry.kind === "directory" && !this.expanded.has(row.entry.path)) {
        this.expanded.add(row.entry.path);
        this.rebuildRows();
      }
    } else if (matchesKey(data, "left") || matchesKey(data, "h")) {
      if (row.entry.kind === "directory" && this.expanded.has(row.entry.path)) {
        this.expanded.delete(row.entry.path);
        this.rebuildRows();
      } else {
        this.selectParent(row.depth);
      }
    }
  }

  private selectParent(depth: number) {
    for (let i = this.selectedIndex - 1; i >= 0; i--) {
      if (this.rows[i].depth < depth) {
        this.selectedIndex = i;
        return;
      }
    }
  }

  private rebuildRows() {
    const rows: TreeRow[] = [];
    const visit = (entry: Entry, parentSize: number, depth: number) => {
      rows.push({ entry, depth, parentSize });
      if (entry.kind === "directory" && this.expanded.has(entry.path)) {
        for (const child of entry.children) visit(child, entry.size, depth + 1);
      }
    };
    if (this.root) visit(this.root, this.root.size, 0);
    this.rows = rows;
    this.selectedIndex = Math.min(this.selectedIndex, Math.max(rows.length - 1, 0));
  }

  render(width: number): string[] {
    const lines: string[] = [];
    const pad = "  ";
    const maxW = width - 4;

    lines.push("");
    if (!this.root) {
      lines.push(pad + chalk.dim("Scanning..."));
      return lines;
    }

    lines.push(pad + chalk.bold(this.root.path) + "  " + chalk.yellow(formatBytes(this.root.size)));
    lines.push("");

    if (this.selectedIndex >= this.scrollOffset + this.maxVisible) {
      this.scrollOffset = this.selectedIndex - this.maxVisible + 1;
    }
    if (this.selectedIndex < this.scrollOffset) {
      this.scrollOffset = this.selectedIndex;
    }

    const visibleSlice = this.rows.slice(this.scrollOffset, this.scrollOffset + this.maxVisible);
    for (let i = 0; i < visibleSlice.length; i++) {
      const { entry, depth, parentSize } = visibleSlice[i];
      const isSelected = this.scrollOffset + i === this.selectedIndex;

      const marker = entry.kind === "directory"
        ? (this.expanded.has(entry.path) ? "▾ " : "▸ ")
        : "  ";
      const name = depth === 0 ? entry.path : basename(entry.path);
      const styledName = isSelected && this.focused
        ? chalk.bold.cyan(name)
        : entry.kind === "directory" ? chalk.blue(name) : chalk.white(name);
      const size = chalk.yellow(padLeft(formatBytes(entry.size), 9));
      const percent = chalk.dim(padLeft(formatPercent(entry.size, parentSize), 6) + "%");

      lines.push(pad + truncateToWidth(size + " " + percent + "  " + "  ".repeat(depth) + marker + styledName, maxW));
    }

    if (this.rows.length > this.maxVisible) {
      lines.push("");
      const pos = this.scrollOffset + 1;
      lines.push(pad + chalk.dim(
        `${pos}–${Math.min(pos + this.maxVisible - 1, this.rows.length)} of ${this.rows.length}`
      ));
    }

    return lines;
  }
}
