import { TUI, ProcessTerminal, Container, Text, matchesKey, Key, isKeyRelease } from "@mariozechner/pi-tui";
import chalk from "chalk";
import type { Entry, ScanProgress, ScanWarning } from "../types.js";
import { isZeroedWarning } from "../log.js";
import { formatBytes } from "../utils.js";
import { TreeView } from "./tree-view.js";
import { formatElapsed, formatScanStatus } from "./spinner.js";

export interface ScanHooks {
  onProgress: (progress: ScanProgress) => void;
  onWarning: (warning: ScanWarning) => void;
}

export type ScanFn = (hooks: ScanHooks) => Promise<Entry>;

export class SizetreeApp {
  private tui: TUI;
  private root: Container;
  private header: Text;
  private footer: Text;
  private treeView = new TreeView();

  private progress: ScanProgress = { discovered: 0, resolved: 0, files: 0, bytes: 0 };
  private scanning = false;
  // counted, not printed, while the alternate screen is up
  private warnings = 0;
  private spinnerTick = 0;
  private spinnerStart = 0;
  private spinnerInterval: ReturnType<typeof setInterval> | null = null;

  constructor(private rootPath: string, private scanFn: ScanFn) {
    this.tui = new TUI(new ProcessTerminal());

    this.header = new Text("", 1, 1);
    this.footer = new Text("", 0, 1);

    this.root = new Container();
    this.root.addChild(this.header);
    this.root.addChild(this.treeView);
    this.root.addChild(this.footer);

    this.updateHeader(null);
    this.updateFooter();

    this.tui.addInputListener((data) => {
      if (isKeyRelease(data)) return { consume: true };

      if (matchesKey(data, Key.ctrl("c")) || matchesKey(data, "q")) {
        this.stop();
        return { consume: true };
      }

      this.updateViewportHeight();
      this.treeView.handleInput(data);
      this.tui.requestRender();
      return { consume: true };
    });
  }

  private updateViewportHeight() {
    const reservedLines = 10;
    this.treeView.maxVisible = Math.max(this.tui.terminal.rows - reservedLines, 5);
  }

  private updateHeader(tree: Entry | null) {
    let title = chalk.bold.cyan(" sizetree");
    if (tree) {
      title += chalk.dim(`   ${tree.path}  ${formatBytes(tree.size)}`);
    } else {
      title += chalk.dim(`   ${this.rootPath}`);
    }
    if (this.warnings > 0) {
      title += chalk.yellow(`   ${this.warnings} unreadable ${this.warnings === 1 ? "entry" : "entries"} counted as 0 B`);
    }
    this.header.setText(title);
  }

  private updateFooter() {
    const left = chalk.dim("  q quit  ↑↓ navigate  →/Enter expand  ← collapse");
    const right = this.scanning
      ? chalk.cyan(`${formatScanStatus(this.progress, this.spinnerTick)} ${formatElapsed(this.spinnerStart)}`)
      : "";
    this.footer.setText(right ? left + "    " + right : left);
  }

  private startSpinner() {
    this.spinnerTick = 0;
    this.spinnerStart = Date.now();
    this.spinnerInterval = setInterval(() => {
      this.spinnerTick++;
      this.updateFooter();
      this.tui.requestRender();
    }, 100);
  }

  private stopSpinner() {
    if (this.spinnerInterval) {
      clearInterval(this.spinnerInterval);
      this.spinnerInterval = null;
    }
  }

  async start() {
    // Enter alternate screen buffer
    process.stdout.write("\x1b[?1049h");
    this.tui.addChild(this.root);
    this.tui.start();
    this.updateViewportHeight();

    this.scanning = true;
    this.startSpinner();
    this.tui.requestRender();

    let tree: Entry;
    try {
      tree = await this.scanFn({
        onProgress: (progress) => {
          this.progress = progress;
        },
        onWarning: (warning) => {
          if (isZeroedWarning(warning)) this.warnings++;
        },
      });
    } catch (error) {
      this.restoreTerminal();
      throw error;
    } finally {
      this.scanning = false;
      this.stopSpinner();
    }

    this.treeView.setTree(tree);
    this.updateHeader(tree);
    this.updateFooter();
    this.tui.requestRender();
  }

  private restoreTerminal() {
    this.stopSpinner();
    this.tui.stop();
    // Leave alternate screen buffer
    process.stdout.write("\x1b[?1049l");
  }

  stop() {
    this.restoreTerminal();
    process.exit(0);
  }
}
