#!/usr/bin/env node
import { program, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { resolveEntry } from "./aggregator.js";
import { loadConfig } from "./config.js";
import { RootUnreadableError } from "./errors.js";
import { runReport } from "./run.js";
import { SizetreeApp } from "./tui/app.js";

interface CliOptions {
  concurrency?: number;
  pathWidth?: number;
  failOnUnreadableRoot?: boolean;
  interactive?: boolean;
}

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return n;
}

program
  .name("sizetree")
  .description("Show how much space a directory tree uses, largest entries first")
  .version("0.1.0")
  .argument("[path]", "directory to scan", process.cwd())
  .option("-c, --concurrency <n>", "max in-flight filesystem calls (0 = unbounded)", parseCount)
  .option("-w, --path-width <n>", "truncate displayed paths to n characters (0 = never)", parseCount)
  .option("--fail-on-unreadable-root", "exit with an error if the root cannot be read")
  .option("-i, --interactive", "browse the result in a terminal UI")
  .action(async (rootPath: string, options: CliOptions) => {
    const file = await loadConfig();
    const config = {
      concurrency: options.concurrency ?? file.concurrency,
      pathWidth: options.pathWidth ?? file.pathWidth,
      failOnUnreadableRoot: options.failOnUnreadableRoot ?? file.failOnUnreadableRoot,
    };

    if (!options.interactive) {
      process.exitCode = await runReport(rootPath, config);
      return;
    }

    const app = new SizetreeApp(rootPath, (hooks) =>
      resolveEntry(rootPath, {
        concurrency: config.concurrency,
        failOnUnreadableRoot: config.failOnUnreadableRoot,
        ...hooks,
      }),
    );
    try {
      await app.start();
    } catch (error) {
      if (!(error instanceof RootUnreadableError)) throw error;
      process.stderr.write(chalk.red(`error: ${error.message}`) + "\n");
      process.exitCode = 1;
    }
  });

await program.parseAsync();
