import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { DEFAULT_CONCURRENCY } from "./aggregator.js";

export interface SizetreeConfig {
  concurrency: number;
  pathWidth: number;
  failOnUnreadableRoot: boolean;
}

export const CONFIG_PATH = join(homedir(), ".config", "sizetree", "config.json");

export const DEFAULT_CONFIG: SizetreeConfig = {
  concurrency: DEFAULT_CONCURRENCY,
  pathWidth: 50,
  failOnUnreadableRoot: false,
};

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

/** Reads the config file; missing, unreadable or malformed fields fall back to defaults. */
export async function loadConfig(path = CONFIG_PATH): Promise<SizetreeConfig> {
  const config = { ...DEFAULT_CONFIG };
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf-8"));
  } catch {
    return config;
  }
  if (typeof parsed !== "object" || parsed === null) return config;

  if ("concurrency" in parsed && isCount(parsed.concurrency)) {
    config.concurrency = parsed.concurrency;
  }
  if ("pathWidth" in parsed && isCount(parsed.pathWidth)) {
    config.pathWidth = parsed.pathWidth;
  }
  if ("failOnUnreadableRoot" in parsed && typeof parsed.failOnUnreadableRoot === "boolean") {
    config.failOnUnreadableRoot = parsed.failOnUnreadableRoot;
  }
  return config;
}
