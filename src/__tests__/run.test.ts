import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("node:fs/promises", () => ({
  readdir: vi.fn(),
  lstat: vi.fn(),
  stat: vi.fn(),
}));

import { Chalk } from "chalk";
import { runReport, type RunOptions } from "../run.js";
import { installFakeFs, Unlistable } from "./fake-fs.js";

const options: RunOptions = {
  concurrency: 4,
  pathWidth: 50,
  failOnUnreadableRoot: false,
  color: new Chalk({ level: 0 }),
};

function captureStreams() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    streams: {
      stdout: { write: (chunk: string) => out.push(chunk) },
      stderr: { write: (chunk: string) => err.push(chunk) },
    },
  };
}

beforeEach(() => {
  vi.clearAllMocks();
});

describe("runReport", () => {
  it("prints the sorted tree and exits 0", async () => {
    installFakeFs({ A: { f1: 100, f2: 50, B: { f3: 10 } } });
    const { out, err, streams } = captureStreams();

    expect(await runReport("/A", options, streams)).toBe(0);

    expect(out.join("")).toBe(
      "FOLDER     160 B [100.00%] /A\n" +
      "FOLDER      10 B [  6.25%] ->/A/B\n" +
      "FILE        10 B [100.00%] ->->/A/B/f3\n" +
      "FILE       100 B [ 62.50%] ->/A/f1\n" +
      "FILE        50 B [ 31.25%] ->/A/f2\n",
    );
    expect(err).toEqual([]);
  });

  it("warns on stderr and reports the unreadable directory as 0 B", async () => {
    installFakeFs({ A: { f1: 100, locked: new Unlistable("EACCES") } });
    const { out, err, streams } = captureStreams();

    expect(await runReport("/A", options, streams)).toBe(0);

    expect(out).toEqual([
      "FOLDER     100 B [100.00%] /A\n",
      "FOLDER       0 B [  0.00%] ->/A/locked\n",
      "FILE       100 B [100.00%] ->/A/f1\n",
    ]);
    expect(err).toEqual(["warning: cannot list directory /A/locked (EACCES)\n"]);
  });

  it("prints an empty tree for a missing root by default", async () => {
    installFakeFs({});
    const { out, err, streams } = captureStreams();

    expect(await runReport("/nope", options, streams)).toBe(0);

    expect(out).toEqual(["FOLDER       0 B [  0.00%] /nope\n"]);
    expect(err).toEqual(["warning: cannot list directory /nope (ENOENT)\n"]);
  });

  it("exits 1 for a missing root when that is fatal", async () => {
    installFakeFs({});
    const { out, err, streams } = captureStreams();

    expect(await runReport("/nope", { ...options, failOnUnreadableRoot: true }, streams)).toBe(1);

    expect(out).toEqual([]);
    expect(err).toEqual(["error: cannot read /nope (ENOENT)\n"]);
  });
});
