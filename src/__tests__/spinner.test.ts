import { describe, it, expect } from "vitest";
import { formatElapsed, formatScanStatus, spinnerFrame } from "../tui/spinner.js";

describe("spinnerFrame", () => {
  it("cycles through the frames", () => {
    expect(spinnerFrame(0)).toBe("⠋");
    expect(spinnerFrame(8)).toBe("⠋");
    expect(spinnerFrame(1)).toBe("⠙");
  });
});

describe("formatElapsed", () => {
  it("shows seconds under a minute", () => {
    expect(formatElapsed(0, 42_500)).toBe("42s");
  });

  it("shows minutes and seconds", () => {
    expect(formatElapsed(0, 125_000)).toBe("2m 5s");
  });
});

describe("formatScanStatus", () => {
  it("shows resolved over discovered directories, files and bytes", () => {
    const status = formatScanStatus({ discovered: 10, resolved: 5, files: 310, bytes: 2048 }, 1, 10);
    expect(status).toBe("⠙ dirs [█████░░░░░] 5/10 · 310 files · 2.0 KB");
  });
});
