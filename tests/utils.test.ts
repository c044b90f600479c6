import os from "node:os";
import { describe, it, expect } from "vitest";
import {
  calculateStats,
  formatSize,
  formatThroughput,
  getEnvironmentInfo,
} from "../src/utils.js";
import { describeWorkload } from "../src/workloads.js";

describe("formatThroughput", () => {
  it("formats millions of ops/sec", () => {
    expect(formatThroughput(1440260)).toBe("1.44M");
    expect(formatThroughput(500000, 1)).toBe("0.5M");
  });
});

describe("formatSize", () => {
  it("formats sizes", () => {
    expect(formatSize(0)).toBe("-");
    expect(formatSize(0.5)).toBe("512.0 KB");
    expect(formatSize(128)).toBe("128.0 MB");
    expect(formatSize(1536)).toBe("1.50 GB");
  });
});

describe("calculateStats", () => {
  it("calculates stats for empty array", () => {
    expect(calculateStats([])).toEqual({ min: 0, max: 0, avg: 0 });
  });

  it("calculates stats for multiple values", () => {
    const stats = calculateStats([10, 20, 30, 40, 50]);
    expect(stats.min).toBe(10);
    expect(stats.max).toBe(50);
    expect(stats.avg).toBe(30);
  });
});

describe("describeWorkload", () => {
  it("describes known workloads", () => {
    expect(describeWorkload("workloadc")).toBe("Read only (100% read)");
    expect(describeWorkload("custom")).toBe("");
  });
});

describe("getEnvironmentInfo", () => {
  it("describes the current machine", () => {
    const env = getEnvironmentInfo();
    expect(env.nodeVersion).toBe(process.version);
    expect(env.platform).toBe(process.platform);
    expect(env.cpuCores).toBe(os.cpus().length);
    expect(env.totalMemoryGB).toBeGreaterThanOrEqual(0);
    expect(env.cpuModel).toBe(os.cpus()[0]?.model ?? "Unknown");
  });
});
