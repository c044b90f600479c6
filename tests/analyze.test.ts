import { existsSync, readFileSync, readdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { runAnalysis, type AnalyzeOptions } from "../src/run.js";
import { makeResultsDir, runLog } from "./helpers.js";

const ENVIRONMENT = {
  totalMemoryGB: 16,
  cpuCores: 4,
  cpuModel: "Test CPU",
  platform: "linux",
  osRelease: "6.1.0",
  nodeVersion: "v20.11.0",
};

describe("runAnalysis", () => {
  const dirs: string[] = [];

  function options(
    files: Record<string, string>,
    overrides: Partial<AnalyzeOptions> = {}
  ): AnalyzeOptions {
    const results = makeResultsDir(files);
    dirs.push(results);
    return {
      results,
      output: join(results, "reports"),
      phase: "run",
      report: false,
      timestamp: "2024-01-02T03:04:05.678Z",
      environment: ENVIRONMENT,
      ...overrides,
    };
  }

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
    vi.restoreAllMocks();
  });

  it("stops cleanly when no usable data is found", () => {
    const opts = options({ "rocksdb_workloada_run_1.log": "aborted\n" }, { report: true });

    expect(runAnalysis(opts)).toBe(0);
    expect(console.log).toHaveBeenCalledWith("No benchmark data found!");
    expect(existsSync(opts.output)).toBe(false);
  });

  it("stops cleanly when the results directory is missing", () => {
    const opts = options({}, { report: true });
    opts.results = join(opts.results, "missing");

    expect(runAnalysis(opts)).toBe(0);
    expect(console.log).toHaveBeenCalledWith("No benchmark data found!");
    expect(existsSync(opts.output)).toBe(false);
  });

  it("rejects an unknown phase", () => {
    const opts = options({ "rocksdb_workloadc_run_1.log": runLog(1000000) }, { phase: "commit" });

    expect(runAnalysis(opts)).toBe(1);
    expect(console.error).toHaveBeenCalledWith("Unknown phase: commit (expected load or run)");
    expect(console.log).not.toHaveBeenCalled();
  });

  it("writes JSON and Markdown reports", () => {
    const opts = options(
      {
        "rocksdb_workloadc_run_1.log": runLog(1000000),
        "leveldb_workloadc_run_1.log": runLog(500000),
      },
      { report: true }
    );

    expect(runAnalysis(opts)).toBe(0);
    expect(readdirSync(opts.output).sort()).toEqual([
      "analysis-2024-01-02T03-04-05.json",
      "analysis-2024-01-02T03-04-05.md",
    ]);
    const md = readFileSync(join(opts.output, "analysis-2024-01-02T03-04-05.md"), "utf8");
    expect(md.split("\n")).toContain("| workloadc | 0.50 | 1.00 |");
  });

  it("writes nothing without --report", () => {
    const opts = options({ "rocksdb_workloadc_run_1.log": runLog(1000000) });

    expect(runAnalysis(opts)).toBe(0);
    expect(console.log).toHaveBeenCalledWith("  workloadc: rocksdb (1.0M ops/sec)");
    expect(existsSync(opts.output)).toBe(false);
  });

  it("fails when the results path is not a directory", () => {
    const opts = options({ "rocksdb_workloadc_run_1.log": runLog(1000000) });
    opts.results = join(opts.results, "rocksdb_workloadc_run_1.log");

    expect(runAnalysis(opts)).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      "Fatal error:",
      expect.stringContaining("Cannot read results directory")
    );
  });
});
