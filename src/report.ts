import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { aggregate, compareNames, filterPhase, sortRecords } from "./aggregator.js";
import type { BenchmarkRecord, CollectDiagnostics, Phase } from "./types.js";
import {
  calculateStats,
  formatSize,
  formatThroughput,
  getEnvironmentInfo,
  type EnvironmentInfo,
} from "./utils.js";
import { describeWorkload } from "./workloads.js";

export interface DatabaseSummary {
  database: string;
  avgMillions: number;
  maxMillions: number;
  minMillions: number;
  workloadsTested: number;
}

export interface TopPerformer {
  workload: string;
  database: string;
  throughputOpsPerSec: number;
}

export interface AnalysisReport {
  timestamp: string;
  command: string;
  resultsDir: string;
  phase: Phase;
  environment: EnvironmentInfo;
  diagnostics: CollectDiagnostics & { usable: number };
  databases: string[];
  workloads: string[];
  /** Aggregated records of the reported phase, sorted */
  dataset: BenchmarkRecord[];
  summary: DatabaseSummary[];
  topPerformers: TopPerformer[];
}

export interface ReportOptions {
  resultsDir: string;
  phase: Phase;
  command: string;
  timestamp?: string;
  /** Detected from the running machine when omitted */
  environment?: EnvironmentInfo;
}

function unique(values: string[]): string[] {
  return [...new Set(values)].sort(compareNames);
}

/**
 * Workload -> database -> throughput in millions of ops/sec
 */
export function pivotThroughput(dataset: readonly BenchmarkRecord[]): Map<string, Map<string, number>> {
  const pivot = new Map<string, Map<string, number>>();
  for (const record of sortRecords(dataset)) {
    const row = pivot.get(record.workload) ?? new Map<string, number>();
    row.set(record.database, Math.max(row.get(record.database) ?? 0, record.throughputMillions));
    pivot.set(record.workload, row);
  }
  return pivot;
}

/**
 * Per-database throughput statistics over every usable log, repeats included
 */
export function summarizeDatabases(records: readonly BenchmarkRecord[]): DatabaseSummary[] {
  return unique(records.map((r) => r.database)).map((database) => {
    const own = records.filter((r) => r.database === database);
    const stats = calculateStats(own.map((r) => r.throughputMillions));
    return {
      database,
      avgMillions: stats.avg,
      maxMillions: stats.max,
      minMillions: stats.min,
      workloadsTested: new Set(own.map((r) => r.workload)).size,
    };
  });
}

/**
 * Fastest database for each workload, workloads in alphabetical order
 */
export function topPerformers(dataset: readonly BenchmarkRecord[]): TopPerformer[] {
  const best = new Map<string, BenchmarkRecord>();
  for (const record of sortRecords(dataset)) {
    const current = best.get(record.workload);
    if (!current || record.throughputOpsPerSec > current.throughputOpsPerSec) {
      best.set(record.workload, record);
    }
  }
  return [...best.values()]
    .sort((a, b) => compareNames(a.workload, b.workload))
    .map((r) => ({
      workload: r.workload,
      database: r.database,
      throughputOpsPerSec: r.throughputOpsPerSec,
    }));
}

/**
 * Records that reported a database size; empty if none did
 */
export function storageSizes(dataset: readonly BenchmarkRecord[]): BenchmarkRecord[] {
  return sortRecords(dataset.filter((r) => r.storageSizeMb > 0));
}

/**
 * Build the report for one phase from the raw usable records
 */
export function buildReport(
  records: readonly BenchmarkRecord[],
  diagnostics: CollectDiagnostics,
  options: ReportOptions
): AnalysisReport {
  const phaseRecords = filterPhase(records, options.phase);
  const dataset = sortRecords(aggregate(phaseRecords));

  return {
    timestamp: options.timestamp ?? new Date().toISOString(),
    command: options.command,
    resultsDir: options.resultsDir,
    phase: options.phase,
    environment: options.environment ?? getEnvironmentInfo(),
    diagnostics: { ...diagnostics, usable: records.length },
    databases: unique(dataset.map((r) => r.database)),
    workloads: unique(dataset.map((r) => r.workload)),
    dataset,
    summary: summarizeDatabases(phaseRecords),
    topPerformers: topPerformers(dataset),
  };
}

function matrix(
  databases: string[],
  rows: Map<string, Map<string, number>>,
  format: (value: number) => string
): string[] {
  const lines = [
    `| Workload | ${databases.join(" | ")} |`,
    `|----------|${databases.map(() => "------:").join("|")}|`,
  ];
  for (const [workload, row] of rows) {
    const cells = databases.map((db) => {
      const value = row.get(db);
      return value === undefined ? "-" : format(value);
    });
    lines.push(`| ${workload} | ${cells.join(" | ")} |`);
  }
  return lines;
}

export function generateMarkdown(report: AnalysisReport): string {
  const d = report.diagnostics;
  const env = report.environment;

  const lines: string[] = [
    "# YCSB Analysis Report",
    "",
    `**Date:** ${report.timestamp}`,
    `**Results Directory:** ${report.resultsDir}`,
    `**Phase:** ${report.phase}`,
    "",
    "## Environment",
    "",
    "| Property | Value |",
    "|----------|-------|",
    `| Total Memory | ${String(env.totalMemoryGB)} GB |`,
    `| CPU Cores | ${String(env.cpuCores)} |`,
    `| CPU Model | ${env.cpuModel} |`,
    `| Platform | ${env.platform} ${env.osRelease} |`,
    `| Node.js | ${env.nodeVersion} |`,
    "",
    "| Log Files | Count |",
    "|-----------|------:|",
    `| Candidates | ${String(d.candidates)} |`,
    `| Usable | ${String(d.usable)} |`,
    `| Name not recognized | ${String(d.undecodable)} |`,
    `| No throughput | ${String(d.empty)} |`,
    "",
    "**Command to reproduce:**",
    "```bash",
    report.command,
    "```",
    "",
  ];

  if (report.dataset.length === 0) {
    lines.push(`No ${report.phase} phase data found.`);
    lines.push("");
    return lines.join("\n");
  }

  lines.push("## Throughput (M ops/sec)");
  lines.push("");
  lines.push(...matrix(report.databases, pivotThroughput(report.dataset), (v) => v.toFixed(2)));
  lines.push("");

  lines.push("## Top Performers");
  lines.push("");
  lines.push("| Workload | Description | Database | Throughput |");
  lines.push("|----------|-------------|----------|-----------:|");
  for (const top of report.topPerformers) {
    lines.push(
      `| ${top.workload} | ${describeWorkload(top.workload)} | ${top.database} | ${formatThroughput(top.throughputOpsPerSec)} |`
    );
  }
  lines.push("");

  lines.push("## Database Summary");
  lines.push("");
  lines.push("| Database | Avg (Mops/s) | Max (Mops/s) | Min (Mops/s) | Workloads Tested |");
  lines.push("|----------|-------------:|-------------:|-------------:|-----------------:|");
  for (const s of report.summary) {
    lines.push(
      `| ${s.database} | ${s.avgMillions.toFixed(2)} | ${s.maxMillions.toFixed(2)} | ${s.minMillions.toFixed(2)} | ${String(s.workloadsTested)} |`
    );
  }
  lines.push("");

  const sizes = storageSizes(report.dataset);
  if (sizes.length > 0) {
    const rows = new Map<string, Map<string, number>>();
    for (const r of sizes) {
      const row = rows.get(r.workload) ?? new Map<string, number>();
      row.set(r.database, r.storageSizeMb);
      rows.set(r.workload, row);
    }
    lines.push("## Database Size");
    lines.push("");
    lines.push(...matrix(report.databases, rows, formatSize));
    lines.push("");
  }

  return lines.join("\n");
}

/**
 * Write JSON and Markdown reports into `outputDir`, creating it if needed
 */
export function writeReport(
  report: AnalysisReport,
  outputDir: string
): { jsonPath: string; mdPath: string } {
  mkdirSync(outputDir, { recursive: true });

  const timestamp = report.timestamp.replace(/[:.]/g, "-").slice(0, 19);

  const jsonPath = join(outputDir, `analysis-${timestamp}.json`);
  writeFileSync(jsonPath, JSON.stringify(report, null, 2));

  const mdPath = join(outputDir, `analysis-${timestamp}.md`);
  writeFileSync(mdPath, generateMarkdown(report));

  return { jsonPath, mdPath };
}

export function printSummary(report: AnalysisReport): void {
  console.log(`Found ${String(report.diagnostics.usable)} benchmark results`);
  console.log(`Databases tested: ${report.databases.join(", ")}`);
  console.log(`Workloads tested: ${report.workloads.join(", ")}`);

  if (report.dataset.length === 0) {
    console.log(`No '${report.phase}' phase data found.`);
    return;
  }

  console.log("\nTop performers:");
  for (const top of report.topPerformers) {
    console.log(
      `  ${top.workload}: ${top.database} (${formatThroughput(top.throughputOpsPerSec, 1)} ops/sec)`
    );
  }
}
