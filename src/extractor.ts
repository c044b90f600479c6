import { readFileSync } from "node:fs";
import { DATABASE_SIZE, THROUGHPUT_RULES, firstMatch } from "./rules.js";
import type { ExtractedMetrics } from "./types.js";

/**
 * Extract throughput and database size from the text of one YCSB log.
 * Throws LogParseError when a matched value is not a number.
 */
export function extractMetrics(text: string): ExtractedMetrics {
  const throughput = firstMatch(THROUGHPUT_RULES, text);
  const metrics: ExtractedMetrics = {
    throughputOpsPerSec: throughput?.opsPerSec ?? 0,
    storageSizeMb: DATABASE_SIZE.parse(text) ?? 0,
  };
  if (throughput) {
    metrics.throughputSource = throughput.phase;
  }
  return metrics;
}

/**
 * Read and parse a log file. Failures are reported and yield no data.
 */
export function extractLogFile(path: string): ExtractedMetrics {
  try {
    return extractMetrics(readFileSync(path, "utf8"));
  } catch (error) {
    console.warn(
      `  Error parsing ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
    return { throughputOpsPerSec: 0, storageSizeMb: 0 };
  }
}
