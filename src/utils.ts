import os from "node:os";

/**
 * Format ops/sec as millions, e.g. 1440260 -> "1.44M"
 */
export function formatThroughput(opsPerSec: number, digits = 2): string {
  return `${(opsPerSec / 1_000_000).toFixed(digits)}M`;
}

/**
 * Format a size given in megabytes, switching to GB from 1024 MB up
 */
export function formatSize(mb: number): string {
  if (mb <= 0) return "-";
  if (mb < 1) return `${(mb * 1024).toFixed(1)} KB`;
  if (mb < 1024) return `${mb.toFixed(1)} MB`;
  return `${(mb / 1024).toFixed(2)} GB`;
}

/**
 * Calculate statistics from an array of numbers
 */
export function calculateStats(values: number[]): {
  min: number;
  max: number;
  avg: number;
} {
  if (values.length === 0) {
    return { min: 0, max: 0, avg: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const sum = sorted.reduce((a, b) => a + b, 0);

  return {
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
    avg: sum / sorted.length,
  };
}

/**
 * Environment information for reports
 */
export interface EnvironmentInfo {
  /** Total system memory in GB */
  totalMemoryGB: number;
  /** Number of CPU cores */
  cpuCores: number;
  /** CPU model */
  cpuModel: string;
  /** Operating system platform */
  platform: string;
  /** Operating system release */
  osRelease: string;
  /** Node.js version */
  nodeVersion: string;
}

/**
 * Detect information about the machine producing the report
 */
export function getEnvironmentInfo(): EnvironmentInfo {
  const cpus = os.cpus();
  return {
    totalMemoryGB: Math.round(os.totalmem() / (1024 * 1024 * 1024)),
    cpuCores: cpus.length,
    cpuModel: cpus[0]?.model ?? "Unknown",
    platform: os.platform(),
    osRelease: os.release(),
    nodeVersion: process.version,
  };
}
