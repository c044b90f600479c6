import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Create a temp results directory holding the given log files
 */
export function makeResultsDir(files: Record<string, string>): string {
  const dir = mkdtempSync(join(tmpdir(), "ycsb-results-"));
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(join(dir, name), content);
  }
  return dir;
}

export function runLog(opsPerSec: number | string, size?: string): string {
  const lines = [`Run operations: 1000000`, `Run throughput(ops/sec): ${String(opsPerSec)}`];
  if (size) lines.push(`Database size: ${size}`);
  return lines.join("\n") + "\n";
}

export function loadLog(opsPerSec: number | string): string {
  return `Load operations: 1000000\nLoad throughput(ops/sec): ${String(opsPerSec)}\n`;
}
