import type { BenchmarkRecord, Phase, RecordKey } from "./types.js";

/**
 * Collision-free key for a (database, workload, phase) triple
 */
export function recordKey(key: RecordKey): string {
  return JSON.stringify([key.database, key.workload, key.phase]);
}

/**
 * Collapse records sharing (database, workload, phase) into one. Each metric
 * is the maximum seen for that key, taken independently of the others.
 * Keys keep the order of their first appearance.
 */
export function aggregate(records: readonly BenchmarkRecord[]): BenchmarkRecord[] {
  const groups = new Map<string, BenchmarkRecord>();

  for (const record of records) {
    const id = recordKey(record);
    const current = groups.get(id);
    if (!current) {
      groups.set(id, record);
      continue;
    }
    groups.set(
      id,
      Object.freeze({
        database: current.database,
        workload: current.workload,
        phase: current.phase,
        throughputOpsPerSec: Math.max(current.throughputOpsPerSec, record.throughputOpsPerSec),
        throughputMillions: Math.max(current.throughputMillions, record.throughputMillions),
        storageSizeMb: Math.max(current.storageSizeMb, record.storageSizeMb),
      })
    );
  }

  return [...groups.values()];
}

export function filterPhase(records: readonly BenchmarkRecord[], phase: Phase): BenchmarkRecord[] {
  return records.filter((r) => r.phase === phase);
}

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Alphabetical by database, then workload, then phase
 */
export function sortRecords(records: readonly BenchmarkRecord[]): BenchmarkRecord[] {
  return [...records].sort(
    (a, b) =>
      compareNames(a.database, b.database) ||
      compareNames(a.workload, b.workload) ||
      compareNames(a.phase, b.phase)
  );
}
