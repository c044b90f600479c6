export type Phase = "load" | "run";

export const PHASES: readonly Phase[] = ["load", "run"];

export interface RecordKey {
  database: string;
  workload: string;
  phase: Phase;
}

export interface BenchmarkRecord {
  readonly database: string;
  readonly workload: string;
  readonly phase: Phase;
  readonly throughputOpsPerSec: number;
  /** throughputOpsPerSec / 1_000_000, kept for display */
  readonly throughputMillions: number;
  /** Always megabytes; 0 when the log did not report a size */
  readonly storageSizeMb: number;
}

export interface ExtractedMetrics {
  /** 0 when no throughput line was found */
  throughputOpsPerSec: number;
  storageSizeMb: number;
  /** Phase label of the throughput line that matched */
  throughputSource?: Phase;
}

export interface CollectDiagnostics {
  /** Files matching the `*_*.log` pattern */
  candidates: number;
  /** Candidates whose name does not follow `<db>_<workload>_<phase>_<ts>.log` */
  undecodable: number;
  /** Decoded files that yielded no positive throughput */
  empty: number;
}

export interface CollectResult {
  records: BenchmarkRecord[];
  diagnostics: CollectDiagnostics;
}

export function isPhase(value: string): value is Phase {
  return PHASES.some((phase) => phase === value);
}

/**
 * Build an immutable record, deriving the throughput in millions
 */
export function createRecord(
  key: RecordKey,
  metrics: Pick<ExtractedMetrics, "throughputOpsPerSec" | "storageSizeMb">
): BenchmarkRecord {
  return Object.freeze({
    database: key.database,
    workload: key.workload,
    phase: key.phase,
    throughputOpsPerSec: metrics.throughputOpsPerSec,
    throughputMillions: metrics.throughputOpsPerSec / 1_000_000,
    storageSizeMb: metrics.storageSizeMb,
  });
}
