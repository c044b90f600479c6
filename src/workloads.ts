/**
 * Operation mix of the standard YCSB workloads and the scan variants used in
 * the benchmark scripts. Unknown workloads have no description.
 */
export const WORKLOAD_DESCRIPTIONS: Readonly<Record<string, string>> = {
  workloada: "Update heavy (50% read, 50% update)",
  workloadb: "Read mostly (95% read, 5% update)",
  workloadc: "Read only (100% read)",
  workloadd: "Read latest (95% read, 5% insert)",
  workloade: "Short ranges (95% scan, 5% insert)",
  workloadf: "Read-modify-write (50% read, 50% RMW)",
  workload_scan: "Realistic scan (50% read, 50% scan 10-100)",
  workload_scan10: "Small scan (50% read, 50% scan-10)",
  workload_scan100: "Large scan (50% read, 50% scan-100)",
};

export function describeWorkload(workload: string): string {
  return WORKLOAD_DESCRIPTIONS[workload] ?? "";
}
