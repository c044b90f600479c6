export { extractMetrics, extractLogFile } from "./extractor.js";
export { decodeFilename, isCandidateLogFile } from "./filename.js";
export { collect } from "./collector.js";
export { runAnalysis, type AnalyzeOptions } from "./run.js";
export { aggregate, compareNames, filterPhase, recordKey, sortRecords } from "./aggregator.js";
export {
  DATABASE_SIZE,
  LOAD_THROUGHPUT,
  RUN_THROUGHPUT,
  THROUGHPUT_RULES,
  firstMatch,
  toMegabytes,
  type ParseRule,
  type SizeUnit,
  type ThroughputMatch,
} from "./rules.js";
export {
  buildReport,
  generateMarkdown,
  pivotThroughput,
  printSummary,
  storageSizes,
  summarizeDatabases,
  topPerformers,
  writeReport,
  type AnalysisReport,
  type DatabaseSummary,
  type ReportOptions,
  type TopPerformer,
} from "./report.js";
export { LogParseError, ResultsDirectoryError } from "./errors.js";
export { WORKLOAD_DESCRIPTIONS, describeWorkload } from "./workloads.js";
export {
  calculateStats,
  formatSize,
  formatThroughput,
  getEnvironmentInfo,
  type EnvironmentInfo,
} from "./utils.js";
export {
  PHASES,
  createRecord,
  isPhase,
  type BenchmarkRecord,
  type CollectDiagnostics,
  type CollectResult,
  type ExtractedMetrics,
  type Phase,
  type RecordKey,
} from "./types.js";
