import { collect } from "./collector.js";
import { buildReport, printSummary, writeReport } from "./report.js";
import { isPhase } from "./types.js";
import type { EnvironmentInfo } from "./utils.js";

export interface AnalyzeOptions {
  results: string;
  output: string;
  /** Unvalidated phase as given on the command line */
  phase: string;
  report: boolean;
  timestamp?: string;
  environment?: EnvironmentInfo;
}

/**
 * Run the whole analysis and return the process exit code. An empty results
 * directory is a normal stop, not a failure.
 */
export function runAnalysis(options: AnalyzeOptions): number {
  const { phase } = options;
  if (!isPhase(phase)) {
    console.error(`Unknown phase: ${phase} (expected load or run)`);
    return 1;
  }

  try {
    console.log("=== YCSB Result Analysis ===");
    console.log(`Results: ${options.results}`);

    const { records, diagnostics } = collect(options.results);
    console.log(
      `Log files: ${String(diagnostics.candidates)} found, ${String(records.length)} usable, ` +
        `${String(diagnostics.undecodable)} unrecognized names, ${String(diagnostics.empty)} without throughput`
    );

    if (records.length === 0) {
      console.log("No benchmark data found!");
      return 0;
    }

    const cmdParts = ["npm run analyze --", `-d ${options.results}`, `-p ${phase}`];
    if (options.report) cmdParts.push(`-o ${options.output}`, "--report");

    const report = buildReport(records, diagnostics, {
      resultsDir: options.results,
      phase,
      command: cmdParts.join(" "),
      timestamp: options.timestamp,
      environment: options.environment,
    });

    console.log("");
    printSummary(report);

    if (options.report) {
      const { jsonPath, mdPath } = writeReport(report, options.output);
      console.log(`\nGenerated JSON report: ${jsonPath}`);
      console.log(`Generated Markdown report: ${mdPath}`);
    }

    console.log("\n=== Done ===");
    return 0;
  } catch (error: unknown) {
    console.error("Fatal error:", error instanceof Error ? error.message : error);
    return 1;
  }
}
