import { parseArgs } from "node:util";
import { runAnalysis } from "./run.js";

const DEFAULT_RESULTS_DIR = "benchmark_results";
const DEFAULT_OUTPUT_DIR = "benchmark_reports";

const { values } = parseArgs({
  options: {
    results: { type: "string", short: "d", default: DEFAULT_RESULTS_DIR },
    output: { type: "string", short: "o", default: DEFAULT_OUTPUT_DIR },
    phase: { type: "string", short: "p", default: "run" },
    report: { type: "boolean", default: false },
    help: { type: "boolean", short: "h", default: false },
  },
});

if (values.help) {
  console.log(`
Usage: npm run analyze -- [options]

Options:
  -d, --results <dir>  Directory with YCSB log files (default: ${DEFAULT_RESULTS_DIR})
  -o, --output <dir>   Directory for reports (default: ${DEFAULT_OUTPUT_DIR})
  -p, --phase <phase>  Phase to report on: load or run (default: run)
  --report             Generate JSON and Markdown reports in the output directory
  -h, --help           Show this help message

Log files are expected to be named <database>_<workload>_<phase>_<timestamp>.log.

Examples:
  npm run analyze                              # Console summary of benchmark_results/
  npm run analyze -- -d results/2024-06 --report
  npm run analyze -- --phase load              # Compare load throughput
`);
  process.exit(0);
}

process.exitCode = runAnalysis(values);
