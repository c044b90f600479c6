import { readdirSync } from "node:fs";
import { join } from "node:path";
import { ResultsDirectoryError } from "./errors.js";
import { extractLogFile } from "./extractor.js";
import { decodeFilename, isCandidateLogFile } from "./filename.js";
import { createRecord, type BenchmarkRecord, type CollectResult } from "./types.js";

function listLogFiles(directory: string): string[] {
  try {
    return readdirSync(directory, { withFileTypes: true })
      .filter((entry) => entry.isFile() && isCandidateLogFile(entry.name))
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      console.warn(`  Results directory ${directory} does not exist`);
      return [];
    }
    throw new ResultsDirectoryError(directory, error);
  }
}

/**
 * Collect one record per log file in `directory` that has a decodable name
 * and a positive throughput. Records for the same key are not merged here.
 */
export function collect(directory: string): CollectResult {
  const files = listLogFiles(directory);
  const records: BenchmarkRecord[] = [];
  const diagnostics = { candidates: files.length, undecodable: 0, empty: 0 };

  for (const file of files) {
    const key = decodeFilename(file);
    if (!key) {
      diagnostics.undecodable++;
      continue;
    }

    const metrics = extractLogFile(join(directory, file));
    if (metrics.throughputOpsPerSec > 0) {
      records.push(createRecord(key, metrics));
    } else {
      diagnostics.empty++;
    }
  }

  return { records, diagnostics };
}
