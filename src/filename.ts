import { isPhase, type RecordKey } from "./types.js";

const SEPARATOR = "_";

/**
 * Files the collector looks at: `*_*.log`
 */
export function isCandidateLogFile(name: string): boolean {
  return name.endsWith(".log") && name.slice(0, -".log".length).includes(SEPARATOR);
}

function stripExtension(name: string): string {
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(0, dot) : name;
}

/**
 * Decode `<database>_<workload>_<phase>_<timestamp>.log`.
 *
 * The workload may itself contain underscores (`workload_scan100`), so the
 * phase is located as the first `load`/`run` token after the database and
 * everything in between is the workload. Returns undefined for names that
 * do not follow the convention.
 */
export function decodeFilename(filename: string): RecordKey | undefined {
  const tokens = stripExtension(filename).split(SEPARATOR);
  if (tokens.length < 4) return undefined;

  const database = tokens[0];
  if (!database) return undefined;

  const phaseIdx = tokens.findIndex((token, i) => i > 0 && isPhase(token));
  const phase = tokens[phaseIdx];
  if (phase === undefined || !isPhase(phase)) return undefined;

  return {
    database,
    workload: tokens.slice(1, phaseIdx).join(SEPARATOR),
    phase,
  };
}
