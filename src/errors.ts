/**
 * A value in a log file matched a pattern but is not a usable number
 */
export class LogParseError extends Error {
  constructor(
    readonly rule: string,
    readonly raw: string
  ) {
    super(`${rule}: cannot parse "${raw}" as a number`);
    this.name = "LogParseError";
  }
}

/**
 * The results directory itself cannot be listed
 */
export class ResultsDirectoryError extends Error {
  constructor(
    readonly directory: string,
    cause: unknown
  ) {
    super(
      `Cannot read results directory ${directory}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "ResultsDirectoryError";
  }
}
