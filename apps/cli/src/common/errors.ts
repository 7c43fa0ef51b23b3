/**
 * Raised by latency statistics when the run recorded no successful request,
 * so there is no latency sample to summarize.
 */
export class NoSuccessfulRequestsError extends Error {
  readonly name = "NoSuccessfulRequestsError";

  constructor(public readonly statistic: string) {
    super(`Cannot compute ${statistic}: no successful requests were recorded`);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NoSuccessfulRequestsError);
    }
  }
}

/**
 * Raised when a benchmark component is used outside its lifecycle,
 * e.g. recording into a stopped run or starting a dispatcher twice.
 */
export class BenchmarkStateError extends Error {
  readonly name = "BenchmarkStateError";

  constructor(message: string) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BenchmarkStateError);
    }
  }
}

/**
 * Invalid command-line input. The CLI prints the message followed by usage text.
 */
export class CliUsageError extends Error {
  readonly name = "CliUsageError";

  constructor(message: string) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CliUsageError);
    }
  }
}
