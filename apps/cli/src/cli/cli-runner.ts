import type { BenchmarkRequest, BenchmarkSummary } from "../benchmark/types.js";
import { CliUsageError } from "../common/errors.js";
import { formatReport } from "../report/report-formatter.js";
import { type CliCommand, parseCliArgs, USAGE } from "./cli-options.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export type BenchmarkRunner = (request: BenchmarkRequest, signal?: AbortSignal) => Promise<BenchmarkSummary>;

export interface TextSink {
  write(chunk: string): unknown;
}

export interface CliStreams {
  stdout: TextSink;
  stderr: TextSink;
}

/**
 * Runs one CLI invocation and returns its exit code.
 *
 * `runBenchmark` is only called for a valid run command, so printing usage never boots
 * the application context.
 */
export async function runCli(
  argv: string[],
  runBenchmark: BenchmarkRunner,
  streams: CliStreams,
  signal?: AbortSignal,
): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      streams.stderr.write(`${error.message}\n\n${USAGE}`);
      return EXIT_FAILURE;
    }
    throw error;
  }

  // No URL is a request for help, not a misuse.
  if (command.kind === "usage") {
    streams.stdout.write(USAGE);
    return EXIT_OK;
  }

  const summary = await runBenchmark(command.request, signal);
  streams.stdout.write(`${formatReport(summary).join("\n")}\n`);
  return summary.cancelled ? EXIT_INTERRUPTED : EXIT_OK;
}
