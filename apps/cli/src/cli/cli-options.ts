import { parseArgs } from "node:util";
import { APP_NAME } from "../common/constants.js";
import { CliUsageError } from "../common/errors.js";
import type { BenchmarkRequest } from "../benchmark/types.js";

export const USAGE = `Usage: ${APP_NAME} [options] <url>

Repeatedly fetches <url>, keeping a fixed number of requests in flight,
and prints throughput and latency statistics.

Options:
  -c, --concurrency <n>   requests kept in flight (default: BENCH_CONCURRENCY or 5)
  -r, --repetitions <n>   total requests to issue (default: BENCH_REPETITIONS or 300)
  -t, --timeout <ms>      per-request deadline (default: PROBE_TIMEOUT_MS or 30000)
      --http2             use the HTTP/2 transport
  -h, --help              show this help
`;

export type CliCommand = { kind: "usage" } | { kind: "run"; request: BenchmarkRequest };

function parsePositiveInt(option: string, raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const trimmed = raw.trim();
  const value = Number.parseInt(trimmed, 10);
  if (!/^\d+$/.test(trimmed) || value < 1 || !Number.isSafeInteger(value)) {
    throw new CliUsageError(`Invalid value for --${option}: "${raw}" (expected a positive integer)`);
  }
  return value;
}

function parseTargetUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new CliUsageError(`Invalid URL: "${raw}"`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new CliUsageError(`Unsupported URL scheme "${url.protocol}": only http and https are supported`);
  }
  return raw;
}

/**
 * Turns argv (without the node binary and script path) into a command.
 * A missing URL is not an error: the caller prints usage and exits successfully.
 */
export function parseCliArgs(argv: string[]): CliCommand {
  let parsed: ReturnType<typeof parseOptions>;
  try {
    parsed = parseOptions(argv);
  } catch (error) {
    if (error instanceof TypeError) {
      throw new CliUsageError(error.message);
    }
    throw error;
  }

  const { values, positionals } = parsed;
  if (values.help || positionals.length === 0) {
    return { kind: "usage" };
  }
  if (positionals.length > 1) {
    throw new CliUsageError(`Expected a single target URL, got ${positionals.length}`);
  }

  const request: BenchmarkRequest = { url: parseTargetUrl(positionals[0]) };
  const concurrency = parsePositiveInt("concurrency", values.concurrency);
  const repetitions = parsePositiveInt("repetitions", values.repetitions);
  const timeoutMs = parsePositiveInt("timeout", values.timeout);
  if (concurrency !== undefined) request.concurrency = concurrency;
  if (repetitions !== undefined) request.repetitions = repetitions;
  if (timeoutMs !== undefined) request.timeoutMs = timeoutMs;
  if (values.http2) request.httpVersion = "2";

  return { kind: "run", request };
}

function parseOptions(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      concurrency: { type: "string", short: "c" },
      repetitions: { type: "string", short: "r" },
      timeout: { type: "string", short: "t" },
      http2: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });
}
