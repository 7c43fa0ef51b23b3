import { NANOS_PER_MICRO, NANOS_PER_MILLI, NANOS_PER_SECOND } from "../common/constants.js";
import type { BenchmarkSummary } from "../benchmark/types.js";

const NOT_AVAILABLE = "n/a";

function formatScaled(ns: bigint, unitNs: bigint, fractionDigits: number, suffix: string): string {
  const whole = ns / unitNs;
  const fraction = (ns % unitNs).toString().padStart(fractionDigits, "0").replace(/0+$/, "");
  return fraction.length > 0 ? `${whole}.${fraction}${suffix}` : `${whole}${suffix}`;
}

/**
 * Renders a nanosecond duration with the largest unit that keeps the integer part non-zero,
 * e.g. `100ms`, `1.5s`, `12.345678ms`.
 */
export function formatDuration(ns: bigint): string {
  if (ns === 0n) {
    return "0s";
  }
  const sign = ns < 0n ? "-" : "";
  const magnitude = ns < 0n ? -ns : ns;

  if (magnitude < NANOS_PER_MICRO) {
    return `${sign}${magnitude}ns`;
  }
  if (magnitude < NANOS_PER_MILLI) {
    return sign + formatScaled(magnitude, NANOS_PER_MICRO, 3, "µs");
  }
  if (magnitude < NANOS_PER_SECOND) {
    return sign + formatScaled(magnitude, NANOS_PER_MILLI, 6, "ms");
  }
  return sign + formatScaled(magnitude, NANOS_PER_SECOND, 9, "s");
}

export function formatReport(summary: BenchmarkSummary): string[] {
  const { latency } = summary;
  const latencyLine = (value: bigint | undefined) => (value === undefined ? NOT_AVAILABLE : formatDuration(value));

  const lines = [
    `Successful requests: ${summary.successCount}`,
    `Failed requests: ${summary.failureCount}`,
    `Transferred kilobytes: ${Math.floor(summary.transferredBytes / 1024)}`,
    `Kilobytes per second: ${summary.throughputKBps}`,
    `Elapsed wall-clock time: ${formatDuration(summary.elapsedNs)}`,
    `Slowest request: ${latencyLine(latency?.slowestNs)}`,
    `Median request: ${latencyLine(latency?.medianNs)}`,
    `Fastest request: ${latencyLine(latency?.fastestNs)}`,
    `Average request: ${latencyLine(latency?.averageNs)}`,
    `Standard deviation: ${latencyLine(latency?.standardDeviationNs)}`,
  ];

  if (summary.cancelled) {
    lines.push("Run cancelled before completion");
  }
  return lines;
}
