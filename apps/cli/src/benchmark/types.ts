import type { HttpVersion } from "../probe/types.js";

/** Outcome of one completed probe, as handed from a probe task to the aggregator. */
export interface Measurement {
  readonly statusCode: number;
  readonly replySize: number;
  /** Wall-clock time from issuance to completion, in nanoseconds. */
  readonly durationNs: bigint;
}

/** All values in nanoseconds. */
export interface LatencyStatistics {
  slowestNs: bigint;
  medianNs: bigint;
  fastestNs: bigint;
  averageNs: bigint;
  standardDeviationNs: bigint;
}

export interface BenchmarkSummary {
  successCount: number;
  failureCount: number;
  transferredBytes: number;
  elapsedNs: bigint;
  throughputKBps: number;
  /** `null` when no request succeeded, so there is no latency sample. */
  latency: LatencyStatistics | null;
  cancelled: boolean;
}

/** Per-run input; omitted values fall back to configuration. */
export interface BenchmarkRequest {
  url: string;
  concurrency?: number;
  repetitions?: number;
  timeoutMs?: number;
  httpVersion?: HttpVersion;
}

export interface BenchmarkSettings {
  url: string;
  concurrency: number;
  repetitions: number;
  timeoutMs: number;
  httpVersion: HttpVersion;
}
