import { type Clock, monotonicClock } from "../common/clock.js";
import { NANOS_PER_SECOND, SUCCESS_STATUS_MAX, SUCCESS_STATUS_MIN } from "../common/constants.js";
import { BenchmarkStateError, NoSuccessfulRequestsError } from "../common/errors.js";
import type { BenchmarkSummary, LatencyStatistics, Measurement } from "./types.js";

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= SUCCESS_STATUS_MIN && statusCode <= SUCCESS_STATUS_MAX;
}

/**
 * Running totals and latency statistics for one benchmark.
 *
 * Owned by a single consumer: only the loop draining the measurement queue may call
 * `recordMeasurement` and `stop`. Probe tasks never touch it.
 */
export class BenchmarkRun {
  readonly startedAt: bigint;
  private endedAt: bigint | null = null;
  private successes = 0;
  private failures = 0;
  private bytes = 0;
  private readonly latencies: bigint[] = [];

  constructor(private readonly clock: Clock = monotonicClock) {
    this.startedAt = clock();
  }

  get successCount(): number {
    return this.successes;
  }

  get failureCount(): number {
    return this.failures;
  }

  get transferredBytes(): number {
    return this.bytes;
  }

  get recordedCount(): number {
    return this.successes + this.failures;
  }

  /** Durations of successful requests, in arrival order. */
  get latencySamples(): readonly bigint[] {
    return this.latencies;
  }

  get isFinalized(): boolean {
    return this.endedAt !== null;
  }

  recordMeasurement(measurement: Measurement): void {
    if (this.isFinalized) {
      throw new BenchmarkStateError("Cannot record a measurement after the run was stopped");
    }

    if (isSuccessStatus(measurement.statusCode)) {
      this.successes += 1;
      this.latencies.push(measurement.durationNs);
    } else {
      this.failures += 1;
    }
    this.bytes += measurement.replySize;
  }

  stop(): void {
    if (this.endedAt !== null) {
      throw new BenchmarkStateError("Benchmark run was already stopped");
    }
    this.endedAt = this.clock();
  }

  elapsedTime(): bigint {
    if (this.endedAt === null) {
      throw new BenchmarkStateError("Elapsed time is only known once the run is stopped");
    }
    return this.endedAt - this.startedAt;
  }

  totalLatency(): bigint {
    return this.requireLatencies("total latency").reduce((sum, value) => sum + value, 0n);
  }

  /** Integer mean; bigint division floors the non-negative total. */
  averageLatency(): bigint {
    const total = this.totalLatency();
    return total / BigInt(this.latencies.length);
  }

  slowestLatency(): bigint {
    const samples = this.requireLatencies("slowest latency");
    let max = samples[0];
    for (const value of samples) {
      if (value > max) {
        max = value;
      }
    }
    return max;
  }

  fastestLatency(): bigint {
    const samples = this.requireLatencies("fastest latency");
    let min = samples[0];
    for (const value of samples) {
      if (value < min) {
        min = value;
      }
    }
    return min;
  }

  /**
   * Element at index floor(n / 2) of the sorted samples: the upper middle value
   * for even sample counts, not the mean of the two middle values.
   */
  medianLatency(): bigint {
    const sorted = [...this.requireLatencies("median latency")].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    return sorted[Math.floor(sorted.length / 2)];
  }

  /**
   * Population standard deviation around the floored integer mean, floored to whole nanoseconds.
   */
  standardDeviation(): bigint {
    const samples = this.requireLatencies("standard deviation");
    const mean = this.averageLatency();
    let sumSquaredDelta = 0;
    for (const value of samples) {
      const delta = Number(mean - value);
      sumSquaredDelta += delta * delta;
    }
    const variance = sumSquaredDelta / samples.length;
    return BigInt(Math.floor(Math.sqrt(variance)));
  }

  /** Whole kilobytes per second over the elapsed time; 0 when no time elapsed. */
  throughputKBps(): number {
    const elapsedNs = this.elapsedTime();
    if (elapsedNs <= 0n) {
      return 0;
    }
    const elapsedSeconds = Number(elapsedNs) / Number(NANOS_PER_SECOND);
    return Math.floor(this.bytes / 1024 / elapsedSeconds);
  }

  latencyStatistics(): LatencyStatistics | null {
    if (this.latencies.length === 0) {
      return null;
    }
    return {
      slowestNs: this.slowestLatency(),
      medianNs: this.medianLatency(),
      fastestNs: this.fastestLatency(),
      averageNs: this.averageLatency(),
      standardDeviationNs: this.standardDeviation(),
    };
  }

  summarize(cancelled = false): BenchmarkSummary {
    return {
      successCount: this.successes,
      failureCount: this.failures,
      transferredBytes: this.bytes,
      elapsedNs: this.elapsedTime(),
      throughputKBps: this.throughputKBps(),
      latency: this.latencyStatistics(),
      cancelled,
    };
  }

  private requireLatencies(statistic: string): readonly bigint[] {
    if (this.latencies.length === 0) {
      throw new NoSuccessfulRequestsError(statistic);
    }
    return this.latencies;
  }
}
