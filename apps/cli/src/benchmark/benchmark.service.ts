import { Inject, Injectable, Logger, Optional } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { type Clock, monotonicClock } from "../common/clock.js";
import type { IConfig } from "../config/app.config.js";
import { ProbeService } from "../probe/probe.service.js";
import type { ProbeFn } from "../probe/types.js";
import { BenchmarkRun } from "./benchmark-run.js";
import { Dispatcher } from "./dispatcher.js";
import { MeasurementQueue } from "./measurement-queue.js";
import type { BenchmarkRequest, BenchmarkSettings, BenchmarkSummary, Measurement } from "./types.js";

export const BENCHMARK_CLOCK = Symbol("BENCHMARK_CLOCK");

@Injectable()
export class BenchmarkService {
  private readonly logger = new Logger(BenchmarkService.name);
  private readonly clock: Clock;

  constructor(
    private readonly probeService: ProbeService,
    private readonly configService: ConfigService<IConfig, true>,
    @Optional() @Inject(BENCHMARK_CLOCK) clock?: Clock,
  ) {
    this.clock = clock ?? monotonicClock;
  }

  /**
   * Fills in everything the request leaves out from configuration.
   */
  resolveSettings(request: BenchmarkRequest): BenchmarkSettings {
    const benchmark = this.configService.get("benchmark");
    const probe = this.configService.get("probe");

    return {
      url: request.url,
      concurrency: request.concurrency ?? benchmark.concurrency,
      repetitions: request.repetitions ?? benchmark.repetitions,
      timeoutMs: request.timeoutMs ?? probe.timeoutMs,
      httpVersion: request.httpVersion ?? probe.httpVersion,
    };
  }

  /**
   * Runs one closed-model benchmark and returns its summary.
   *
   * Aborting `signal` cancels in-flight probes; the remaining budget is still issued and
   * recorded as failures, so the counts always add up to `repetitions`.
   */
  async run(request: BenchmarkRequest, signal?: AbortSignal): Promise<BenchmarkSummary> {
    const settings = this.resolveSettings(request);
    const { url, concurrency, repetitions, timeoutMs, httpVersion } = settings;

    this.logger.log({
      event: "benchmark_started",
      message: `Benchmarking ${url} with ${concurrency} concurrent probes, ${repetitions} total`,
      url,
      concurrency,
      repetitions,
      timeoutMs,
      httpVersion,
    });

    const probe: ProbeFn = (targetUrl, probeSignal) =>
      this.probeService.probe(targetUrl, { httpVersion, timeoutMs, signal: probeSignal });
    const queue = new MeasurementQueue<Measurement>(concurrency);
    const run = new BenchmarkRun(this.clock);
    const dispatcher = new Dispatcher(probe, queue, {
      url,
      concurrency,
      repetitions,
      clock: this.clock,
      signal,
    });

    dispatcher.start();
    // Single consumer: this loop is the only writer of `run`.
    while (run.recordedCount < repetitions) {
      const measurement = await queue.take();
      run.recordMeasurement(measurement);
      dispatcher.onMeasurementConsumed();
    }
    run.stop();

    const cancelled = signal?.aborted ?? false;
    if (cancelled) {
      this.logger.warn({
        event: "benchmark_cancelled",
        message: "Benchmark cancelled; unfinished probes were recorded as failures",
        url,
      });
    }

    const summary = run.summarize(cancelled);
    this.logger.log({
      event: "benchmark_completed",
      message: `Benchmark of ${url} completed: ${summary.successCount}/${repetitions} successful`,
      url,
      successCount: summary.successCount,
      failureCount: summary.failureCount,
      transferredBytes: summary.transferredBytes,
    });
    return summary;
  }
}
