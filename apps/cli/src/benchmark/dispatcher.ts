import { Logger } from "@nestjs/common";
import { type Clock, monotonicClock } from "../common/clock.js";
import { BenchmarkStateError } from "../common/errors.js";
import { toStructuredError } from "../common/logging.js";
import { failedProbeResult, type ProbeFn, type ProbeResult } from "../probe/types.js";
import type { MeasurementQueue } from "./measurement-queue.js";
import type { Measurement } from "./types.js";

export interface DispatcherOptions {
  url: string;
  concurrency: number;
  repetitions: number;
  clock?: Clock;
  /** Forwarded to every probe; aborting it ends in-flight probes early. */
  signal?: AbortSignal;
}

/**
 * Closed-model issuer: keeps `concurrency` probes outstanding and issues a replacement
 * only after the consumer has taken a measurement, until `repetitions` probes were issued.
 */
export class Dispatcher {
  private readonly logger = new Logger(Dispatcher.name);
  private readonly clock: Clock;
  private issued = 0;
  private running = 0;
  private started = false;

  constructor(
    private readonly probe: ProbeFn,
    private readonly queue: MeasurementQueue<Measurement>,
    private readonly options: DispatcherOptions,
  ) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${options.concurrency}`);
    }
    if (!Number.isInteger(options.repetitions) || options.repetitions < 1) {
      throw new RangeError(`Repetitions must be a positive integer, got ${options.repetitions}`);
    }
    this.clock = options.clock ?? monotonicClock;
  }

  get requestsIssued(): number {
    return this.issued;
  }

  /** Probes started whose result has not come back yet. */
  get inFlight(): number {
    return this.running;
  }

  get exhausted(): boolean {
    return this.issued >= this.options.repetitions;
  }

  start(): void {
    if (this.started) {
      throw new BenchmarkStateError("Dispatcher was already started");
    }
    this.started = true;

    const initial = Math.min(this.options.concurrency, this.options.repetitions);
    this.logger.debug(`Issuing ${initial} initial probes against ${this.options.url}`);
    for (let i = 0; i < initial; i++) {
      this.issue();
    }
  }

  /** Called by the consumer once per measurement it has taken off the queue. */
  onMeasurementConsumed(): void {
    if (!this.started) {
      throw new BenchmarkStateError("Dispatcher has not been started");
    }
    if (!this.exhausted) {
      this.issue();
    }
  }

  private issue(): void {
    this.issued += 1;
    this.running += 1;
    void this.runProbe();
  }

  private async runProbe(): Promise<void> {
    const startedAt = this.clock();
    const result = await this.invokeProbe();
    const measurement: Measurement = {
      statusCode: result.statusCode,
      replySize: result.replySize,
      durationNs: this.clock() - startedAt,
    };
    // Leave the in-flight set before publishing: the consumer may issue a replacement
    // as soon as the measurement is delivered.
    this.running -= 1;
    await this.queue.push(measurement);
  }

  private async invokeProbe(): Promise<ProbeResult> {
    try {
      return await this.probe(this.options.url, this.options.signal);
    } catch (error) {
      this.logger.error({
        event: "probe_contract_violation",
        message: "Probe rejected instead of reporting a failed request",
        url: this.options.url,
        error: toStructuredError(error),
      });
      return failedProbeResult();
    }
  }
}
