import type { Readable } from "node:stream";
import { HttpService } from "@nestjs/axios";
import { Injectable, Logger, type OnModuleDestroy } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { AxiosRequestConfig } from "axios";
import { firstValueFrom } from "rxjs";
import { Agent, request as undiciRequest } from "undici";
import { buildDeadlineSignal, createAbortError } from "../common/abort-utils.js";
import { toStructuredError } from "../common/logging.js";
import { countStreamBytes } from "../common/stream-utils.js";
import type { IConfig, IProbeConfig } from "../config/app.config.js";
import { failedProbeResult, type HttpVersion, type ProbeOptions, type ProbeResult } from "./types.js";

/**
 * Sums, over every response header, the length of its name and of each of its values.
 */
export function measureHeaderBytes(entries: Iterable<readonly [string, unknown]>): number {
  let total = 0;
  for (const [name, value] of entries) {
    if (value === null || value === undefined) {
      continue;
    }
    total += name.length;
    if (Array.isArray(value)) {
      for (const item of value) {
        total += String(item).length;
      }
    } else {
      total += String(value).length;
    }
  }
  return total;
}

@Injectable()
export class ProbeService implements OnModuleDestroy {
  private readonly logger = new Logger(ProbeService.name);
  private readonly probeConfig: IProbeConfig;
  private http2Agent?: Agent;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService<IConfig, true>,
  ) {
    this.probeConfig = this.configService.get("probe");
  }

  async onModuleDestroy(): Promise<void> {
    if (this.http2Agent) {
      await this.http2Agent.close();
      this.http2Agent = undefined;
    }
  }

  /**
   * Performs one GET against `url`. Never rejects: transport failures, deadline expiry
   * and cancellation all resolve to `{ statusCode: 500, replySize: 0 }`.
   */
  async probe(url: string, options: ProbeOptions = {}): Promise<ProbeResult> {
    const {
      httpVersion = this.probeConfig.httpVersion,
      timeoutMs = this.probeConfig.timeoutMs,
      signal: parentSignal,
    } = options;
    const { signal, deadlineSignal, clear } = buildDeadlineSignal(timeoutMs, parentSignal);

    try {
      return await this.probeWith(httpVersion, url, signal);
    } catch (error) {
      if (deadlineSignal.aborted) {
        this.logger.warn({
          event: "probe_timed_out",
          message: `Probe of ${url} exceeded ${timeoutMs}ms`,
          url,
          timeoutMs,
        });
      } else if (parentSignal?.aborted) {
        this.logger.debug(`Probe of ${url} cancelled`);
      } else {
        this.logger.warn({
          event: "probe_failed",
          message: `Failed to fetch ${url}`,
          url,
          httpVersion,
          error: toStructuredError(error),
        });
      }
      return failedProbeResult();
    } finally {
      clear();
    }
  }

  private probeWith(httpVersion: HttpVersion, url: string, signal: AbortSignal): Promise<ProbeResult> {
    return httpVersion === "2" ? this.probeWithHttp2(url, signal) : this.probeWithHttp1(url, signal);
  }

  /**
   * HTTP/1.1 probe using axios
   */
  private async probeWithHttp1(url: string, signal: AbortSignal): Promise<ProbeResult> {
    this.logger.verbose(`Requesting ${url} via HTTP/1.1`);

    const config: AxiosRequestConfig = {
      method: "GET",
      url,
      headers: {
        "User-Agent": this.probeConfig.userAgent,
      },
      signal,
      maxRedirects: this.probeConfig.maxRedirects,
      responseType: "stream",
      // Every status is a measurement; classification happens in the aggregator.
      validateStatus: () => true,
    };

    const response = await firstValueFrom(this.httpService.request<Readable>(config));
    const headerBytes = measureHeaderBytes(Object.entries(response.headers));

    return this.completeProbe(url, response.status, headerBytes, response.data, signal);
  }

  /**
   * HTTP/2 probe using undici
   */
  private async probeWithHttp2(url: string, signal: AbortSignal): Promise<ProbeResult> {
    this.logger.verbose(`Requesting ${url} via HTTP/2`);

    const response = await undiciRequest(url, {
      method: "GET",
      headers: {
        "user-agent": this.probeConfig.userAgent,
      },
      signal,
      dispatcher: this.getHttp2Agent(),
    });
    const headerBytes = measureHeaderBytes(Object.entries(response.headers));

    return this.completeProbe(url, response.statusCode, headerBytes, response.body, signal);
  }

  private async completeProbe(
    url: string,
    statusCode: number,
    headerBytes: number,
    body: Readable,
    signal: AbortSignal,
  ): Promise<ProbeResult> {
    try {
      const bodyBytes = await this.drainBody(body, signal);
      return { statusCode, replySize: headerBytes + bodyBytes };
    } catch (error) {
      // A deadline or cancellation during the body is a failed probe, not a partial reply.
      if (signal.aborted) {
        throw error;
      }
      this.logger.warn({
        event: "probe_body_unreadable",
        message: `Failed to read body from ${url}`,
        url,
        statusCode,
        error: toStructuredError(error),
      });
      return { statusCode, replySize: headerBytes };
    }
  }

  private async drainBody(body: Readable, signal: AbortSignal): Promise<number> {
    const onAbort = () => body.destroy(createAbortError(signal));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    try {
      return await countStreamBytes(body);
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  }

  private getHttp2Agent(): Agent {
    if (!this.http2Agent) {
      this.http2Agent = new Agent({ allowH2: true });
    }
    return this.http2Agent;
  }
}
