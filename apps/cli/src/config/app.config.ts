import Joi from "joi";
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_MAX_REDIRECTS,
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_REPETITIONS,
  DEFAULT_USER_AGENT,
} from "../common/constants.js";
import { DEFAULT_LOG_LEVEL, LOG_LEVEL_NAMES } from "../common/log-levels.js";
import type { HttpVersion } from "../probe/types.js";

export const configValidationSchema = Joi.object({
  // Application
  NODE_ENV: Joi.string().valid("development", "production", "test").default("development"),
  LOG_LEVEL: Joi.string()
    .lowercase()
    .valid(...LOG_LEVEL_NAMES)
    .default(DEFAULT_LOG_LEVEL),

  // Benchmark defaults (overridden per run by CLI flags)
  BENCH_CONCURRENCY: Joi.number().integer().min(1).default(DEFAULT_CONCURRENCY),
  BENCH_REPETITIONS: Joi.number().integer().min(1).default(DEFAULT_REPETITIONS),

  // Probe
  PROBE_TIMEOUT_MS: Joi.number().integer().min(1).default(DEFAULT_PROBE_TIMEOUT_MS),
  PROBE_HTTP_VERSION: Joi.string().valid("1.1", "2").default("1.1"),
  PROBE_MAX_REDIRECTS: Joi.number().integer().min(0).default(DEFAULT_MAX_REDIRECTS),
  PROBE_USER_AGENT: Joi.string().default(DEFAULT_USER_AGENT),
});

export interface IAppConfig {
  env: string;
  logLevel: string;
}

export interface IBenchmarkConfig {
  concurrency: number;
  repetitions: number;
}

export interface IProbeConfig {
  /**
   * Deadline for a single probe, covering connect, headers and body.
   *
   * A probe that exceeds it is recorded as a failed request instead of
   * holding one of the concurrency slots indefinitely.
   */
  timeoutMs: number;
  httpVersion: HttpVersion;
  /** Only honoured by the HTTP/1.1 transport. */
  maxRedirects: number;
  userAgent: string;
}

export interface IConfig {
  app: IAppConfig;
  benchmark: IBenchmarkConfig;
  probe: IProbeConfig;
}

const parseHttpVersion = (value: string | undefined): HttpVersion => (value?.trim() === "2" ? "2" : "1.1");

export function loadConfig(): IConfig {
  return {
    app: {
      env: process.env.NODE_ENV || "development",
      logLevel: (process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL).toLowerCase(),
    },
    benchmark: {
      concurrency: Number.parseInt(process.env.BENCH_CONCURRENCY || String(DEFAULT_CONCURRENCY), 10),
      repetitions: Number.parseInt(process.env.BENCH_REPETITIONS || String(DEFAULT_REPETITIONS), 10),
    },
    probe: {
      timeoutMs: Number.parseInt(process.env.PROBE_TIMEOUT_MS || String(DEFAULT_PROBE_TIMEOUT_MS), 10),
      httpVersion: parseHttpVersion(process.env.PROBE_HTTP_VERSION),
      maxRedirects: Number.parseInt(process.env.PROBE_MAX_REDIRECTS || String(DEFAULT_MAX_REDIRECTS), 10),
      userAgent: process.env.PROBE_USER_AGENT || DEFAULT_USER_AGENT,
    },
  };
}
