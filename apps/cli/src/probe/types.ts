import { FAILED_PROBE_STATUS_CODE } from "../common/constants.js";

export type HttpVersion = "1.1" | "2";

/**
 * Outcome of one HTTP GET. Probes never reject: transport failures are
 * reported as `FAILED_PROBE_STATUS_CODE` with a zero size.
 */
export interface ProbeResult {
  statusCode: number;
  /** Header bytes, plus body bytes when the body was read to the end. */
  replySize: number;
}

export function failedProbeResult(): ProbeResult {
  return { statusCode: FAILED_PROBE_STATUS_CODE, replySize: 0 };
}

export interface ProbeOptions {
  httpVersion?: HttpVersion;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * The probe contract the dispatcher depends on. `ProbeService.probe` satisfies it,
 * tests substitute scripted functions.
 */
export type ProbeFn = (url: string, signal?: AbortSignal) => Promise<ProbeResult>;
