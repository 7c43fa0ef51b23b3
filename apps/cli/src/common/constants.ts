/** Status recorded for a probe that never produced an HTTP response. */
export const FAILED_PROBE_STATUS_CODE = 500;

export const SUCCESS_STATUS_MIN = 200;
export const SUCCESS_STATUS_MAX = 299;

export const DEFAULT_CONCURRENCY = 5;
export const DEFAULT_REPETITIONS = 300;
export const DEFAULT_PROBE_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_REDIRECTS = 10;

export const APP_NAME = "loadprobe";
export const APP_VERSION = "0.1.0";
export const DEFAULT_USER_AGENT = `${APP_NAME}/${APP_VERSION}`;

export const NANOS_PER_MICRO = 1_000n;
export const NANOS_PER_MILLI = 1_000_000n;
export const NANOS_PER_SECOND = 1_000_000_000n;
