/**
 * Monotonic clock reading in integer nanoseconds.
 * Injected wherever durations are measured so tests can drive time explicitly.
 */
export type Clock = () => bigint;

export const monotonicClock: Clock = () => process.hrtime.bigint();
