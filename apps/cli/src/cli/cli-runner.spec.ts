import { describe, expect, it, vi } from "vitest";
import type { BenchmarkSummary } from "../benchmark/types.js";
import { USAGE } from "./cli-options.js";
import { type BenchmarkRunner, EXIT_FAILURE, EXIT_INTERRUPTED, EXIT_OK, runCli } from "./cli-runner.js";

const MS = 1_000_000n;
const TARGET_URL = "http://example.test/robots.txt";

function captureStreams() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    streams: {
      stdout: { write: (chunk: string) => out.push(chunk) },
      stderr: { write: (chunk: string) => err.push(chunk) },
    },
  };
}

function summary(overrides: Partial<BenchmarkSummary> = {}): BenchmarkSummary {
  return {
    successCount: 3,
    failureCount: 0,
    transferredBytes: 3072,
    elapsedNs: 2_000n * MS,
    throughputKBps: 1,
    latency: {
      slowestNs: 100n * MS,
      medianNs: 100n * MS,
      fastestNs: 100n * MS,
      averageNs: 100n * MS,
      standardDeviationNs: 0n,
    },
    cancelled: false,
    ...overrides,
  };
}

describe("runCli", () => {
  it("prints usage and succeeds when no URL is given", async () => {
    const runBenchmark = vi.fn<BenchmarkRunner>();
    const { out, err, streams } = captureStreams();

    const code = await runCli([], runBenchmark, streams);

    expect(code).toBe(EXIT_OK);
    expect(out).toEqual([USAGE]);
    expect(err).toEqual([]);
    expect(runBenchmark).not.toHaveBeenCalled();
  });

  it("reports invalid input on stderr and exits with 1", async () => {
    const runBenchmark = vi.fn<BenchmarkRunner>();
    const { out, err, streams } = captureStreams();

    const code = await runCli(["-c", "0", TARGET_URL], runBenchmark, streams);

    expect(code).toBe(EXIT_FAILURE);
    expect(out).toEqual([]);
    expect(err).toEqual([`Invalid value for --concurrency: "0" (expected a positive integer)\n\n${USAGE}`]);
    expect(runBenchmark).not.toHaveBeenCalled();
  });

  it("runs the benchmark and prints the report", async () => {
    const runBenchmark = vi.fn<BenchmarkRunner>(async () => summary());
    const controller = new AbortController();
    const { out, err, streams } = captureStreams();

    const code = await runCli(["-r", "3", TARGET_URL], runBenchmark, streams, controller.signal);

    expect(code).toBe(EXIT_OK);
    expect(runBenchmark).toHaveBeenCalledWith({ url: TARGET_URL, repetitions: 3 }, controller.signal);
    expect(err).toEqual([]);
    expect(out).toEqual([
      [
        "Successful requests: 3",
        "Failed requests: 0",
        "Transferred kilobytes: 3",
        "Kilobytes per second: 1",
        "Elapsed wall-clock time: 2s",
        "Slowest request: 100ms",
        "Median request: 100ms",
        "Fastest request: 100ms",
        "Average request: 100ms",
        "Standard deviation: 0s",
        "",
      ].join("\n"),
    ]);
  });

  it("exits with 130 after a cancelled run", async () => {
    const runBenchmark = vi.fn<BenchmarkRunner>(async () => summary({ cancelled: true }));
    const { out, streams } = captureStreams();

    const code = await runCli([TARGET_URL], runBenchmark, streams);

    expect(code).toBe(EXIT_INTERRUPTED);
    expect(out[0]).toContain("Run cancelled before completion\n");
  });

  it("propagates benchmark failures", async () => {
    const runBenchmark = vi.fn<BenchmarkRunner>(async () => {
      throw new Error("context failed");
    });
    const { streams } = captureStreams();

    await expect(runCli([TARGET_URL], runBenchmark, streams)).rejects.toThrow("context failed");
  });
});
