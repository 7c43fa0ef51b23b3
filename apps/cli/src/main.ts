#!/usr/bin/env node
import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { BenchmarkService } from "./benchmark/benchmark.service.js";
import { type BenchmarkRunner, EXIT_FAILURE, runCli } from "./cli/cli-runner.js";
import { CliModule } from "./cli.module.js";
import { createCliLogger } from "./common/cli-logger.js";
import { toStructuredError } from "./common/logging.js";

/** Logger used for exit paths outside the Nest context. */
const exitLogger = createCliLogger("Main");

function logErrorAndExit(event: string, message: string, error: unknown): never {
  exitLogger.error({
    event,
    message,
    error: toStructuredError(error),
  });
  process.exit(EXIT_FAILURE);
}

const runBenchmark: BenchmarkRunner = async (request, signal) => {
  const app = await NestFactory.createApplicationContext(CliModule, { logger: createCliLogger("loadprobe") });
  try {
    return await app.get(BenchmarkService).run(request, signal);
  } finally {
    await app.close();
  }
};

async function bootstrap(argv: string[]): Promise<number> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort(new Error("Interrupted"));
  process.once("SIGINT", onInterrupt);

  try {
    return await runCli(argv, runBenchmark, process, controller.signal);
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

void bootstrap(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => logErrorAndExit("run_failed", "Benchmark failed", error));

process.on("unhandledRejection", (reason: unknown, _promise: Promise<unknown>) => {
  logErrorAndExit("unhandled_rejection", "Unhandled rejection", reason);
});
