import { ConsoleLogger, type LogLevel } from "@nestjs/common";
import { resolveLogLevels } from "./log-levels.js";

/**
 * JSON console logger that writes every level to stderr. Nest's default sends all
 * levels but `error` to stdout, where the report is printed.
 */
export class StderrConsoleLogger extends ConsoleLogger {
  protected printMessages(
    messages: unknown[],
    context?: string,
    logLevel?: LogLevel,
    _writeStreamType?: "stdout" | "stderr",
    errorStack?: unknown,
  ): void {
    super.printMessages(messages, context, logLevel, "stderr", errorStack);
  }
}

export function createCliLogger(context: string, level: string | undefined = process.env.LOG_LEVEL): ConsoleLogger {
  return new StderrConsoleLogger(context, {
    json: true,
    colors: false,
    logLevels: resolveLogLevels(level),
  });
}
