import { describe, expect, it } from "vitest";
import { resolveLogLevels } from "./log-levels.js";

describe("resolveLogLevels", () => {
  it("defaults to warn and above", () => {
    expect(resolveLogLevels(undefined)).toEqual(["fatal", "error", "warn"]);
  });

  it("normalizes case and whitespace", () => {
    expect(resolveLogLevels(" DEBUG ")).toEqual(["fatal", "error", "warn", "log", "debug"]);
  });

  it("maps info onto Nest's log level", () => {
    expect(resolveLogLevels("info")).toEqual(["fatal", "error", "warn", "log"]);
  });

  it("falls back to the default for unknown levels", () => {
    expect(resolveLogLevels("trace")).toEqual(["fatal", "error", "warn"]);
  });
});
