import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import chalk from "chalk";
import { errorToJson, formatError, renderError, renderUnknownError, wrap } from "./renderer.js";
import { CLIError, ReportedError } from "./types.js";

describe("error renderer", () => {
  let level: typeof chalk.level;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    level = chalk.level;
    chalk.level = 0;
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    chalk.level = level;
    vi.restoreAllMocks();
  });

  const notFound = (cause?: unknown) =>
    new CLIError("API_NOT_FOUND", "failed to get track: Track not found", {
      suggestion: "Check the package name.",
      example: "gplay tracks list",
      status: 404,
      cause,
    });

  it("wraps on spaces", () => {
    expect(wrap("aaa bbb ccc", 7)).toEqual(["aaa bbb", "ccc"]);
    expect(wrap("one\ntwo", 80)).toEqual(["one", "two"]);
  });

  it("formats message, hint and example", () => {
    expect(formatError(notFound(), 80)).toEqual([
      "✗ failed to get track: Track not found",
      "",
      "  → Check the package name.",
      "",
      "  Try: gplay tracks list",
    ]);
  });

  it("adds the code and causes in debug mode", () => {
    expect(formatError(notFound(new Error("socket hang up")), 80, true).slice(-3)).toEqual([
      "",
      "  code: API_NOT_FOUND (HTTP 404)",
      "  caused by: socket hang up",
    ]);
  });

  it("drops empty fields from JSON", () => {
    expect(errorToJson(new CLIError("CONFIG_EXISTS", "config already exists: /tmp/c.json"))).toEqual({
      error: true,
      code: "CONFIG_EXISTS",
      message: "config already exists: /tmp/c.json",
    });
  });

  it("prints one JSON object in json mode", () => {
    renderError(notFound(), "json");

    expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(consoleErrorSpy.mock.calls[0][0]))).toMatchObject({ code: "API_NOT_FOUND", status: 404 });
  });

  it("stays silent for errors the command already reported", () => {
    renderError(new ReportedError("validation failed"), "static");

    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });

  it("wraps plain errors as unknown errors", () => {
    renderUnknownError(new Error("boom"), "json");

    expect(JSON.parse(String(consoleErrorSpy.mock.calls[0][0]))).toEqual({
      error: true,
      code: "UNKNOWN_ERROR",
      message: "boom",
    });
  });
});
