import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { createCliLogger, createLogger, createNoopLogger, redact, REDACTED } from "./logger.js";

function lastLine(spy: MockInstance): string {
  const call = spy.mock.calls.at(-1);
  return String(call?.[0]);
}

describe("logger", () => {
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("createLogger", () => {
    describe("log level filtering", () => {
      it("logs debug when level is debug", () => {
        createLogger({ level: "debug", json: false }).debug("GET tracks");
        expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      });

      it("does not log debug when level is info", () => {
        createLogger({ level: "info", json: false }).debug("GET tracks");
        expect(consoleErrorSpy).not.toHaveBeenCalled();
      });

      it("does not log info when level is warn", () => {
        createLogger({ level: "warn", json: false }).info("resolved profile");
        expect(consoleErrorSpy).not.toHaveBeenCalled();
      });

      it("does not log warn when level is error", () => {
        createLogger({ level: "error", json: false }).warn("deprecated flag");
        expect(consoleErrorSpy).not.toHaveBeenCalled();
      });
    });

    describe("output routing", () => {
      it("writes every level to stderr and never to stdout", () => {
        const logger = createLogger({ level: "debug", json: false });
        logger.debug("a");
        logger.info("b");
        logger.warn("c");
        logger.error("d");

        expect(consoleErrorSpy).toHaveBeenCalledTimes(4);
        expect(consoleLogSpy).not.toHaveBeenCalled();
      });
    });

    describe("JSON format", () => {
      it("outputs one JSON object per line", () => {
        createLogger({ level: "debug", json: true }).info("request finished", {
          status: 200,
          method: "GET",
        });

        const parsed = JSON.parse(lastLine(consoleErrorSpy));
        expect(parsed.message).toBe("request finished");
        expect(parsed.level).toBe("info");
        expect(parsed.status).toBe(200);
        expect(parsed.method).toBe("GET");
        expect(typeof parsed.timestamp).toBe("string");
      });
    });

    describe("human-readable format", () => {
      it("prefixes timestamp and padded level", () => {
        createLogger({ level: "debug", json: false }).info("ready");
        expect(lastLine(consoleErrorSpy)).toMatch(
          /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] INFO  ready$/
        );
      });

      it("appends metadata as compact JSON", () => {
        createLogger({ level: "debug", json: false }).debug("GET", { status: 404 });
        expect(lastLine(consoleErrorSpy)).toMatch(/ DEBUG GET \{"status":404\}$/);
      });
    });

    describe("child logger", () => {
      it("merges default meta with per-call meta", () => {
        const child = createLogger({ level: "debug", json: true }).child({ client: "publisher" });
        child.info("call", { client: "reporting", attempt: 1 });

        const parsed = JSON.parse(lastLine(consoleErrorSpy));
        expect(parsed.client).toBe("reporting");
        expect(parsed.attempt).toBe(1);
      });

      it("supports nested children", () => {
        const child = createLogger({ level: "debug", json: true })
          .child({ a: 1 })
          .child({ b: 2 });
        child.warn("nested");

        const parsed = JSON.parse(lastLine(consoleErrorSpy));
        expect(parsed.a).toBe(1);
        expect(parsed.b).toBe(2);
      });
    });
  });

  describe("redaction", () => {
    it("hides credential values at any depth", () => {
      expect(
        redact({
          clientEmail: "ci@example.iam.gserviceaccount.com",
          headers: { Authorization: "Bearer test-token", Accept: "application/json" },
          refresh_token: "test-refresh",
          profiles: [{ name: "a", client_secret: "test-secret" }],
        })
      ).toEqual({
        clientEmail: "ci@example.iam.gserviceaccount.com",
        headers: { Authorization: REDACTED, Accept: "application/json" },
        refresh_token: REDACTED,
        profiles: [{ name: "a", client_secret: REDACTED }],
      });
    });

    it("redacts before writing", () => {
      createLogger({ level: "debug", json: true }).child({ accessToken: "test-token" }).debug("refreshed");
      expect(JSON.parse(lastLine(consoleErrorSpy)).accessToken).toBe("[redacted]");
    });
  });

  describe("createCliLogger", () => {
    it("hides debug lines unless debug is on", () => {
      createCliLogger(false, {}).debug("hidden");
      expect(consoleErrorSpy).not.toHaveBeenCalled();

      createCliLogger(true, {}).debug("shown");
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    it("switches to JSON lines with GPLAY_LOG_FORMAT=json", () => {
      createCliLogger(true, { GPLAY_LOG_FORMAT: "json" }).debug("shown");
      expect(JSON.parse(lastLine(consoleErrorSpy)).message).toBe("shown");
    });
  });

  describe("createNoopLogger", () => {
    it("discards every message, including from children", () => {
      const logger = createNoopLogger();
      logger.error("x");
      logger.child({ a: 1 }).info("y");

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });
  });
});
