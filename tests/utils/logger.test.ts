/**
 * Tests for Logger utility
 */

import { describe, it, expect, jest, beforeEach, afterEach } from "@jest/globals";
import fs from "node:fs/promises";
import path from "node:path";
import {
  Logger,
  ScopedLogger,
  createLogger,
  getLogger,
  trackError,
  createErrorTracker,
} from "../../src/utils/logger.js";
import { createTempVault, removeTempVault } from "../helpers.js";

describe("Logger", () => {
  let consoleLogSpy: jest.SpiedFunction<typeof console.log>;
  let consoleWarnSpy: jest.SpiedFunction<typeof console.warn>;
  let consoleErrorSpy: jest.SpiedFunction<typeof console.error>;

  beforeEach(() => {
    consoleLogSpy = jest.spyOn(console, "log").mockImplementation(() => {});
    consoleWarnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
    consoleErrorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleWarnSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  describe("Logger class", () => {
    it("should create logger with debug mode enabled", () => {
      const logger = new Logger({ debug: true });
      expect(logger.isDebugMode()).toBe(true);
    });

    it("should respect VAULTWEAVE_DEBUG environment variable", () => {
      const originalEnv = process.env.VAULTWEAVE_DEBUG;
      process.env.VAULTWEAVE_DEBUG = "true";

      const logger = new Logger();
      expect(logger.isDebugMode()).toBe(true);

      process.env.VAULTWEAVE_DEBUG = originalEnv;
    });
  });

  describe("logging methods", () => {
    it("should route levels to the matching console method", () => {
      const logger = new Logger();
      logger.info("Test info message");
      logger.warn("Test warning");
      logger.error("Test error");

      expect(String(consoleLogSpy.mock.calls[0][0])).toContain("INFO");
      expect(String(consoleLogSpy.mock.calls[0][0])).toContain("Test info message");
      expect(String(consoleWarnSpy.mock.calls[0][0])).toContain("WARN");
      expect(String(consoleErrorSpy.mock.calls[0][0])).toContain("ERROR");
    });

    it("should log debug messages only in debug mode", () => {
      const logger = new Logger({ debug: false });
      logger.debug("Debug message");
      expect(consoleLogSpy).not.toHaveBeenCalled();

      logger.setDebugMode(true);
      logger.debug("Debug message");
      expect(String(consoleLogSpy.mock.calls[0][0])).toContain("DEBUG");
    });

    it("should append data as JSON", () => {
      const logger = new Logger();
      logger.info("Message with data", { key: "value" });

      expect(String(consoleLogSpy.mock.calls[0][0])).toContain('Message with data {"key":"value"}');
    });

    it("should include error stack in error logs", () => {
      const logger = new Logger();
      const error = new Error("Test error");
      logger.error("Error occurred", error);

      expect(String(consoleErrorSpy.mock.calls[0][0])).toContain("Error: Test error");
    });
  });

  describe("child", () => {
    it("should prefix messages with the component", () => {
      const scoped = new Logger().child("ingest");
      scoped.warn("Skipping unreadable note a.md");

      expect(scoped).toBeInstanceOf(ScopedLogger);
      expect(String(consoleWarnSpy.mock.calls[0][0])).toContain("[ingest] Skipping unreadable note a.md");
    });
  });

  describe("file logging", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await createTempVault({});
    });

    afterEach(async () => {
      await removeTempVault(dir);
    });

    it("should write JSON lines with the component on flush", async () => {
      const logger = new Logger({ logToFile: true, logDir: dir });
      await logger.init();
      logger.child("embeddings").info("Embedded 3 chunks");
      await logger.close();

      const [file] = await fs.readdir(dir);
      expect(file).toMatch(/^vaultweave-\d{4}-\d{2}-\d{2}\.log$/);

      const lines = (await fs.readFile(path.join(dir, file), "utf-8")).trim().split("\n");
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0])).toMatchObject({
        level: "info",
        component: "embeddings",
        message: "Embedded 3 chunks",
      });
    });
  });

  describe("singleton functions", () => {
    it("createLogger should return the same instance", () => {
      const logger1 = createLogger();
      const logger2 = createLogger();
      expect(logger1).toBe(logger2);
    });

    it("getLogger should return the singleton instance", () => {
      expect(getLogger()).toBeInstanceOf(Logger);
      expect(getLogger()).toBe(createLogger());
    });
  });
});

describe("Error tracking", () => {
  let consoleErrorSpy: jest.SpiedFunction<typeof console.error>;

  beforeEach(() => {
    consoleErrorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  it("should track error with context", () => {
    trackError(new Error("Test error"), { component: "TestComponent", action: "testAction" });

    expect(String(consoleErrorSpy.mock.calls[0][0])).toContain("[TestComponent] Test error");
  });

  it("should create a component-specific error tracker", () => {
    const tracker = createErrorTracker("Retriever");
    tracker(new Error("Query failed"), "query", { k: 5 });

    const output = String(consoleErrorSpy.mock.calls[0][0]);
    expect(output).toContain("[Retriever] Query failed");
    expect(output).toContain('"action":"query"');
  });
});
