import { strict as assert } from "assert";
import { describe, it } from "node:test";
import { DEFAULT_CONFIG, LOG_LEVEL_ENV, loadRuntimeConfig } from "../config/runtimeConfig";
import { createConsoleLogger, createMemoryLogger } from "../logging/logger";
import { UsageError } from "../schema/errors";

describe("loadRuntimeConfig", () => {
  it("uses defaults when the environment is empty", () => {
    const config = loadRuntimeConfig({});
    assert.deepEqual(config, DEFAULT_CONFIG);
    assert.equal(config.logLevel, "info");
    assert.equal(config.concentrationMm, 10);
    assert.equal(config.volumeUl, 5);
  });

  it("reads the log level from the environment", () => {
    assert.equal(loadRuntimeConfig({ [LOG_LEVEL_ENV]: " DEBUG " }).logLevel, "debug");
  });

  it("rejects an unknown log level", () => {
    assert.throws(() => loadRuntimeConfig({ [LOG_LEVEL_ENV]: "loud" }), {
      name: "UsageError",
      message: 'ASSAY_BRIDGE_LOG_LEVEL must be one of debug, info, warn, error (got "loud")',
    });
    assert.throws(() => loadRuntimeConfig({ [LOG_LEVEL_ENV]: "" }), UsageError);
  });
});

describe("logger", () => {
  it("shares recorded entries with child loggers", () => {
    const logger = createMemoryLogger("BATCH");
    logger.info("start");
    logger.child("EXTRACT").warn("careful");
    assert.deepEqual(logger.entries, [
      { level: "info", tag: "BATCH", message: "start" },
      { level: "warn", tag: "EXTRACT", message: "careful" },
    ]);
  });

  it("writes tagged lines to stderr and honours the threshold", () => {
    const out: string[] = [];
    const err: string[] = [];
    const log = console.log;
    const error = console.error;
    console.log = (line: string) => out.push(line);
    console.error = (line: string) => err.push(line);
    try {
      const logger = createConsoleLogger("MERGE", "info");
      logger.debug("hidden");
      logger.info("joined 2 rows");
      logger.child("SCHEDULE").error("boom");
    } finally {
      console.log = log;
      console.error = error;
    }
    assert.deepEqual(out, []);
    assert.deepEqual(err, ["[MERGE] joined 2 rows", "[SCHEDULE] ✗ boom"]);
  });
});
