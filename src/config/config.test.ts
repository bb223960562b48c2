/**
 * Configuration and logging tests.
 *
 * Run: node --import tsx src/config/config.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  ConfigError,
  configuredLogLevel,
  loadConfig,
  optionalEnv,
  optionalEnvBool,
  validateConfig,
  type AppConfig,
} from "./index.js";
import { createLogger, formatLogEntry, generateRunId } from "../logging/index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function withEnv(vars: Record<string, string | undefined>, fn: () => void): void {
  const saved: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(vars)) {
    saved[key] = process.env[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  try {
    fn();
  } finally {
    for (const [key, value] of Object.entries(saved)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}

function makeConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    env: "test",
    logLevel: "info",
    logToFile: false,
    logDir: "output/logs",
    filePrefix: "{uid}-",
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════════════════

section("Environment helpers");

test("optionalEnv falls back to the default", () => {
  withEnv({ XDI_TEST_VALUE: undefined }, () => {
    assert.equal(optionalEnv("XDI_TEST_VALUE", "fallback"), "fallback");
  });
  withEnv({ XDI_TEST_VALUE: "" }, () => {
    assert.equal(optionalEnv("XDI_TEST_VALUE", "fallback"), "fallback");
  });
  withEnv({ XDI_TEST_VALUE: "set" }, () => {
    assert.equal(optionalEnv("XDI_TEST_VALUE", "fallback"), "set");
  });
});

test("optionalEnvBool parses common spellings", () => {
  withEnv({ XDI_TEST_FLAG: "YES" }, () => assert.equal(optionalEnvBool("XDI_TEST_FLAG", false), true));
  withEnv({ XDI_TEST_FLAG: "0" }, () => assert.equal(optionalEnvBool("XDI_TEST_FLAG", true), false));
  withEnv({ XDI_TEST_FLAG: undefined }, () => assert.equal(optionalEnvBool("XDI_TEST_FLAG", true), true));
  withEnv({ XDI_TEST_FLAG: "maybe" }, () => {
    assert.throws(() => optionalEnvBool("XDI_TEST_FLAG", false), ConfigError);
  });
});

test("loadConfig reads the export settings", () => {
  withEnv({ XDI_FILE_PREFIX: "{md[sample]}-", XDI_LOG_TO_FILE: "true", LOG_LEVEL: "debug" }, () => {
    const loaded = loadConfig();
    assert.equal(loaded.filePrefix, "{md[sample]}-");
    assert.equal(loaded.logToFile, true);
    assert.equal(loaded.logLevel, "debug");
  });
});

section("validateConfig");

test("accepts a valid configuration", () => {
  assert.doesNotThrow(() => validateConfig(makeConfig()));
});

test("rejects an unknown environment", () => {
  assert.throws(
    () => validateConfig(makeConfig({ env: "staging" })),
    (err: unknown) =>
      err instanceof ConfigError &&
      err.message === "Invalid NODE_ENV: staging. Must be development, production, or test."
  );
});

test("rejects an unknown log level", () => {
  assert.throws(() => validateConfig(makeConfig({ logLevel: "verbose" })), ConfigError);
});

test("configuredLogLevel falls back to info", () => {
  assert.equal(configuredLogLevel(makeConfig({ logLevel: "warn" })), "warn");
  assert.equal(configuredLogLevel(makeConfig({ logLevel: "verbose" })), "info");
});

test("ConfigError.format lists issues", () => {
  const err = new ConfigError("Invalid template", ["a: bad", "b: worse"]);
  assert.equal(err.format(), "Invalid template\n  - a: bad\n  - b: worse");
  assert.equal(new ConfigError("plain").format(), "plain");
});

// ═══════════════════════════════════════════════════════════════════════════
// LOGGING
// ═══════════════════════════════════════════════════════════════════════════

section("Logging");

test("log entries carry level, run ID and context", () => {
  const entry = formatLogEntry("warn", "Skipping event", { descriptor: "d1" }, "20240115-a1b2c3");
  assert.match(
    entry,
    /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[WARN \] \[20240115-a1b2c3\] Skipping event \{"descriptor":"d1"\}$/
  );
});

test("child loggers add their context to every entry", () => {
  const logDir = mkdtempSync(join(tmpdir(), "xdi-log-test-"));
  try {
    const logger = createLogger({ console: false, file: true, logDir, logFile: "test.log", runId: "run-x" });
    logger.child({ uid: "u1" }).info("Run finalized", { rows: 2 });
    logger.debug("below the default level");

    const lines = readFileSync(join(logDir, "test.log"), "utf-8").split("\n").filter((line) => line !== "");
    assert.equal(lines.length, 1);
    assert.match(lines[0] ?? "", /\[INFO \] \[run-x\] Run finalized \{"uid":"u1","rows":2\}$/);
  } finally {
    rmSync(logDir, { recursive: true, force: true });
  }
});

test("run IDs start with the date", () => {
  const id = generateRunId(new Date("2024-01-15T10:00:00Z"));
  assert.match(id, /^20240115-[0-9a-f]{6}$/);
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
