#!/usr/bin/env node
/**
 * CLI command to export a recorded run to an XDI file.
 *
 * Input is a JSON-lines file with one `["name", {document}]` pair per line,
 * in the order the documents were emitted (start first, stop last).
 *
 * Usage:
 *   npx tsx src/cli/export-run.ts <documents.jsonl> [options]
 *   npm run export-run -- <documents.jsonl> [options]
 *
 * Options:
 *   -o, --out <dir>         Output directory (default: current directory)
 *   -p, --prefix <tpl>      File prefix template (default: XDI_FILE_PREFIX or "{uid}-")
 *   -t, --template <path>   XDI template file; otherwise taken from the start document
 *   --config-inline <toml>  XDI template given as TOML text
 *   --json                  Print artifacts and diagnostics as JSON
 *   -h, --help              Show help
 *
 * Exit codes:
 *   0 - Export finished
 *   1 - Invalid arguments, template, or documents
 */

import { readFileSync } from "node:fs";
import { parseArgs } from "node:util";

import { config, configuredLogLevel, validateConfig, ConfigError } from "../config/index.js";
import { createLogger, initRunId } from "../logging/index.js";
import { DocumentValidationError } from "../documents/schema.js";
import { RenderError } from "../template/placeholder.js";
import { OutputError } from "../output/manager.js";
import { SequenceError, type Diagnostic } from "../serializer/serializer.js";
import { exportDocuments, type NamedDocument } from "../serializer/export.js";

// ============================================================
// Input parsing
// ============================================================

/**
 * Parse JSON-lines text into `[name, document]` pairs. Blank lines are
 * skipped.
 *
 * @throws DocumentValidationError naming the offending line
 */
export function parseDocumentStream(text: string): NamedDocument[] {
  const pairs: NamedDocument[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (line === "") {
      return;
    }

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (err) {
      throw new DocumentValidationError("(stream)", [
        `line ${index + 1}: ${err instanceof Error ? err.message : String(err)}`,
      ]);
    }

    if (!Array.isArray(value) || value.length !== 2 || typeof value[0] !== "string") {
      throw new DocumentValidationError("(stream)", [
        `line ${index + 1}: expected a [name, document] pair`,
      ]);
    }

    const [name, doc]: unknown[] = value;
    pairs.push([String(name), doc]);
  });

  return pairs;
}

// ============================================================
// Main
// ============================================================

function parseCliArgs() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      out: { type: "string", short: "o", default: "." },
      prefix: { type: "string", short: "p" },
      template: { type: "string", short: "t" },
      "config-inline": { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: xdi-export <documents.jsonl> [options]

Options:
  -o, --out <dir>         Output directory (default: .)
  -p, --prefix <tpl>      File prefix template (default: ${config.filePrefix})
  -t, --template <path>   XDI template file (default: from the start document)
  --config-inline <toml>  XDI template given as TOML text
  --json                  Print artifacts and diagnostics as JSON
  -h, --help              Show this help message
`);
    process.exit(0);
  }

  return { values, positionals };
}

function main(): void {
  const runId = initRunId();
  const logger = createLogger({
    level: configuredLogLevel(),
    file: config.logToFile,
    logDir: config.logDir,
  });

  try {
    validateConfig();

    const { values, positionals } = parseCliArgs();
    const [inputPath] = positionals;
    if (inputPath === undefined) {
      throw new ConfigError("Missing input file: xdi-export <documents.jsonl>");
    }

    const documents = parseDocumentStream(readFileSync(inputPath, "utf-8"));
    const diagnostics: Diagnostic[] = [];

    const artifacts = exportDocuments(documents, values.out ?? ".", {
      filePrefix: values.prefix,
      template: {
        configFilePath: values.template,
        config: values["config-inline"],
      },
      logger,
      runId,
      onDiagnostic: (diagnostic) => diagnostics.push(diagnostic),
    });

    if (values.json) {
      console.log(JSON.stringify({ artifacts, diagnostics }, null, 2));
    } else {
      for (const paths of Object.values(artifacts)) {
        for (const path of paths) {
          console.log(path);
        }
      }
    }
  } catch (err) {
    if (
      err instanceof ConfigError ||
      err instanceof DocumentValidationError ||
      err instanceof SequenceError ||
      err instanceof RenderError ||
      err instanceof OutputError
    ) {
      logger.error(err.name, { message: err.message });
      if (err instanceof ConfigError && err.issues.length > 0) {
        console.error(err.format());
      }
      process.exit(1);
    }
    throw err;
  }
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("export-run.ts") ||
   process.argv[1].endsWith("export-run.js"));

if (isDirectExecution) {
  main();
}
