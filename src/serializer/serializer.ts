/**
 * XDI serializer: the run state machine.
 *
 *   idle ──start──▶ open ──stop──▶ closed
 *                   │  ▲
 *                   └──┘ descriptor, event, event_page, resource, datum, datum_page
 *
 * start       load the template, seed the header, open `<prefix>.xdi` and
 *             write a provisional header right away so the file is readable
 *             while the run is in progress
 * descriptor  mark it eligible when it declares every column's data key;
 *             always offered to the header engine
 * event(s)    one row per event of an eligible descriptor; anything else is
 *             skipped with a diagnostic
 * stop        resolve end-of-run fields, rewrite the header in place, close
 *
 * Any document out of that order is a SequenceError. A run that never sees
 * its stop document keeps the provisional header.
 */

import { config, configuredLogLevel, ConfigError } from "../config/index.js";
import { createLogger, generateRunId, type Logger } from "../logging/index.js";
import {
  parseDocument,
  type EventDescriptor,
  type EventPage,
  type RunDocument,
  type RunStart,
  type RunStop,
} from "../documents/schema.js";
import { packEvent, unpackEventPage } from "../documents/event-page.js";
import { HeaderResolutionEngine } from "../header/engine.js";
import { UNRESOLVED_TEXT } from "../header/buffer.js";
import { renderRow } from "../rows/emitter.js";
import {
  PlaceholderSyntaxError,
  parseValueTemplate,
  renderRequired,
  type ValueTemplate,
} from "../template/placeholder.js";
import { loadTemplate, resolveTemplateSource, type TemplateSource } from "../template/loader.js";
import type { XdiTemplate } from "../template/schema.js";
import { OutputError, type OutputManager, type TextSink } from "../output/manager.js";
import { MultiFileManager } from "../output/file-manager.js";
import { finalizeArtifact } from "./finalize.js";

/** Label the data file is registered under with the output manager. */
export const STREAM_DATA_LABEL = "stream_data";
export const FILE_EXTENSION = ".xdi";

export type SerializerState = "idle" | "open" | "closed";

// ---------------------------------------------------------------------------
// Errors and diagnostics
// ---------------------------------------------------------------------------

export class SequenceError extends Error {
  constructor(
    public readonly state: SerializerState,
    public readonly documentName: string,
    message?: string
  ) {
    super(message ?? `Unexpected ${documentName} document: serializer is ${state}`);
    this.name = "SequenceError";
  }
}

export type DiagnosticCode =
  | "no-eligible-descriptor"
  | "ineligible-record"
  | "unresolved-required-header";

/** A recoverable condition; the run carries on after reporting it. */
export interface Diagnostic {
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly context: Readonly<Record<string, unknown>>;
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface SerializerOptions {
  /**
   * Value-template for the file name, rendered against the start document.
   * `.xdi` is appended. Defaults to XDI_FILE_PREFIX, or `{uid}-`.
   */
  filePrefix?: string;
  /**
   * Where the XDI template comes from. When omitted, the start document's
   * `md["xdi-export"]` is used.
   */
  template?: TemplateSource;
  logger?: Logger;
  /** Run ID for the logger the serializer creates when none is given. */
  runId?: string;
  onDiagnostic?: (diagnostic: Diagnostic) => void;
}

interface OpenRun<A> {
  readonly uid: string;
  readonly template: XdiTemplate;
  readonly engine: HeaderResolutionEngine;
  readonly output: TextSink;
  readonly fileName: string;
  readonly artifact: A;
}

function compileFilePrefix(source: string): ValueTemplate {
  try {
    return parseValueTemplate(source);
  } catch (err) {
    if (err instanceof PlaceholderSyntaxError) {
      throw new ConfigError(`Invalid file prefix "${source}"`, [err.message]);
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Serializer
// ---------------------------------------------------------------------------

export class Serializer<A> {
  private _state: SerializerState = "idle";
  private run: OpenRun<A> | null = null;
  private rows = 0;
  private readonly eligible = new Set<string>();
  private readonly _diagnostics: Diagnostic[] = [];
  private readonly filePrefix: ValueTemplate;
  private logger: Logger;
  readonly runId: string;

  constructor(
    private readonly manager: OutputManager<A>,
    private readonly options: SerializerOptions = {}
  ) {
    this.filePrefix = compileFilePrefix(options.filePrefix ?? config.filePrefix);
    this.runId = options.runId ?? generateRunId();
    this.logger =
      options.logger ??
      createLogger({
        level: configuredLogLevel(),
        file: config.logToFile,
        logDir: config.logDir,
        runId: this.runId,
      });
  }

  /**
   * Serializer writing files into a directory.
   */
  static toDirectory(directory: string, options: SerializerOptions = {}): Serializer<string> {
    return new Serializer(new MultiFileManager(directory), options);
  }

  get state(): SerializerState {
    return this._state;
  }

  get artifacts(): Readonly<Record<string, readonly A[]>> {
    return this.manager.artifacts;
  }

  get diagnostics(): readonly Diagnostic[] {
    return [...this._diagnostics];
  }

  /** Data rows written so far. */
  get rowCount(): number {
    return this.rows;
  }

  get eligibleDescriptors(): readonly string[] {
    return [...this.eligible];
  }

  /** Current header values (null while unresolved), or null before start. */
  get header(): Record<string, string | null> | null {
    return this.run ? this.run.engine.buffer.toJSON() : null;
  }

  /**
   * Validate and process one document.
   *
   * @throws DocumentValidationError, SequenceError, ConfigError, RenderError
   */
  handle(name: string, doc: unknown): void {
    this.dispatch(parseDocument(name, doc));
  }

  dispatch(document: RunDocument): void {
    switch (document.kind) {
      case "start":
        return this.start(document.doc);
      case "descriptor":
        return this.descriptor(document.doc);
      case "event":
        return this.records("event", document.doc.descriptor, [packEvent(document.doc)]);
      case "event_page":
        return this.records("event_page", document.doc.descriptor, unpackEventPage(document.doc));
      case "stop":
        return this.stop(document.doc);
      case "resource":
      case "datum":
      case "datum_page":
        this.requireOpen(document.kind);
        this.logger.debug(`Ignoring ${document.kind} document`);
        return;
    }
  }

  /**
   * Release the output manager. A run that is still open keeps its
   * provisional header.
   */
  close(): void {
    if (this._state === "open" && this.run) {
      this.logger.warn("Closing before stop; output keeps its provisional header", {
        file: this.run.fileName,
      });
    }
    this._state = "closed";
    this.manager.close();
  }

  // -------------------------------------------------------------------------
  // Transitions
  // -------------------------------------------------------------------------

  private start(doc: RunStart): void {
    if (this._state !== "idle") {
      throw new SequenceError(this._state, "start", `Received a second start document (uid ${doc.uid})`);
    }

    this.logger = this.logger.child({ uid: doc.uid });
    const template = loadTemplate(resolveTemplateSource(this.options.template, doc));
    const engine = HeaderResolutionEngine.initialize(template, doc, { logger: this.logger });
    const fileName = renderRequired(this.filePrefix, doc, "file prefix") + FILE_EXTENSION;

    const output = this.manager.open(STREAM_DATA_LABEL, fileName, "x");
    const produced = this.manager.artifacts[STREAM_DATA_LABEL];
    const artifact: A | undefined = produced ? produced[produced.length - 1] : undefined;
    if (artifact === undefined) {
      output.close();
      throw new OutputError(fileName, `Output manager registered no artifact for ${fileName}`);
    }

    output.write(engine.formatHeader());

    this.run = { uid: doc.uid, template, engine, output, fileName, artifact };
    this._state = "open";
    this.logger.info("Run started", {
      file: fileName,
      pending: engine.buffer.pending(),
    });
  }

  private descriptor(doc: EventDescriptor): void {
    const run = this.requireOpen("descriptor");

    const missing = run.template.requiredDataKeys.filter((key) => !Object.hasOwn(doc.data_keys, key));
    if (missing.length === 0) {
      this.eligible.add(doc.uid);
      this.logger.info("Descriptor eligible for export", { descriptor: doc.uid, stream: doc["name"] });
    } else {
      this.logger.debug("Descriptor lacks exported data keys", { descriptor: doc.uid, missing });
    }

    run.engine.update({ kind: "descriptor", doc });
  }

  private records(kind: "event" | "event_page", descriptor: string, pages: EventPage[]): void {
    const run = this.requireOpen(kind);

    if (this.eligible.size === 0) {
      this.report(
        "no-eligible-descriptor",
        `No descriptor with data keys ${run.template.requiredDataKeys.join(", ")} seen yet; skipping ${kind}`,
        { descriptor, rows: pages.length }
      );
      return;
    }
    if (!this.eligible.has(descriptor)) {
      this.report("ineligible-record", `Descriptor ${descriptor} has no exported data; skipping ${kind}`, {
        descriptor,
        rows: pages.length,
      });
      return;
    }

    for (const page of pages) {
      run.output.write(renderRow(run.template.columns, page));
      this.rows++;
    }
  }

  private stop(doc: RunStop): void {
    const run = this.requireOpen("stop");
    this._state = "closed";

    run.engine.update({ kind: "stop", doc });
    for (const field of run.engine.unresolvedRequired()) {
      this.report(
        "unresolved-required-header",
        `Required header ${field} was never resolved; writing ${UNRESOLVED_TEXT}`,
        { field }
      );
    }

    run.output.close();
    const rows = finalizeArtifact(this.manager, run.artifact, run.engine.formatHeader());
    this.manager.close();

    this.logger.info("Run finalized", {
      file: run.fileName,
      rows,
      exitStatus: doc["exit_status"],
    });
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private requireOpen(documentName: string): OpenRun<A> {
    if (this._state !== "open" || this.run === null) {
      throw new SequenceError(this._state, documentName);
    }
    return this.run;
  }

  private report(code: DiagnosticCode, message: string, context: Record<string, unknown>): void {
    const diagnostic: Diagnostic = { code, message, context };
    this._diagnostics.push(diagnostic);
    this.logger.warn(message, { code, ...context });
    this.options.onDiagnostic?.(diagnostic);
  }
}
