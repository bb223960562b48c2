/**
 * XDI export: turn a streamed run (start, descriptors, events, stop) into
 * a single XDI text file described by a TOML template.
 */

export {
  Serializer,
  SequenceError,
  STREAM_DATA_LABEL,
  FILE_EXTENSION,
  type SerializerOptions,
  type SerializerState,
  type Diagnostic,
  type DiagnosticCode,
} from "./serializer/serializer.js";
export { exportDocuments, type NamedDocument } from "./serializer/export.js";
export { finalizeArtifact } from "./serializer/finalize.js";

export {
  loadTemplate,
  compileTemplate,
  resolveTemplateSource,
  templateSourceFromStart,
  TEMPLATE_METADATA_KEY,
  type TemplateSource,
} from "./template/loader.js";
export {
  XDI_VERSION_KEY,
  HEADER_MARKER,
  type XdiTemplate,
  type ColumnDefinition,
  type HeaderDefinition,
  type VersionLine,
} from "./template/schema.js";
export {
  parseValueTemplate,
  renderValueTemplate,
  renderRequired,
  referencedPaths,
  PlaceholderSyntaxError,
  RenderError,
  type ValueTemplate,
  type RenderResult,
} from "./template/placeholder.js";
export { parseFormatSpec, formatScalar, FormatSpecError, type FormatSpec } from "./template/format-spec.js";

export {
  parseDocument,
  DocumentValidationError,
  DOCUMENT_NAMES,
  type DocumentName,
  type RunDocument,
  type RunStart,
  type RunStop,
  type EventDescriptor,
  type Event,
  type EventPage,
} from "./documents/schema.js";
export { packEvent, unpackEventPage } from "./documents/event-page.js";

export { HeaderResolutionEngine, type HeaderEngineOptions } from "./header/engine.js";
export {
  HeaderLineBuffer,
  UNRESOLVED,
  UNRESOLVED_TEXT,
  isUnresolved,
  type HeaderValue,
} from "./header/buffer.js";
export { SPECIAL_FIELDS, isoTimestamp, type HeaderSource, type SpecialResolver } from "./header/special-fields.js";
export { formatHeaderBlock, isHeaderLine, SEPARATOR_LINE } from "./header/format.js";
export { renderRow } from "./rows/emitter.js";

export {
  OutputError,
  type OutputManager,
  type OpenMode,
  type TextSink,
  type ReplacementSink,
} from "./output/manager.js";
export { MultiFileManager } from "./output/file-manager.js";
export { MemoryBufferManager, StringBuffer } from "./output/memory-manager.js";

export { ConfigError, config, validateConfig } from "./config/index.js";
export { createLogger, silentLogger, type Logger } from "./logging/index.js";
