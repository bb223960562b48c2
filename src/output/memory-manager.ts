/**
 * Output manager that keeps everything in memory.
 *
 * Artifacts are StringBuffer objects rather than paths; handy for tests and
 * for callers that want the XDI text without touching the disk.
 */

import {
  OutputError,
  addArtifact,
  artifactsView,
  splitLines,
  type OpenMode,
  type OutputManager,
  type ReplacementSink,
  type TextSink,
} from "./manager.js";

export class StringBuffer {
  private content = "";

  constructor(readonly name: string) {}

  append(text: string): void {
    this.content += text;
  }

  replaceContent(text: string): void {
    this.content = text;
  }

  getValue(): string {
    return this.content;
  }
}

export class MemoryBufferManager implements OutputManager<StringBuffer> {
  private readonly buffers = new Map<string, StringBuffer>();
  private readonly sinks: { closed: boolean }[] = [];
  private readonly produced = new Map<string, StringBuffer[]>();

  open(label: string, name: string, mode: OpenMode): TextSink {
    const existing = this.buffers.get(name);
    if (existing && mode === "x") {
      throw new OutputError(name, `Refusing to overwrite existing buffer: ${name}`);
    }

    const buffer = existing ?? new StringBuffer(name);
    buffer.replaceContent("");
    this.buffers.set(name, buffer);
    if (!existing) {
      addArtifact(this.produced, label, buffer);
    }

    const state = { closed: false };
    this.sinks.push(state);

    return {
      write: (text) => {
        if (state.closed) {
          throw new OutputError(name, `Cannot write to closed buffer: ${name}`);
        }
        buffer.append(text);
      },
      close: () => {
        state.closed = true;
      },
      get closed() {
        return state.closed;
      },
    };
  }

  close(): void {
    for (const state of this.sinks) {
      state.closed = true;
    }
  }

  get artifacts(): Record<string, readonly StringBuffer[]> {
    return artifactsView(this.produced);
  }

  /** Look up a buffer by the name it was opened under. */
  get(name: string): StringBuffer | undefined {
    return this.buffers.get(name);
  }

  readLines(artifact: StringBuffer): string[] {
    return splitLines(artifact.getValue());
  }

  openReplacement(artifact: StringBuffer): ReplacementSink {
    let pending: string | null = "";

    return {
      write: (text) => {
        if (pending === null) {
          throw new OutputError(artifact.name, "Replacement already finished");
        }
        pending += text;
      },
      commit: () => {
        if (pending !== null) {
          artifact.replaceContent(pending);
          pending = null;
        }
      },
      abort: () => {
        pending = null;
      },
    };
  }
}
