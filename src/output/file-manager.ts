/**
 * Output manager that writes files into one directory.
 *
 * All IO is synchronous so each serializer call has finished touching the
 * disk when it returns. Replacements are written beside the original as
 * `<name>.updating` and renamed over it on commit.
 */

import {
  closeSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  writeSync,
} from "node:fs";
import { dirname, join, resolve } from "node:path";

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

export const REPLACEMENT_SUFFIX = ".updating";

class FileSink implements TextSink {
  private fd: number | null;

  constructor(readonly path: string, flags: string) {
    this.fd = openSync(path, flags);
  }

  get closed(): boolean {
    return this.fd === null;
  }

  write(text: string): void {
    if (this.fd === null) {
      throw new OutputError(this.path, `Cannot write to closed file: ${this.path}`);
    }
    writeSync(this.fd, text);
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }
}

export class MultiFileManager implements OutputManager<string> {
  readonly directory: string;
  private readonly sinks: FileSink[] = [];
  private readonly produced = new Map<string, string[]>();

  constructor(directory: string) {
    this.directory = resolve(directory);
  }

  open(label: string, name: string, mode: OpenMode): TextSink {
    const path = join(this.directory, name);
    mkdirSync(dirname(path), { recursive: true });

    let sink: FileSink;
    try {
      sink = new FileSink(path, mode === "x" ? "wx" : "w");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "EEXIST") {
        throw new OutputError(path, `Refusing to overwrite existing file: ${path}`);
      }
      throw err;
    }

    this.sinks.push(sink);
    addArtifact(this.produced, label, path);
    return sink;
  }

  close(): void {
    for (const sink of this.sinks) {
      sink.close();
    }
  }

  get artifacts(): Record<string, readonly string[]> {
    return artifactsView(this.produced);
  }

  readLines(artifact: string): string[] {
    return splitLines(readFileSync(artifact, "utf-8"));
  }

  openReplacement(artifact: string): ReplacementSink {
    const temporary = artifact + REPLACEMENT_SUFFIX;
    const sink = new FileSink(temporary, "w");

    return {
      write: (text) => sink.write(text),
      commit: () => {
        sink.close();
        renameSync(temporary, artifact);
      },
      abort: () => {
        sink.close();
        rmSync(temporary, { force: true });
      },
    };
  }
}
