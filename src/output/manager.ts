/**
 * Output resource contract.
 *
 * The serializer never creates files itself. It asks a manager for a
 * writable handle, and at the end of the run asks it for the lines it
 * wrote and for a replacement to rewrite them into. `A` is whatever the
 * manager hands back as an artifact: a file path, a buffer, ...
 */

/** `x` refuses to replace an existing resource; `w` truncates it. */
export type OpenMode = "x" | "w";

export interface TextSink {
  write(text: string): void;
  close(): void;
  readonly closed: boolean;
}

/**
 * A temporary resource that takes the place of an artifact on commit.
 * Readers that open the artifact after commit() returns see only the new
 * content.
 */
export interface ReplacementSink {
  write(text: string): void;
  commit(): void;
  abort(): void;
}

export interface OutputManager<A> {
  open(label: string, name: string, mode: OpenMode): TextSink;
  /** Close every handle this manager opened. Safe to call twice. */
  close(): void;
  /** Produced resources, grouped by label, in creation order. */
  readonly artifacts: Readonly<Record<string, readonly A[]>>;
  /** Lines of an artifact, each with its line terminator. */
  readLines(artifact: A): Iterable<string>;
  openReplacement(artifact: A): ReplacementSink;
}

export class OutputError extends Error {
  constructor(
    public readonly resource: string,
    message: string
  ) {
    super(message);
    this.name = "OutputError";
  }
}

/**
 * Split text into lines, keeping each line's terminator so that joining
 * the result reproduces the input exactly.
 */
export function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

export function addArtifact<A>(artifacts: Map<string, A[]>, label: string, artifact: A): void {
  const existing = artifacts.get(label);
  if (existing) {
    existing.push(artifact);
  } else {
    artifacts.set(label, [artifact]);
  }
}

export function artifactsView<A>(artifacts: Map<string, A[]>): Record<string, readonly A[]> {
  return Object.fromEntries([...artifacts].map(([label, list]) => [label, [...list]]));
}
