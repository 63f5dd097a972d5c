import type { Writable } from "node:stream";

/** Append-only destination for rendered Markdown. */
export interface OutputSink {
  write(text: string): void;
}

/** Collects output in memory; handy for tests or further processing. */
export class BufferSink implements OutputSink {
  readonly #chunks: string[] = [];

  write(text: string): void {
    this.#chunks.push(text);
  }

  get text(): string {
    return this.#chunks.join("");
  }
}

/** Writes straight through to a Node.js stream (e.g. `process.stdout`). */
export class StreamSink implements OutputSink {
  constructor(readonly stream: Writable) {}

  write(text: string): void {
    this.stream.write(text);
  }
}

/**
 * Line-aware front end to an {@link OutputSink}.
 *
 * Content and the newline ending it go to the sink immediately; any further
 * newlines are held back as a single pending blank line, written only when
 * more content follows. So runs of blank lines collapse to one, and the
 * output never starts with or ends in a blank line. Verbatim text (code
 * contents, raw HTML) bypasses the collapsing. Nothing already handed to the
 * sink is ever rewritten.
 */
export class MarkdownWriter {
  #atLineStart = true;
  #pendingBlank = false;
  #written = false;

  constructor(readonly sink: OutputSink) {}

  get atLineStart(): boolean {
    return this.#atLineStart;
  }

  write(text: string): void {
    if (text.length === 0) return;
    const body = text.replace(/\n+$/, "");
    let trailing = text.length - body.length;
    if (body.length > 0) {
      this.#flush();
      this.sink.write(body);
      this.#atLineStart = false;
      this.#written = true;
    }
    if (trailing > 0 && !this.#atLineStart) {
      this.sink.write("\n");
      this.#atLineStart = true;
      trailing--;
    }
    if (trailing > 0 && this.#written) this.#pendingBlank = true;
  }

  verbatim(text: string): void {
    if (text.length === 0) return;
    this.#flush();
    this.sink.write(text);
    this.#atLineStart = text.endsWith("\n");
    this.#written = true;
  }

  /** End the output with exactly one newline (when anything was written). */
  finish(): void {
    this.#pendingBlank = false;
    if (this.#written && !this.#atLineStart) {
      this.sink.write("\n");
      this.#atLineStart = true;
    }
  }

  #flush() {
    if (this.#pendingBlank) {
      this.sink.write("\n");
      this.#pendingBlank = false;
    }
  }
}
