/**
 * Sink writers: the console line redrawn in place, and the progress file
 * replaced wholesale.
 *
 * @module progress/sinks
 */

import { writeFileSync } from "node:fs";
import type { ConsoleSink, FileSink } from "./types.js";

/**
 * Erase sequence for a console line of `length` characters:
 * carriage return, spaces over the old text, carriage return.
 */
export function eraseSequence(length: number): string {
  return `\r${" ".repeat(length)}\r`;
}

/**
 * Console sink over a writable stream, stdout by default.
 *
 * Streams report write failures (EPIPE on a closed pipe, for one) through an
 * `error` event after `write` has returned; `onError` subscribes to them.
 */
export class StreamConsoleSink implements ConsoleSink {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  write(text: string): void {
    this.stream.write(text);
  }

  onError(listener: (error: Error) => void): void {
    this.stream.on("error", listener);
  }
}

/**
 * File sink that rewrites the whole file on every call.
 */
export class TextFileSink implements FileSink {
  constructor(readonly target: string) {}

  overwrite(text: string): void {
    writeFileSync(this.target, text, "utf8");
  }
}
