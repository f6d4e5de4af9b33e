/**
 * Message log file: status, information and error messages with offsets from
 * the moment the log was opened.
 *
 * File layout:
 * ```
 * [Log started at Wed, 04 Mar 2026 05:06:07 +0000]
 * [+0.000s] Started at ...
 * [+12.345s] 100 records imported
 * [Log finished at Wed, 04 Mar 2026 05:06:20 +0000 (+ 12.500s)]
 * ```
 * In append mode a non-empty file first gets a `---` separator.
 *
 * The file is opened on the first message. If it cannot be opened a warning is
 * logged once and the log stays disabled for the rest of the run.
 *
 * @module io/message-log
 */

import { closeSync, openSync, statSync, writeSync } from "node:fs";
import { DateTime } from "luxon";
import { createLogger, type Logger } from "../core/logging/logger.js";
import type { Clock } from "../core/progress/types.js";
import { formatTimestamp } from "../lib/timestamp.js";

export const LOG_SEPARATOR = "\n---\n\n";

export interface MessageLogOptions {
  path: string;

  /** Truncate an existing file instead of appending to it */
  overwrite?: boolean | undefined;

  /** Monotonic clock in seconds for message offsets */
  clock?: Clock | undefined;

  /** Wall clock for the header and footer */
  now?: (() => DateTime) | undefined;

  logger?: Pick<Logger, "warn"> | undefined;
}

type LogState = "pending" | "open" | "disabled" | "closed";

function hasContent(path: string): boolean {
  const stats = statSync(path, { throwIfNoEntry: false });
  return stats !== undefined && stats.size > 0;
}

export class MessageLog {
  readonly path: string;
  private readonly overwrite: boolean;
  private readonly clock: Clock;
  private readonly now: () => DateTime;
  private readonly logger: Pick<Logger, "warn">;

  private state: LogState = "pending";
  private fd: number | undefined;
  private openedAt = 0;

  constructor(options: MessageLogOptions) {
    this.path = options.path;
    this.overwrite = options.overwrite ?? false;
    this.clock = options.clock ?? (() => performance.now() / 1000);
    this.now = options.now ?? (() => DateTime.now());
    this.logger = options.logger ?? createLogger("message-log");
  }

  get isOpen(): boolean {
    return this.state === "open";
  }

  /**
   * Append a message, opening the file first if needed.
   */
  write(message: string): void {
    if (this.state === "pending") this.open();
    if (this.state !== "open") return;

    this.append(`[+${this.elapsed().toFixed(3)}s] ${message}\n`);
  }

  /**
   * Write the footer and close the file. Later messages are dropped.
   */
  close(): void {
    if (this.state === "open" && this.fd !== undefined) {
      this.append(`[Log finished at ${formatTimestamp(this.now())} (+ ${this.elapsed().toFixed(3)}s)]\n`);
      closeSync(this.fd);
      this.fd = undefined;
    }
    this.state = "closed";
  }

  private open(): void {
    try {
      const separate = !this.overwrite && hasContent(this.path);
      this.fd = openSync(this.path, this.overwrite ? "w" : "a");
      this.openedAt = this.clock();
      this.state = "open";

      if (separate) this.append(LOG_SEPARATOR);
      this.append(`[Log started at ${formatTimestamp(this.now())}]\n`);
    } catch (error) {
      this.state = "disabled";
      this.logger.warn(
        { event: "message_log_open_failed", path: this.path, err: error },
        `Failed to open log file '${this.path}' for writing`,
      );
    }
  }

  private append(text: string): void {
    if (this.fd === undefined) return;
    try {
      writeSync(this.fd, text);
    } catch (error) {
      this.logger.warn({ event: "message_log_write_failed", path: this.path, err: error }, "Failed writing to log file");
    }
  }

  private elapsed(): number {
    return this.clock() - this.openedAt;
  }
}
