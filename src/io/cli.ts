/**
 * CLI session: the toolkit facade a script drives.
 *
 * Declares the standard parameters (`help`, `logging`, `verbosity`), routes
 * status, information and error messages to stdout and the message log according
 * to the flags, and owns the progress engine for the run.
 *
 * Verbosity flags: s, e, i (message types), p (console progress).
 * Logging flags: s, e, i (message types), p (progress file), o (overwrite the
 * message log instead of appending). `-` means none.
 *
 * @example
 * ```typescript
 * const cli = new CliSession({ config: { scriptName: "import", scriptVersion: "1.0" } });
 * if (cli.helpRequested) {
 *   cli.displayHelp();
 * } else {
 *   cli.start();
 *   cli.resetProgress({ totalItems: records.length });
 *   records.forEach((record, i) => {
 *     save(record);
 *     cli.updateProgress(i + 1);
 *   });
 *   cli.close();
 * }
 * ```
 *
 * @module io/cli
 */

import { DateTime } from "luxon";
import { type Config, type ConfigInput, parseConfig } from "../config/schema.js";
import type { Logger } from "../core/logging/logger.js";
import { type ProgressConfigInput, parseProgressConfig } from "../core/progress/config.js";
import { ProgressEngine } from "../core/progress/engine.js";
import { StreamConsoleSink, TextFileSink } from "../core/progress/sinks.js";
import type { Clock } from "../core/progress/types.js";
import { formatTime } from "../lib/duration.js";
import { formatTimestamp } from "../lib/timestamp.js";
import { type ParameterDeclaration, type ParameterValue, ParameterSet } from "./arguments.js";
import { renderHelp } from "./help.js";
import { MessageLog } from "./message-log.js";

export type MessageType = "s" | "e" | "i";

export interface CliSessionOptions {
  /** Toolkit options; validated on construction */
  config?: ConfigInput | undefined;

  /** Raw arguments (default: `process.argv.slice(2)`) */
  argv?: readonly string[] | undefined;

  /** Stream for messages, help and console progress (default: stdout) */
  stdout?: NodeJS.WritableStream | undefined;

  /** Monotonic clock in seconds */
  clock?: Clock | undefined;

  /** Wall clock for `%time_current%` and log headers */
  now?: (() => DateTime) | undefined;

  /** Receives sink and log file warnings */
  logger?: Pick<Logger, "warn"> | undefined;
}

export class CliSession {
  readonly config: Config;
  readonly parameters: ParameterSet;

  private readonly stdout: NodeJS.WritableStream;
  private readonly clock: Clock;
  private readonly now: () => DateTime;
  private readonly logger: Pick<Logger, "warn"> | undefined;

  private progress: ProgressEngine | null | undefined;
  private progressOptions: ProgressConfigInput;
  private messageLog: MessageLog | undefined;

  private startedAt: number;
  private totalTime = 0;
  private started = false;
  private ended = false;

  constructor(options: CliSessionOptions = {}) {
    this.config = parseConfig(options.config ?? {});
    this.stdout = options.stdout ?? process.stdout;
    this.clock = options.clock ?? (() => performance.now() / 1000);
    this.now = options.now ?? (() => DateTime.now());
    this.logger = options.logger;

    this.progressOptions = {
      ...this.config.progress,
      operationTitle: this.config.progress.operationTitle || this.config.scriptName,
    };

    this.parameters = new ParameterSet(options.argv ?? process.argv.slice(2))
      .declare({ name: "help", alias: "?", type: "boolean", default: false, description: "Display help" })
      .declare({
        name: "logging",
        alias: "l",
        type: "string",
        default: this.config.loggingDefault,
        description: "Logging flags: s (status), e (errors), i (information), p (progress file), o (overwrite log)",
      })
      .declare({
        name: "verbosity",
        alias: "v",
        type: "string",
        default: this.config.verbosityDefault,
        description: "Verbosity flags: s (status), e (errors), i (information), p (progress)",
      });

    this.startedAt = this.clock();
  }

  declareParameter(declaration: ParameterDeclaration): this {
    this.parameters.declare(declaration);
    return this;
  }

  getParameter(nameOrAlias: string): ParameterValue {
    return this.parameters.get(nameOrAlias);
  }

  get helpRequested(): boolean {
    return this.parameters.getBoolean("help");
  }

  hasVerbosityFlag(flag: string): boolean {
    return this.parameters.getString("verbosity").includes(flag);
  }

  hasLoggingFlag(flag: string): boolean {
    return this.parameters.getString("logging").includes(flag);
  }

  get logFile(): string {
    return this.config.logFile ?? `${this.config.scriptName || "loopwatch"}.log`;
  }

  get progressFile(): string {
    return this.config.progressFile ?? `${this.config.scriptName || "loopwatch"}.progress`;
  }

  displayHelp(): void {
    this.stdout.write(
      renderHelp({
        scriptName: this.config.scriptName,
        scriptVersion: this.config.scriptVersion,
        description: this.config.scriptDescription,
        maxOutputWidth: this.config.maxOutputWidth,
        parameters: this.parameters.declared,
      }),
    );
  }

  /**
   * Call before any work starts: records the start time and prints the start message.
   */
  start(): void {
    this.startedAt = this.clock();
    this.started = true;

    const { startMessage } = this.config.status;
    if (startMessage !== "") {
      this.status(startMessage.replaceAll("%time_current%", this.currentTime()));
    }
  }

  /**
   * Call after all work is done: freezes the elapsed time, clears progress and
   * prints the end message. The message log stays open until `close()`.
   */
  end(): void {
    if (this.ended) return;

    this.totalTime = this.clock() - this.startedAt;
    this.ended = true;
    this.progressEngine()?.endSession();

    const { endMessage } = this.config.status;
    if (endMessage !== "") {
      this.status(
        endMessage.replaceAll("%time_current%", this.currentTime()).replaceAll("%time_passed%", this.formatTimePassed()),
      );
    }
  }

  /**
   * End the run if it was started and close the message log.
   */
  close(): void {
    if (this.started && !this.ended) this.end();
    this.messageLog?.close();
  }

  /**
   * Seconds since `start()` (or construction), frozen by `end()`.
   */
  getTimePassed(): number {
    return this.ended ? this.totalTime : this.clock() - this.startedAt;
  }

  formatTimePassed(): string {
    return formatTime(this.getTimePassed(), this.config.status.timePrecision, true, 1, true);
  }

  status(message: string): void {
    this.out("s", message);
  }

  info(message: string): void {
    this.out("i", message);
  }

  error(message: string): void {
    this.out("e", message);
  }

  /**
   * Print and/or log a message, as the verbosity and logging flags allow.
   */
  out(type: MessageType, message: string): void {
    if (this.hasVerbosityFlag(type)) {
      this.progressEngine()?.eraseConsole();
      this.stdout.write(`${message}\n`);
    }

    if (this.hasLoggingFlag(type)) {
      this.openMessageLog().write(message);
    }
  }

  /**
   * Merge options into the progress settings and start a new progress session.
   *
   * @throws ConfigurationError when the merged settings are invalid
   */
  resetProgress(overrides: ProgressConfigInput = {}): void {
    const merged = { ...this.progressOptions, ...overrides };
    const engine = this.progressEngine();
    if (engine) {
      engine.resetProgress(merged);
    } else {
      parseProgressConfig(merged);
    }
    this.progressOptions = merged;
  }

  updateProgress(currentItem: number): void {
    this.progressEngine()?.updateProgress(currentItem);
  }

  private progressEngine(): ProgressEngine | undefined {
    if (this.progress === undefined) {
      const toConsole = this.hasVerbosityFlag("p");
      const toFile = this.hasLoggingFlag("p");
      this.progress =
        toConsole || toFile
          ? new ProgressEngine({
              console: toConsole ? new StreamConsoleSink(this.stdout) : undefined,
              file: toFile ? new TextFileSink(this.progressFile) : undefined,
              clock: this.clock,
              logger: this.logger,
            })
          : null;
    }
    return this.progress ?? undefined;
  }

  private openMessageLog(): MessageLog {
    this.messageLog ??= new MessageLog({
      path: this.logFile,
      overwrite: this.hasLoggingFlag("o"),
      clock: this.clock,
      now: this.now,
      logger: this.logger,
    });
    return this.messageLog;
  }

  private currentTime(): string {
    return formatTimestamp(this.now(), this.config.status.timeFormat);
  }
}
