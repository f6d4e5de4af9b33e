/**
 * Progress engine: one session of loop progress reporting.
 *
 * Each `updateProgress` call is gated by the refresh scheduler, measured by the
 * estimator, mapped to tag values and rendered to whichever sinks are due.
 * Everything is synchronous and driven by an injected clock, so the engine
 * adds no timers or promises to the loop it reports on.
 *
 * Lifecycle: uninitialized → active (after `resetProgress`) → ended (after
 * `endSession`). An ended engine ignores further resets and updates.
 *
 * Sink failures are logged and never thrown; validation failures are thrown
 * from `resetProgress` before any state changes.
 *
 * @module progress/engine
 */

import { createLogger, type Logger } from "../logging/logger.js";
import { type ProgressConfig, type ProgressConfigInput, parseProgressConfig } from "./config.js";
import { SinkWriteError } from "./errors.js";
import { Estimator } from "./estimator.js";
import { renderTemplate } from "./renderer.js";
import { type EnabledSinks, RefreshScheduler } from "./scheduler.js";
import { eraseSequence } from "./sinks.js";
import { buildTagValues, initialTagValues } from "./tags.js";
import type { Clock, ConsoleSink, FileSink, ProgressSnapshot, SessionPhase, TagValues } from "./types.js";

/**
 * Options for constructing a progress engine. Omitting a sink disables it.
 */
export interface ProgressEngineOptions {
  /** Console sink; progress is drawn on one line, erased with `\r` */
  console?: ConsoleSink | undefined;

  /** Progress file sink; the file is overwritten on each draw */
  file?: FileSink | undefined;

  /** Monotonic clock in seconds (default: `performance.now() / 1000`) */
  clock?: Clock | undefined;

  /** Logger for sink write warnings (default: the "progress" component logger) */
  logger?: Pick<Logger, "warn"> | undefined;
}

const defaultClock: Clock = () => performance.now() / 1000;

export class ProgressEngine {
  private readonly consoleSink: ConsoleSink | undefined;
  private readonly fileSink: FileSink | undefined;
  private readonly clock: Clock;
  private readonly logger: Pick<Logger, "warn">;
  private readonly sinks: EnabledSinks;
  private readonly estimator = new Estimator();

  private phase: SessionPhase = "uninitialized";
  private config: ProgressConfig;
  private scheduler: RefreshScheduler;
  private rotatorIndex = 0;
  private tagValues: TagValues;
  private lastConsoleText: string | null = null;
  private lastFileText = "";

  constructor(options: ProgressEngineOptions = {}) {
    this.consoleSink = options.console;
    this.fileSink = options.file;
    this.clock = options.clock ?? defaultClock;
    this.logger = options.logger ?? createLogger("progress");
    this.sinks = { console: this.consoleSink !== undefined, file: this.fileSink !== undefined };
    this.consoleSink?.onError?.((error) => this.consoleFailed(error));

    this.config = parseProgressConfig();
    this.scheduler = new RefreshScheduler(this.config, this.sinks);
    this.tagValues = initialTagValues(this.config, this.config.rotatorSequence[0] ?? "");
  }

  /**
   * Start (or restart) a session with a new configuration.
   *
   * Erases any progress still on the console line, resets the rotator, clears
   * cached output and restarts timing. Ignored once the session has ended.
   *
   * @throws ConfigurationError when the configuration is invalid; state is untouched
   */
  resetProgress(input: ProgressConfigInput = {}): void {
    if (this.phase === "ended") return;

    const config = parseProgressConfig(input);

    this.eraseConsole();
    this.config = config;
    this.scheduler = new RefreshScheduler(config, this.sinks);
    this.estimator.reset();
    this.rotatorIndex = 0;
    this.tagValues = initialTagValues(config, config.rotatorSequence[0] ?? "");
    this.lastConsoleText = null;
    this.lastFileText = "";
    this.phase = "active";
  }

  /**
   * Report the number of items processed so far. Cheap when no redraw is due.
   */
  updateProgress(currentItem: number): void {
    if (this.phase !== "active" || !this.scheduler.enabled) return;

    const tick = this.estimator.buildTick(currentItem, this.clock(), this.config.totalItems);
    if (!this.scheduler.shouldProcess(tick)) return;

    const estimate = this.estimator.accept(tick, this.config.totalItems);
    this.tagValues = buildTagValues(this.config, currentItem, estimate, this.nextRotatorGlyph());

    const due = this.scheduler.sinksDue(estimate.timePassed);
    if (due.console) this.drawConsole(estimate.donePart);
    if (due.file) this.drawFile(estimate.donePart);
  }

  /**
   * Erase the progress line from the console and forget it, so the next
   * draw writes it again.
   */
  eraseConsole(): void {
    if (this.lastConsoleText === null) return;
    const erase = eraseSequence(this.lastConsoleText.length);
    this.lastConsoleText = null;
    this.writeConsole(erase);
  }

  /**
   * Erase the console progress and end the session. Safe to call repeatedly.
   */
  endSession(): void {
    if (this.phase === "ended") return;
    this.eraseConsole();
    this.phase = "ended";
  }

  snapshot(): ProgressSnapshot {
    return {
      phase: this.phase,
      active: this.phase === "active" && this.scheduler.enabled,
      effectiveInterval: this.scheduler.effectiveInterval,
      rotatorIndex: this.rotatorIndex,
      tagValues: { ...this.tagValues },
      lastConsoleText: this.lastConsoleText,
      lastFileText: this.lastFileText,
    };
  }

  private nextRotatorGlyph(): string {
    const sequence = this.config.rotatorSequence;
    const glyph = sequence[this.rotatorIndex] ?? "";
    this.rotatorIndex = (this.rotatorIndex + 1) % sequence.length;
    return glyph;
  }

  private drawConsole(donePart: number): void {
    const { consoleFormat, maxOutputWidth } = this.config;
    const text = renderTemplate(consoleFormat, this.tagValues, donePart, maxOutputWidth, { pad: true });
    if (text === this.lastConsoleText) return;

    const erase = this.lastConsoleText === null ? "" : eraseSequence(this.lastConsoleText.length);
    if (this.writeConsole(erase + text)) {
      this.lastConsoleText = text;
    }
  }

  private drawFile(donePart: number): void {
    if (this.fileSink === undefined) return;
    const { fileFormat, maxOutputWidth } = this.config;
    const text = renderTemplate(fileFormat, this.tagValues, donePart, maxOutputWidth);
    this.lastFileText = text;

    try {
      this.fileSink.overwrite(text);
    } catch (error) {
      this.warnSinkFailure(new SinkWriteError("file", this.fileSink.target, error));
    }
  }

  private writeConsole(text: string): boolean {
    if (this.consoleSink === undefined) return false;
    try {
      this.consoleSink.write(text);
      return true;
    } catch (error) {
      this.consoleFailed(error);
      return false;
    }
  }

  // The line on screen is unknown after a failure, so the next draw starts fresh.
  private consoleFailed(error: unknown): void {
    this.lastConsoleText = null;
    this.warnSinkFailure(new SinkWriteError("console", "stdout", error));
  }

  private warnSinkFailure(error: SinkWriteError): void {
    this.logger.warn({ event: "sink_write_failed", sink: error.sink, target: error.target, err: error }, error.message);
  }
}
