/**
 * Type definitions for loop progress tracking.
 *
 * This module defines:
 * - The closed set of template tags and their rendered values
 * - Per-call tick data and estimator output
 * - Session phases and the read-only state snapshot
 * - The sink interfaces the engine writes through
 *
 * @module progress/types
 */

/**
 * Tags substituted into progress templates as `%name%`.
 * `%bar%` is not listed: it is sized against the rest of the line and inserted last.
 */
export const PROGRESS_TAGS = [
  "percent",
  "eta",
  "item",
  "total",
  "speed_avg",
  "speed_cur",
  "time_passed",
  "rotator",
  "title",
] as const;

export type ProgressTag = (typeof PROGRESS_TAGS)[number];

/**
 * Current rendered value of every tag.
 */
export type TagValues = Record<ProgressTag, string>;

/**
 * Placeholder that expands to the progress bar.
 */
export const BAR_PLACEHOLDER = "%bar%";

/**
 * Rendered value for anything not yet known (first tick, division by zero).
 */
export const UNKNOWN_VALUE = "?";

/**
 * One call to `updateProgress`, as seen by the scheduler.
 */
export interface Tick {
  /** Item number passed by the caller */
  currentItem: number;

  /** Clock reading in seconds */
  now: number;

  /** Items since the previous accepted tick (0 on the first call) */
  deltaItems: number;

  /** Seconds since the previous accepted tick (0 on the first call) */
  deltaTime: number;

  /** No tick has been accepted since the last reset */
  isFirstCall: boolean;

  /** `currentItem >= totalItems` */
  isLastItem: boolean;
}

/**
 * Estimator output for one accepted tick. `undefined` means unknown.
 */
export interface ProgressEstimate {
  /** Share of the work done; 1 = all items, may exceed 1 */
  donePart: number;

  /** Seconds since the first accepted tick */
  timePassed?: number | undefined;

  /** Items per second since the first accepted tick */
  averageSpeed?: number | undefined;

  /** Items per second since the previous accepted tick */
  currentSpeed?: number | undefined;

  /** Seconds left at the average speed */
  eta?: number | undefined;
}

/**
 * Which sinks an accepted tick should redraw.
 */
export interface SinkDecision {
  console: boolean;
  file: boolean;
}

/**
 * Session phase of a progress engine.
 */
export type SessionPhase = "uninitialized" | "active" | "ended";

/**
 * Read-only view of engine state.
 */
export interface ProgressSnapshot {
  phase: SessionPhase;

  /** True when at least one sink is enabled and a session is running */
  active: boolean;

  /** Shortest refresh interval among enabled sinks, `undefined` with none */
  effectiveInterval?: number | undefined;

  rotatorIndex: number;
  tagValues: TagValues;
  lastConsoleText: string | null;
  lastFileText: string;
}

/**
 * Console side of the engine output: redraw-in-place on one line.
 */
export interface ConsoleSink {
  write(text: string): void;

  /** Register a listener for failures reported after `write` returned */
  onError?(listener: (error: Error) => void): void;
}

/**
 * File side of the engine output: the whole file replaced on each write.
 */
export interface FileSink {
  /** Human-readable target, used in warnings */
  readonly target: string;
  overwrite(text: string): void;
}

/**
 * Monotonic clock returning seconds.
 */
export type Clock = () => number;
