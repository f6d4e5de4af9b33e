/**
 * Tag value mapping: turns estimates into the strings templates display.
 *
 * @module progress/tags
 */

import { formatTime } from "../../lib/duration.js";
import type { ProgressConfig } from "./config.js";
import { type ProgressEstimate, type TagValues, UNKNOWN_VALUE } from "./types.js";

type TagConfig = Pick<
  ProgressConfig,
  "totalItems" | "percentPrecision" | "speedPrecision" | "timePrecision" | "operationTitle"
>;

function formatSpeed(speed: number | undefined, precision: number): string {
  return speed === undefined ? UNKNOWN_VALUE : `${speed.toFixed(precision)}/s`;
}

function formatDuration(seconds: number | undefined, precision: number): string {
  return seconds === undefined ? UNKNOWN_VALUE : formatTime(seconds, precision, true, 1, true);
}

/**
 * Tag values before any tick: counters at zero, everything measured unknown.
 */
export function initialTagValues(config: TagConfig, rotatorGlyph: string): TagValues {
  return {
    percent: `${(0).toFixed(config.percentPrecision)}%`,
    eta: UNKNOWN_VALUE,
    item: "0",
    total: String(config.totalItems),
    speed_avg: UNKNOWN_VALUE,
    speed_cur: UNKNOWN_VALUE,
    time_passed: UNKNOWN_VALUE,
    rotator: rotatorGlyph,
    title: config.operationTitle,
  };
}

/**
 * Tag values for an accepted tick.
 *
 * @example
 * ```typescript
 * buildTagValues(config, 50, { donePart: 0.5, timePassed: 10, averageSpeed: 5, currentSpeed: 4, eta: 10 }, "|");
 * // { percent: "50.0%", eta: "10s", speed_avg: "5.00/s", ... }
 * ```
 */
export function buildTagValues(
  config: TagConfig,
  currentItem: number,
  estimate: ProgressEstimate,
  rotatorGlyph: string,
): TagValues {
  return {
    percent: `${(estimate.donePart * 100).toFixed(config.percentPrecision)}%`,
    eta: formatDuration(estimate.eta, config.timePrecision),
    item: String(Math.trunc(currentItem)),
    total: String(config.totalItems),
    speed_avg: formatSpeed(estimate.averageSpeed, config.speedPrecision),
    speed_cur: formatSpeed(estimate.currentSpeed, config.speedPrecision),
    time_passed: formatDuration(estimate.timePassed, config.timePrecision),
    rotator: rotatorGlyph,
    title: config.operationTitle,
  };
}
