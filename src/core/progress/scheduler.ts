/**
 * Refresh scheduling for progress updates.
 *
 * Two levels of gating keep per-iteration overhead low in tight loops:
 * - `shouldProcess` decides whether an update call does any work at all, using the
 *   shortest refresh interval among the enabled sinks
 * - `sinksDue` decides which sinks redraw on an accepted tick, each against its own
 *   interval measured from the start of the session (not from its last draw), so
 *   the first draw of each sink waits out its full interval
 *
 * @module progress/scheduler
 */

import type { ProgressConfig } from "./config.js";
import type { SinkDecision, Tick } from "./types.js";

/**
 * Sinks attached to an engine.
 */
export interface EnabledSinks {
  console: boolean;
  file: boolean;
}

type IntervalConfig = Pick<ProgressConfig, "consoleRefreshInterval" | "fileRefreshInterval">;

/**
 * Shortest refresh interval among enabled sinks, or `undefined` when none is enabled.
 */
export function effectiveRefreshInterval(config: IntervalConfig, sinks: EnabledSinks): number | undefined {
  const intervals: number[] = [];
  if (sinks.console) intervals.push(config.consoleRefreshInterval);
  if (sinks.file) intervals.push(config.fileRefreshInterval);
  return intervals.length > 0 ? Math.min(...intervals) : undefined;
}

export class RefreshScheduler {
  readonly effectiveInterval: number | undefined;

  constructor(
    private readonly config: IntervalConfig,
    private readonly sinks: EnabledSinks,
  ) {
    this.effectiveInterval = effectiveRefreshInterval(config, sinks);
  }

  /**
   * Whether any sink is enabled. A disabled scheduler rejects every tick.
   */
  get enabled(): boolean {
    return this.effectiveInterval !== undefined;
  }

  /**
   * Whether an update call should compute estimates and consider rendering.
   */
  shouldProcess(tick: Tick): boolean {
    if (this.effectiveInterval === undefined) return false;
    return tick.isFirstCall || tick.isLastItem || tick.deltaTime >= this.effectiveInterval;
  }

  /**
   * Which sinks are due, given seconds since the session started
   * (`undefined` on the first accepted tick, when no sink is due).
   */
  sinksDue(timePassed: number | undefined): SinkDecision {
    if (timePassed === undefined) {
      return { console: false, file: false };
    }
    return {
      console: this.sinks.console && timePassed >= this.config.consoleRefreshInterval,
      file: this.sinks.file && timePassed >= this.config.fileRefreshInterval,
    };
  }
}
