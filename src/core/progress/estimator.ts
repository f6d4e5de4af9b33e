/**
 * Throughput and ETA estimation from item and time deltas.
 *
 * Average speed is measured from the first accepted tick; current speed from the
 * previous accepted tick. The ETA uses the average. Divisions by zero yield
 * `undefined` (rendered as "?") rather than Infinity or NaN.
 *
 * @module progress/estimator
 */

import type { ProgressEstimate, Tick } from "./types.js";

/**
 * Share of the work done. With nothing to do the work counts as done.
 */
export function donePart(currentItem: number, totalItems: number): number {
  return totalItems > 0 ? currentItem / totalItems : 1;
}

function safeDivide(numerator: number, denominator: number): number | undefined {
  return denominator === 0 ? undefined : numerator / denominator;
}

export class Estimator {
  private startTime: number | undefined = undefined;
  private lastUpdateTime = 0;
  private lastItem = 0;

  /**
   * Forget all timing; the next accepted tick is a first call again.
   */
  reset(): void {
    this.startTime = undefined;
    this.lastUpdateTime = 0;
    this.lastItem = 0;
  }

  /**
   * Describe an update call against the last accepted tick.
   */
  buildTick(currentItem: number, now: number, totalItems: number): Tick {
    const isFirstCall = this.startTime === undefined;
    return {
      currentItem,
      now,
      deltaItems: isFirstCall ? 0 : currentItem - this.lastItem,
      deltaTime: isFirstCall ? 0 : now - this.lastUpdateTime,
      isFirstCall,
      isLastItem: currentItem >= totalItems,
    };
  }

  /**
   * Record an accepted tick and compute the estimates for it.
   */
  accept(tick: Tick, totalItems: number): ProgressEstimate {
    const done = donePart(tick.currentItem, totalItems);

    if (this.startTime === undefined) {
      this.startTime = tick.now;
      this.lastUpdateTime = tick.now;
      this.lastItem = tick.currentItem;
      return { donePart: done };
    }

    const timePassed = tick.now - this.startTime;
    const averageSpeed = safeDivide(tick.currentItem, timePassed);
    const currentSpeed = safeDivide(tick.currentItem - this.lastItem, tick.now - this.lastUpdateTime);
    const eta =
      averageSpeed === undefined ? undefined : safeDivide(totalItems - tick.currentItem, averageSpeed);

    this.lastUpdateTime = tick.now;
    this.lastItem = tick.currentItem;

    return { donePart: done, timePassed, averageSpeed, currentSpeed, eta };
  }
}
