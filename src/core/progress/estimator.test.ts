/**
 * Tests for speed and ETA estimation.
 */

import { describe, expect, test } from "vitest";
import { donePart, Estimator } from "./estimator.js";

function step(estimator: Estimator, item: number, now: number, total = 100) {
  return estimator.accept(estimator.buildTick(item, now, total), total);
}

describe("donePart", () => {
  test("divides current by total without clamping", () => {
    expect(donePart(5, 10)).toBe(0.5);
    expect(donePart(15, 10)).toBe(1.5);
  });

  test("counts an empty job as done", () => {
    expect(donePart(0, 0)).toBe(1);
    expect(donePart(3, 0)).toBe(1);
  });
});

describe("Estimator", () => {
  test("first tick has zero deltas and only the done part", () => {
    const estimator = new Estimator();
    const first = estimator.buildTick(10, 3, 100);

    expect(first).toEqual({
      currentItem: 10,
      now: 3,
      deltaItems: 0,
      deltaTime: 0,
      isFirstCall: true,
      isLastItem: false,
    });
    expect(estimator.accept(first, 100)).toEqual({ donePart: 0.1 });
  });

  test("measures deltas against the last accepted tick", () => {
    const estimator = new Estimator();
    step(estimator, 0, 10);

    const tick = estimator.buildTick(4, 12, 4);
    expect(tick.deltaItems).toBe(4);
    expect(tick.deltaTime).toBe(2);
    expect(tick.isFirstCall).toBe(false);
    expect(tick.isLastItem).toBe(true);
  });

  test("computes average speed, current speed and ETA", () => {
    const estimator = new Estimator();
    step(estimator, 0, 0);

    expect(step(estimator, 10, 2)).toEqual({
      donePart: 0.1,
      timePassed: 2,
      averageSpeed: 5,
      currentSpeed: 5,
      eta: 18,
    });

    const third = step(estimator, 14, 4);
    expect(third.timePassed).toBe(4);
    expect(third.averageSpeed).toBe(3.5);
    expect(third.currentSpeed).toBe(2);
    expect(third.eta).toBeCloseTo(86 / 3.5);
  });

  test("leaves values unknown instead of dividing by zero", () => {
    const sameInstant = new Estimator();
    step(sameInstant, 0, 1);
    const instant = step(sameInstant, 5, 1);
    expect(instant.timePassed).toBe(0);
    expect(instant.averageSpeed).toBeUndefined();
    expect(instant.currentSpeed).toBeUndefined();
    expect(instant.eta).toBeUndefined();

    const stalled = new Estimator();
    step(stalled, 0, 0);
    const idle = step(stalled, 0, 1);
    expect(idle.averageSpeed).toBe(0);
    expect(idle.currentSpeed).toBe(0);
    expect(idle.eta).toBeUndefined();
  });

  test("reset makes the next tick a first call", () => {
    const estimator = new Estimator();
    step(estimator, 0, 0);
    step(estimator, 5, 1);
    estimator.reset();

    expect(estimator.buildTick(6, 2, 100).isFirstCall).toBe(true);
    expect(step(estimator, 6, 2)).toEqual({ donePart: 0.06 });
  });
});
