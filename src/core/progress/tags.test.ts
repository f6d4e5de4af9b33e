/**
 * Tests for tag value mapping.
 */

import { describe, expect, test } from "vitest";
import { parseProgressConfig } from "./config.js";
import { buildTagValues, initialTagValues } from "./tags.js";

const config = parseProgressConfig({ totalItems: 100, operationTitle: "import" });

describe("initialTagValues", () => {
  test("starts counters at zero with measured values unknown", () => {
    expect(initialTagValues(config, "|")).toEqual({
      percent: "0.0%",
      eta: "?",
      item: "0",
      total: "100",
      speed_avg: "?",
      speed_cur: "?",
      time_passed: "?",
      rotator: "|",
      title: "import",
    });
  });
});

describe("buildTagValues", () => {
  test("formats every measured value", () => {
    const values = buildTagValues(
      config,
      50,
      { donePart: 0.5, timePassed: 10, averageSpeed: 5, currentSpeed: 4, eta: 65 },
      "/",
    );

    expect(values).toEqual({
      percent: "50.0%",
      eta: "1m 05s",
      item: "50",
      total: "100",
      speed_avg: "5.00/s",
      speed_cur: "4.00/s",
      time_passed: "10s",
      rotator: "/",
      title: "import",
    });
  });

  test("renders unknown values as a question mark", () => {
    const values = buildTagValues(config, 10, { donePart: 0.1 }, "|");

    expect(values.eta).toBe("?");
    expect(values.speed_avg).toBe("?");
    expect(values.speed_cur).toBe("?");
    expect(values.time_passed).toBe("?");
    expect(values.percent).toBe("10.0%");
  });

  test("does not clamp overshoot", () => {
    expect(buildTagValues(config, 150, { donePart: 1.5 }, "|").percent).toBe("150.0%");
  });

  test("honours configured precisions", () => {
    const precise = parseProgressConfig({ totalItems: 3, percentPrecision: 2, speedPrecision: 0, timePrecision: 1 });
    const values = buildTagValues(precise, 1, { donePart: 1 / 3, timePassed: 2.5, averageSpeed: 0.4 }, "|");

    expect(values.percent).toBe("33.33%");
    expect(values.speed_avg).toBe("0/s");
    expect(values.time_passed).toBe("2.5s");
  });
});
