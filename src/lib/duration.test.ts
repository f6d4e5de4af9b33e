/**
 * Tests for the duration formatter.
 */

import { describe, expect, test } from "vitest";
import { formatTime, roundHalfAwayFromZero } from "./duration.js";

describe("roundHalfAwayFromZero", () => {
  test("rounds halves away from zero", () => {
    expect(roundHalfAwayFromZero(2.5)).toBe(3);
    expect(roundHalfAwayFromZero(-2.5)).toBe(-3);
    expect(roundHalfAwayFromZero(2.4)).toBe(2);
  });

  test("respects precision", () => {
    expect(roundHalfAwayFromZero(1.25, 1)).toBe(1.3);
    expect(roundHalfAwayFromZero(-1.25, 1)).toBe(-1.3);
  });
});

describe("formatTime", () => {
  test("formats seconds with full unit names by default", () => {
    expect(formatTime(0)).toBe("0 seconds");
    expect(formatTime(1)).toBe("1 second");
    expect(formatTime(42)).toBe("42 seconds");
  });

  test("keeps every lower unit once a higher unit is present", () => {
    expect(formatTime(3725)).toBe("1 hour 2 minutes 5 seconds");
    expect(formatTime(3600)).toBe("1 hour 0 minutes 0 seconds");
    expect(formatTime(604800)).toBe("1 week 0 days 0 hours 0 minutes 0 seconds");
  });

  test("pluralizes by last digit, so 11 and 21 read as singular", () => {
    expect(formatTime(11)).toBe("11 second");
    expect(formatTime(21, 0, true, 2)).toBe("21 sec");
    expect(formatTime(12, 0, true, 2)).toBe("12 sec");
    expect(formatTime(660)).toBe("11 minute 0 seconds");
  });

  test("uses single-letter units at naming level 1", () => {
    expect(formatTime(3725, 0, true, 1)).toBe("1h 2m 5s");
    expect(formatTime(90061, 0, true, 1)).toBe("1d 1h 1m 1s");
  });

  test("zero-pads lower fields when a higher unit is present", () => {
    expect(formatTime(5, 0, true, 1, true)).toBe("5s");
    expect(formatTime(65, 0, true, 1, true)).toBe("1m 05s");
    expect(formatTime(3725, 0, true, 1, true)).toBe("1h 02m 05s");
    expect(formatTime(90061, 0, true, 1, true)).toBe("1d 01h 01m 01s");
  });

  test("renders clock style at naming level 0", () => {
    expect(formatTime(7, 0, true, 0)).toBe("7");
    expect(formatTime(65, 0, true, 0)).toBe("01:05");
    expect(formatTime(3725, 0, true, 0)).toBe("01:02:05");
    expect(formatTime(90061, 0, true, 0)).toBe("1d 01:01:01");
  });

  test("keeps fractional seconds and always pluralizes them", () => {
    expect(formatTime(2.5, 1, true, 1)).toBe("2.5s");
    expect(formatTime(1.04, 1, true, 3)).toBe("1.0 seconds");
    expect(formatTime(61.25, 1, true, 1, true)).toBe("1m 01.3s");
  });

  test("does not throw on negative input", () => {
    expect(formatTime(-5, 0, true, 1)).toBe("-5s");
    expect(formatTime(-0.4, 0, true, 1)).toBe("0s");
  });
});
