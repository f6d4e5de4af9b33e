/**
 * Duration formatting for progress tags and status messages.
 *
 * Breaks a number of seconds into weeks, days, hours, minutes and seconds and
 * renders them with one of four unit naming levels:
 * - 0: clock style ("01:02:03", days and weeks keep a "d"/"w" suffix)
 * - 1: single letters ("1h 2m 3s")
 * - 2: abbreviations ("1 hr 2 min 3 sec")
 * - 3: full words ("1 hour 2 minutes 3 seconds")
 *
 * Plural unit names are chosen by the last digit of the value: anything that does
 * not end in 1 is plural, so 11 and 21 read as singular.
 *
 * @module lib/duration
 */

/**
 * Unit naming level accepted by {@link formatTime}.
 */
export type UnitNamingLevel = 0 | 1 | 2 | 3;

interface UnitNames {
  second: [string, string];
  minute: [string, string];
  hour: [string, string];
  day: [string, string];
  week: [string, string];
}

const UNIT_NAMES: Record<UnitNamingLevel, UnitNames> = {
  0: { second: ["", ""], minute: ["", ""], hour: ["", ""], day: ["d", "d"], week: ["w", "w"] },
  1: { second: ["s", "s"], minute: ["m", "m"], hour: ["h", "h"], day: ["d", "d"], week: ["w", "w"] },
  2: {
    second: [" sec", " sec"],
    minute: [" min", " min"],
    hour: [" hr", " hr"],
    day: [" dy", " dy"],
    week: [" wk", " wk"],
  },
  3: {
    second: [" second", " seconds"],
    minute: [" minute", " minutes"],
    hour: [" hour", " hours"],
    day: [" day", " days"],
    week: [" week", " weeks"],
  },
};

const MINUTE = 60;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const WEEK = 7 * DAY;

/**
 * Round half away from zero to a number of decimal places.
 */
export function roundHalfAwayFromZero(value: number, precision = 0): number {
  const factor = 10 ** precision;
  const rounded = Math.round(Math.abs(value) * factor) / factor;
  return value < 0 ? -rounded : rounded;
}

function unitName(names: [string, string], value: number): string {
  return Math.floor(value) % 10 !== 1 ? names[1] : names[0];
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Convert a duration in seconds to a human-readable string.
 *
 * @param seconds - Duration in seconds; fractional and negative values are accepted
 * @param precision - Digits after the decimal point for the seconds field
 * @param stripEmptyUnits - Drop a negative seconds remainder when a larger unit follows
 * @param namingLevel - Unit naming level
 * @param twoDigitHms - Zero-pad seconds, minutes and hours when a larger unit is present
 *
 * @example
 * ```typescript
 * formatTime(3725); // "1 hour 2 minutes 5 seconds"
 * formatTime(65, 0, true, 1, true); // "1m 05s"
 * formatTime(3725, 0, true, 0); // "01:02:05"
 * ```
 */
export function formatTime(
  seconds: number,
  precision = 0,
  stripEmptyUnits = true,
  namingLevel: UnitNamingLevel = 3,
  twoDigitHms = false,
): string {
  const units = UNIT_NAMES[namingLevel];
  const total = roundHalfAwayFromZero(seconds, precision);
  const secondsPart = total % MINUTE;

  let result = "";
  let previousPresent = false;

  if (secondsPart >= 0 || !stripEmptyUnits || total < 1) {
    const fixed = (secondsPart === 0 ? 0 : secondsPart).toFixed(precision);
    if (namingLevel > 0) {
      const padding = twoDigitHms && secondsPart < 10 && total >= MINUTE ? "0" : "";
      const name = precision > 0 ? units.second[1] : unitName(units.second, secondsPart);
      result = `${padding}${fixed}${name}`;
    } else {
      const padding = (twoDigitHms || secondsPart < 10) && total >= MINUTE ? "0" : "";
      result = `${padding}${fixed}`;
    }
    previousPresent = true;
  }

  if (total >= MINUTE) {
    const minutes = Math.floor(total / MINUTE) % 60;
    previousPresent = true;
    const separator = namingLevel > 0 ? " " : ":";
    const value =
      namingLevel > 0
        ? `${twoDigitHms && total >= HOUR ? pad2(minutes) : minutes}${unitName(units.minute, minutes)}`
        : pad2(minutes);
    result = `${value}${separator}${result}`;
  }

  if (total >= HOUR) {
    const hours = Math.floor(total / HOUR) % 24;
    const separator = namingLevel > 0 ? " " : ":";
    const value =
      namingLevel > 0
        ? `${twoDigitHms && total >= DAY ? pad2(hours) : hours}${unitName(units.hour, hours)}`
        : pad2(hours);
    result = `${value}${previousPresent ? separator : ""}${result}`;
  }

  if (total >= DAY) {
    const days = Math.floor(total / DAY) % 7;
    result = `${days}${unitName(units.day, days)}${previousPresent ? " " : ""}${result}`;
  }

  if (total >= WEEK) {
    const weeks = Math.floor(total / WEEK);
    result = `${weeks}${unitName(units.week, weeks)}${previousPresent ? " " : ""}${result}`;
  }

  return result;
}
