/**
 * Progress session configuration: zod schema, defaults and validation.
 *
 * @module progress/config
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_CONSOLE_FORMAT = "%percent% done [%bar%] left: %eta% %rotator%";

export const DEFAULT_FILE_FORMAT = [
  "%title%",
  "",
  "%item%/%total% [%bar%] %percent%",
  "",
  "Speed (cur):  %speed_cur%",
  "Speed (avg):  %speed_avg%",
  "Time elapsed:\t%time_passed%",
  "Time left:    ~ %eta%",
].join("\n");

const precision = z.number().int().nonnegative();
const interval = z.number().finite().nonnegative();

export const progressConfigSchema = z.object({
  totalItems: z.number().int().nonnegative().default(0),
  consoleRefreshInterval: interval.default(0.5),
  fileRefreshInterval: interval.default(5),
  consoleFormat: z.string().default(DEFAULT_CONSOLE_FORMAT),
  fileFormat: z.string().default(DEFAULT_FILE_FORMAT),
  maxOutputWidth: z.number().int().positive().default(80),
  rotatorSequence: z
    .array(z.string().refine((glyph) => [...glyph].length === 1, "rotator glyphs must be single characters"))
    .min(1, "rotator sequence must not be empty")
    .default(() => ["|", "/", "-", "\\"]),
  percentPrecision: precision.default(1),
  speedPrecision: precision.default(2),
  timePrecision: precision.default(0),
  operationTitle: z.string().default(""),
});

/**
 * Validated, fully defaulted progress configuration.
 */
export type ProgressConfig = z.infer<typeof progressConfigSchema>;

/**
 * Progress configuration as callers may write it, every field optional.
 */
export type ProgressConfigInput = z.input<typeof progressConfigSchema>;

/**
 * Validate a progress configuration and fill in defaults.
 *
 * @throws ConfigurationError listing every failed rule
 */
export function parseProgressConfig(input: ProgressConfigInput = {}): ProgressConfig {
  const result = progressConfigSchema.safeParse(input);
  if (!result.success) {
    throw ConfigurationError.fromZodIssues(result.error.issues);
  }
  return result.data;
}
