/**
 * Template expansion for progress output.
 *
 * Templates hold `%tag%` placeholders from the closed tag set plus `%bar%`.
 * Tags are substituted in one pass, so a value that itself looks like a tag is
 * never expanded again, and placeholders outside the set pass through untouched.
 * The bar is sized last, against the line it sits on.
 *
 * @module progress/renderer
 */

import { BAR_PLACEHOLDER, PROGRESS_TAGS, type ProgressTag, type TagValues } from "./types.js";

/**
 * Progress bar characters.
 */
export const barChars = {
  filled: "#",
  empty: "-",
} as const;

const TAG_PATTERN = /%([a-z_]+)%/g;
const KNOWN_TAGS: ReadonlySet<string> = new Set(PROGRESS_TAGS);

function isProgressTag(name: string): name is ProgressTag {
  return KNOWN_TAGS.has(name);
}

export interface RenderOptions {
  /** Right-pad bar-less output with spaces to the full width (console only) */
  pad?: boolean;
}

/**
 * Build a bar of exactly `length` characters with `round(donePart * length)` filled.
 * The filled count is kept within the bar, so overshoot renders a full bar.
 *
 * @example
 * ```typescript
 * createProgressBar(0.5, 10); // "#####-----"
 * createProgressBar(0.25, 0); // ""
 * ```
 */
export function createProgressBar(donePart: number, length: number): string {
  if (length <= 0) return "";
  const filled = Math.min(length, Math.max(0, Math.round(donePart * length)));
  return barChars.filled.repeat(filled) + barChars.empty.repeat(length - filled);
}

/**
 * Substitute every known tag except `%bar%`.
 */
export function substituteTags(template: string, tags: TagValues): string {
  return template.replace(TAG_PATTERN, (placeholder: string, name: string) =>
    isProgressTag(name) ? tags[name] : placeholder,
  );
}

/**
 * Length available for the bar: the width minus the line holding the first
 * `%bar%` (placeholder included) minus the placeholder once more.
 */
export function barLength(text: string, maxWidth: number): number {
  const barAt = text.indexOf(BAR_PLACEHOLDER);
  const lineStart = text.lastIndexOf("\n", barAt) + 1;
  const newlineAfter = text.indexOf("\n", barAt);
  const lineEnd = newlineAfter === -1 ? text.length : newlineAfter;
  return maxWidth - (lineEnd - lineStart) - BAR_PLACEHOLDER.length;
}

/**
 * Expand a progress template into the text written to a sink.
 *
 * @example
 * ```typescript
 * renderTemplate("%percent% [%bar%]", tags, 0.5, 26); // "50.0% [####----]" for percent "50.0%"
 * ```
 */
export function renderTemplate(
  template: string,
  tags: TagValues,
  donePart: number,
  maxWidth: number,
  options: RenderOptions = {},
): string {
  const text = substituteTags(template, tags);

  if (text.includes(BAR_PLACEHOLDER)) {
    const bar = createProgressBar(donePart, barLength(text, maxWidth));
    return text.replaceAll(BAR_PLACEHOLDER, bar);
  }

  return options.pad ? text.padEnd(maxWidth, " ") : text;
}
