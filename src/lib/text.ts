/**
 * Plain-text helpers for console output: word wrapping and alignment,
 * indentation, quote-aware splitting and loose boolean parsing.
 *
 * @module lib/text
 */

import { roundHalfAwayFromZero } from "./duration.js";

export type TextAlignment = "left" | "right" | "center" | "justify";

export interface TextAlignOptions {
  /** Alignment mode (default: "left") */
  align?: TextAlignment;

  /** Line width in characters (default: 76) */
  width?: number;

  /** Newline sequence used both to split paragraphs and to join lines (default: "\n") */
  newline?: string;

  /** Break words longer than the width (default: true) */
  cutWords?: boolean;

  /** Blank lines between paragraphs (default: 1) */
  paragraphSpacing?: number;

  /** Spaces added before the first line of each paragraph (left and justify only, default: 0) */
  paragraphIndent?: number;

  /** Justify the last line of each paragraph too (default: false) */
  justifyAllLines?: boolean;
}

// Placeholder for paragraph indents: not a space, so wrapping never breaks on it.
const INDENT_CHAR = "\0";

/**
 * Wrap a string at `width` characters, breaking on spaces.
 *
 * Existing newlines are kept and restart the line count. Words longer than the
 * width are split when `cut` is set, otherwise they overflow on a line of their own.
 */
export function wordWrap(text: string, width: number, newline = "\n", cut = true): string {
  const wrapped: string[] = [];

  for (const line of text.split(newline)) {
    let current: string | undefined;

    for (const word of line.split(" ")) {
      if (current !== undefined && current.length + 1 + word.length <= width) {
        current = `${current} ${word}`;
        continue;
      }

      if (current !== undefined) {
        wrapped.push(current);
      }

      let rest = word;
      while (cut && width > 0 && rest.length > width) {
        wrapped.push(rest.slice(0, width));
        rest = rest.slice(width);
      }
      current = rest;
    }

    wrapped.push(current ?? "");
  }

  return wrapped.join(newline);
}

function collapseSpaces(text: string): string {
  return text.replace(/ +/g, " ").trim();
}

function padBoth(line: string, width: number): string {
  const total = width - line.length;
  const left = Math.floor(total / 2);
  return " ".repeat(left) + line + " ".repeat(total - left);
}

/**
 * Distribute extra spaces between the words of a line so it fills `width`.
 */
export function justifyLine(line: string, width: number): string {
  const words = line.split(" ");
  const spacesToAdd = width - line.length;

  if (words.length < 2 || spacesToAdd <= 0) {
    return line;
  }

  const perGap = spacesToAdd / (words.length - 1);
  let pending = 0;

  for (let i = 0; i < words.length - 1; i++) {
    pending += perGap;
    const add = roundHalfAwayFromZero(pending);
    if (add > 0) {
      words[i] = `${words[i] ?? ""}${" ".repeat(add)}`;
      pending -= add;
    }
  }

  return words.join(" ");
}

/**
 * Align text to the left, right, centre, or justify it, wrapping at `width`.
 *
 * Runs of spaces are collapsed first. Each newline in the input starts a new
 * paragraph; paragraphs are separated by `paragraphSpacing` blank lines.
 *
 * @example
 * ```typescript
 * textAlign("one two three", { width: 7 }); // "one two\nthree"
 * textAlign("ab", { align: "right", width: 4 }); // "  ab"
 * ```
 */
export function textAlign(input: string, options: TextAlignOptions = {}): string {
  const {
    align = "left",
    width = 76,
    newline = "\n",
    cutWords = true,
    paragraphSpacing = 1,
    paragraphIndent = 0,
    justifyAllLines = false,
  } = options;

  const text = collapseSpaces(input);
  const paragraphBreak = newline.repeat(paragraphSpacing + 1);
  const indent = INDENT_CHAR.repeat(Math.max(0, paragraphIndent));

  switch (align) {
    case "left": {
      const indented = indent + text.split(newline).join(newline + indent);
      const wrapped = wordWrap(indented.split(newline).join(paragraphBreak), width, newline, cutWords);
      return wrapped.replaceAll(INDENT_CHAR, " ");
    }

    case "right":
    case "center": {
      const wrapped = wordWrap(text.split(newline).join(paragraphBreak), width, newline, cutWords);
      return wrapped
        .split(newline)
        .map((line) => {
          if (line.length === 0 || line.length >= width) return line;
          return align === "right" ? line.padStart(width) : padBoth(line, width);
        })
        .join(newline);
    }

    case "justify": {
      const paragraphs = text.split(newline).map((paragraph) => {
        const lines = wordWrap(indent + paragraph.trim(), width, newline, cutWords).split(newline);
        const last = justifyAllLines ? lines.length : lines.length - 1;

        for (let i = 0; i < last; i++) {
          lines[i] = justifyLine(lines[i] ?? "", width);
        }

        return lines.join(newline).replaceAll(INDENT_CHAR, " ");
      });

      return paragraphs.join(paragraphBreak);
    }
  }
}

/**
 * Indent (positive `levels`) or un-indent (negative `levels`) every line.
 *
 * Un-indenting removes at most `-levels` leading copies of `indent` per line and
 * leaves lines with fewer copies as far left as they go.
 */
export function textIndent(text: string, indent: string, levels: number, newline = "\n"): string {
  if (levels === 0 || indent.length === 0) return text;

  const lines = text.split(newline);

  if (levels > 0) {
    const prefix = indent.repeat(levels);
    return lines.map((line) => prefix + line).join(newline);
  }

  return lines
    .map((line) => {
      let removed = 0;
      while (removed < -levels && line.startsWith(indent, removed * indent.length)) {
        removed++;
      }
      return line.slice(removed * indent.length);
    })
    .join(newline);
}

/**
 * Split a string on a delimiter, keeping delimiters inside single or double quotes.
 *
 * A word that starts with a quote has that quote character stripped from both ends.
 * Quotes of the other kind inside a quoted word are literal.
 *
 * @example
 * ```typescript
 * explodeString(`a "b c" d`); // ["a", "b c", "d"]
 * explodeString("x+'y+z'", "+"); // ["x", "y+z"]
 * ```
 */
export function explodeString(input: string, delimiter = " "): string[] {
  const words: string[] = [];
  let inSingle = false;
  let inDouble = false;
  let word = "";

  for (let i = 0; i < input.length; i++) {
    let char = input.charAt(i);
    let endOfWord = false;

    if (char === "'" && !inDouble) {
      inSingle = !inSingle;
    } else if (char === '"' && !inSingle) {
      inDouble = !inDouble;
    } else if (char === delimiter && !inSingle && !inDouble) {
      endOfWord = true;
      char = "";
    }

    word += char;

    if (endOfWord || i === input.length - 1) {
      words.push(stripQuotes(word));
      word = "";
    }
  }

  return words;
}

function stripQuotes(word: string): string {
  const quote = word.charAt(0);
  if (quote !== "'" && quote !== '"') return word;

  let start = 0;
  let end = word.length;
  while (start < end && word.charAt(start) === quote) start++;
  while (end > start && word.charAt(end - 1) === quote) end--;
  return word.slice(start, end);
}

const NUMERIC_PATTERN = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;

/**
 * Parse a loose boolean: y/yes/t/true and non-zero numbers are true,
 * n/no/f/false, zero and anything else are false.
 */
export function strToBool(value: string): boolean {
  const normalized = value.toLowerCase();

  if (["y", "yes", "t", "true"].includes(normalized)) return true;
  if (["n", "no", "f", "false"].includes(normalized)) return false;
  if (NUMERIC_PATTERN.test(normalized)) return Number.parseFloat(normalized) !== 0;

  return false;
}
