/**
 * Tests for the text helpers.
 */

import { describe, expect, test } from "vitest";
import { explodeString, justifyLine, strToBool, textAlign, textIndent, wordWrap } from "./text.js";

describe("wordWrap", () => {
  const longWord = `w${"o".repeat(12)}rd.`;

  test("breaks lines on spaces", () => {
    expect(wordWrap("The quick brown fox", 10)).toBe("The quick\nbrown fox");
  });

  test("cuts words longer than the width", () => {
    expect(wordWrap(`A very long ${longWord}`, 8)).toBe("A very\nlong\nwooooooo\nooooord.");
  });

  test("lets long words overflow when cutting is off", () => {
    expect(wordWrap(`A very long ${longWord}`, 8, "\n", false)).toBe(`A very\nlong\n${longWord}`);
  });

  test("keeps existing newlines", () => {
    expect(wordWrap("ab cd\n\nef", 10)).toBe("ab cd\n\nef");
  });
});

describe("justifyLine", () => {
  test("distributes extra spaces across gaps", () => {
    expect(justifyLine("a b c", 8)).toBe("a   b  c");
    expect(justifyLine("aa bb cc", 10)).toBe("aa  bb  cc");
  });

  test("leaves single words and full lines alone", () => {
    expect(justifyLine("word", 10)).toBe("word");
    expect(justifyLine("full line", 9)).toBe("full line");
  });
});

describe("textAlign", () => {
  test("wraps left-aligned text", () => {
    expect(textAlign("one two three", { width: 7 })).toBe("one two\nthree");
  });

  test("collapses runs of spaces", () => {
    expect(textAlign("  a   b  ", { width: 10 })).toBe("a b");
  });

  test("separates paragraphs with blank lines", () => {
    expect(textAlign("first para\nsecond", { width: 20 })).toBe("first para\n\nsecond");
    expect(textAlign("first\nsecond", { width: 20, paragraphSpacing: 0 })).toBe("first\nsecond");
  });

  test("indents the first line of each paragraph", () => {
    expect(textAlign("abc def\nghi", { width: 10, paragraphIndent: 2 })).toBe("  abc def\n\n  ghi");
  });

  test("aligns right", () => {
    expect(textAlign("ab", { align: "right", width: 4 })).toBe("  ab");
  });

  test("centers with the odd space on the right", () => {
    expect(textAlign("ab", { align: "center", width: 5 })).toBe(" ab  ");
  });

  test("justifies all but the last line of a paragraph", () => {
    expect(textAlign("aa bb cc dd", { align: "justify", width: 10 })).toBe("aa  bb  cc\ndd");
  });

  test("justifies the last line when asked to", () => {
    expect(textAlign("aa bb cc dd ee", { align: "justify", width: 10, justifyAllLines: true })).toBe(
      "aa  bb  cc\ndd      ee",
    );
  });
});

describe("textIndent", () => {
  test("indents every line", () => {
    expect(textIndent("a\nb", "  ", 1)).toBe("  a\n  b");
    expect(textIndent("a", "\t", 2)).toBe("\t\ta");
  });

  test("removes at most the requested indentation", () => {
    expect(textIndent("    a\n  b\nc", "  ", -1)).toBe("  a\nb\nc");
    expect(textIndent("    a", "  ", -5)).toBe("a");
  });

  test("leaves text alone at level zero", () => {
    expect(textIndent("  a", "  ", 0)).toBe("  a");
  });
});

describe("explodeString", () => {
  test("splits on the delimiter", () => {
    expect(explodeString("a b c")).toEqual(["a", "b", "c"]);
  });

  test("keeps quoted delimiters and strips the quotes", () => {
    expect(explodeString(`a "b c" d`)).toEqual(["a", "b c", "d"]);
    expect(explodeString("x+'y+z'", "+")).toEqual(["x", "y+z"]);
  });

  test("treats the other quote kind as literal inside quotes", () => {
    expect(explodeString(`"it's here" now`)).toEqual(["it's here", "now"]);
  });

  test("keeps empty words between adjacent delimiters", () => {
    expect(explodeString("a++b", "+")).toEqual(["a", "", "b"]);
  });

  test("returns no words for empty input", () => {
    expect(explodeString("")).toEqual([]);
  });
});

describe("strToBool", () => {
  test("accepts yes/true words", () => {
    expect(strToBool("Yes")).toBe(true);
    expect(strToBool("t")).toBe(true);
    expect(strToBool("TRUE")).toBe(true);
  });

  test("accepts no/false words", () => {
    expect(strToBool("no")).toBe(false);
    expect(strToBool("F")).toBe(false);
  });

  test("treats numbers by value", () => {
    expect(strToBool("2")).toBe(true);
    expect(strToBool("-0.5")).toBe(true);
    expect(strToBool("0.0")).toBe(false);
  });

  test("treats anything else as false", () => {
    expect(strToBool("maybe")).toBe(false);
    expect(strToBool("")).toBe(false);
  });
});
