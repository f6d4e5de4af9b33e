import { DateTime } from "luxon";
import { describe, expect, test } from "vitest";
import { formatTimestamp } from "./timestamp.js";

describe("formatTimestamp", () => {
  const date = DateTime.fromISO("2026-03-04T05:06:07Z", { zone: "utc" });

  test("defaults to RFC 2822", () => {
    expect(formatTimestamp(date)).toBe("Wed, 04 Mar 2026 05:06:07 +0000");
  });

  test("accepts luxon format strings", () => {
    expect(formatTimestamp(date, "yyyy-LL-dd HH:mm:ss")).toBe("2026-03-04 05:06:07");
  });
});
