/**
 * Tests for the message log file.
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DateTime } from "luxon";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { MessageLog } from "./message-log.js";

const startedAt = DateTime.fromISO("2026-03-04T05:06:07Z", { zone: "utc" });
const finishedAt = DateTime.fromISO("2026-03-04T05:06:20Z", { zone: "utc" });

let dir: string;
let path: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "loopwatch-log-"));
  path = join(dir, "job.log");
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function createLog(overwrite: boolean) {
  let seconds = 100;
  const dates = [startedAt, finishedAt];
  const log = new MessageLog({
    path,
    overwrite,
    clock: () => seconds,
    now: () => dates.shift() ?? finishedAt,
  });
  return {
    log,
    advance: (by: number) => {
      seconds += by;
    },
  };
}

describe("MessageLog", () => {
  test("writes a header, timed messages and a footer", () => {
    const { log, advance } = createLog(true);

    log.write("Started");
    advance(1.5);
    log.write("Halfway");
    advance(11);
    log.close();

    expect(readFileSync(path, "utf8")).toBe(
      [
        "[Log started at Wed, 04 Mar 2026 05:06:07 +0000]",
        "[+0.000s] Started",
        "[+1.500s] Halfway",
        "[Log finished at Wed, 04 Mar 2026 05:06:20 +0000 (+ 12.500s)]",
        "",
      ].join("\n"),
    );
  });

  test("does not create the file before the first message", () => {
    const { log } = createLog(false);

    expect(log.isOpen).toBe(false);
    log.close();

    expect(() => readFileSync(path, "utf8")).toThrow();
  });

  test("separates appended runs from earlier content", () => {
    writeFileSync(path, "earlier run\n");
    const { log } = createLog(false);

    log.write("again");
    log.close();

    expect(readFileSync(path, "utf8")).toBe(
      "earlier run\n\n---\n\n[Log started at Wed, 04 Mar 2026 05:06:07 +0000]\n[+0.000s] again\n" +
        "[Log finished at Wed, 04 Mar 2026 05:06:20 +0000 (+ 0.000s)]\n",
    );
  });

  test("replaces earlier content in overwrite mode", () => {
    writeFileSync(path, "earlier run\n");
    const { log } = createLog(true);

    log.write("fresh");

    expect(readFileSync(path, "utf8")).toBe("[Log started at Wed, 04 Mar 2026 05:06:07 +0000]\n[+0.000s] fresh\n");
    log.close();
  });

  test("warns once and stays disabled when the file cannot be opened", () => {
    const warn = vi.fn();
    const log = new MessageLog({ path: join(dir, "missing", "job.log"), logger: { warn } });

    log.write("one");
    log.write("two");
    log.close();

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ event: "message_log_open_failed" }),
      `Failed to open log file '${join(dir, "missing", "job.log")}' for writing`,
    );
    expect(log.isOpen).toBe(false);
  });
});
