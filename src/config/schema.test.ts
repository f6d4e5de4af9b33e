import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { loadConfig, parseConfig } from "./schema.js";

let tempDir: string;
let configPath: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "config-test-"));
  configPath = join(tempDir, "loopwatch.json");
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe("parseConfig", () => {
  test("fills in defaults", () => {
    const config = parseConfig({});

    expect(config.maxOutputWidth).toBe(80);
    expect(config.verbosityDefault).toBe("sep");
    expect(config.loggingDefault).toBe("seio");
    expect(config.logFile).toBeUndefined();
    expect(config.progress.consoleRefreshInterval).toBe(0.5);
    expect(config.status).toEqual({
      startMessage: "Started at %time_current%",
      endMessage: "Finished at %time_current% (+%time_passed%)",
      timeFormat: "rfc2822",
      timePrecision: 3,
    });
    expect(config.logging.level).toBe("info");
  });

  test("rejects unknown flags", () => {
    expect(() => parseConfig({ verbosityDefault: "sx" })).toThrow(
      "Failed to load configuration: verbosityDefault: verbosity flags are s, e, i, p or -",
    );
    expect(parseConfig({ loggingDefault: "-" }).loggingDefault).toBe("-");
  });

  test("applies the top-level width to the progress line", () => {
    expect(parseConfig({ maxOutputWidth: 60 }).progress.maxOutputWidth).toBe(60);
    expect(parseConfig({ maxOutputWidth: 60, progress: { totalItems: 5 } }).progress).toMatchObject({
      maxOutputWidth: 60,
      totalItems: 5,
    });
  });

  test("keeps a progress width set explicitly", () => {
    const config = parseConfig({ maxOutputWidth: 60, progress: { maxOutputWidth: 100 } });

    expect(config.maxOutputWidth).toBe(60);
    expect(config.progress.maxOutputWidth).toBe(100);
  });

  test("validates the nested progress section", () => {
    expect(() => parseConfig({ progress: { totalItems: -1 } })).toThrow(/progress\.totalItems/);
  });
});

describe("loadConfig", () => {
  test("loads config from file", async () => {
    await writeFile(
      configPath,
      JSON.stringify({ scriptName: "import", logFile: "import.log", progress: { fileRefreshInterval: 2 } }),
    );

    const config = await loadConfig(configPath, {});

    expect(config.scriptName).toBe("import");
    expect(config.logFile).toBe("import.log");
    expect(config.progress.fileRefreshInterval).toBe(2);
    expect(config.progress.consoleRefreshInterval).toBe(0.5);
  });

  test("uses defaults when the file is missing or invalid", async () => {
    expect((await loadConfig(join(tempDir, "missing.json"), {})).scriptName).toBe("");

    await writeFile(configPath, "{ not json");
    expect((await loadConfig(configPath, {})).maxOutputWidth).toBe(80);
  });

  test("finds the file through CONFIG_FILE", async () => {
    await writeFile(configPath, JSON.stringify({ scriptVersion: "2.0" }));

    const config = await loadConfig(undefined, { CONFIG_FILE: configPath });

    expect(config.scriptVersion).toBe("2.0");
  });

  test("environment variables override the file", async () => {
    await writeFile(
      configPath,
      JSON.stringify({ progressFile: "from-file.progress", progress: { totalItems: 7 }, logging: { level: "warn" } }),
    );

    const config = await loadConfig(configPath, {
      LOOPWATCH_PROGRESS_FILE: "from-env.progress",
      LOOPWATCH_LOG_FILE: "from-env.log",
      LOOPWATCH_MAX_WIDTH: "100",
      LOG_LEVEL: "debug",
    });

    expect(config.progressFile).toBe("from-env.progress");
    expect(config.logFile).toBe("from-env.log");
    expect(config.maxOutputWidth).toBe(100);
    expect(config.progress.maxOutputWidth).toBe(100);
    expect(config.progress.totalItems).toBe(7);
    expect(config.logging.level).toBe("debug");
  });

  test("reports invalid values", async () => {
    await expect(loadConfig(configPath, { LOOPWATCH_MAX_WIDTH: "wide" })).rejects.toThrow(
      "Failed to load configuration:",
    );
  });
});
