#!/usr/bin/env node
import { setTimeout as sleep } from "node:timers/promises";
import { loadConfig } from "./config/schema.js";
import { createLogger, logger as rootLogger } from "./core/logging/logger.js";
import { CliSession } from "./io/cli.js";
import { formatTime } from "./lib/duration.js";

const logger = createLogger("main");

const DESCRIPTION =
  "Simulates a long-running job to show the toolkit at work: console progress with speed and ETA, " +
  "a progress file, and status messages written to the console and a log file. " +
  "Arguments are name:value pairs, for example: items:500 j:5 limit:30s v:sepi";

async function main() {
  try {
    const config = await loadConfig();
    rootLogger.level = config.logging.level;
    logger.level = config.logging.level;
    logger.debug({ event: "config_loaded", logFile: config.logFile, progressFile: config.progressFile });

    const cli = new CliSession({
      config: {
        ...config,
        scriptName: config.scriptName || "loopwatch-demo",
        scriptVersion: config.scriptVersion || "0.1.0",
        scriptDescription: config.scriptDescription || DESCRIPTION,
      },
    })
      .declareParameter({ name: "items", alias: "n", type: "integer", default: 200, description: "Items to process" })
      .declareParameter({
        name: "jitter",
        alias: "j",
        type: "integer",
        default: 20,
        description: "Upper bound of the random delay per item, in milliseconds",
      })
      .declareParameter({
        name: "limit",
        alias: "t",
        type: "duration",
        default: "1m",
        description: "Stop early once this much time has passed",
      });

    if (cli.helpRequested) {
      cli.displayHelp();
      return;
    }

    const items = cli.parameters.getInteger("items");
    const jitter = cli.parameters.getInteger("jitter");
    const limit = cli.parameters.getInteger("limit");
    const reportEvery = Math.max(1, Math.floor(items / 4));

    cli.start();
    cli.resetProgress({ totalItems: items });

    for (let item = 1; item <= items; item++) {
      await sleep(Math.random() * Math.max(0, jitter));
      cli.updateProgress(item);

      if (item % reportEvery === 0) {
        cli.info(`${item} of ${items} items processed`);
      }
      if (cli.getTimePassed() >= limit) {
        cli.error(`Time limit of ${formatTime(limit)} reached at item ${item}`);
        break;
      }
    }

    cli.close();
  } catch (error) {
    logger.fatal({
      event: "fatal_error",
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    console.error("Fatal error:", error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

await main();
