/**
 * Test setup - runs before each test file.
 * Suppresses diagnostic logging during tests to reduce noise.
 *
 * Environment variables:
 * - TEST_VERBOSE: Set to "1" to keep log output
 */

import { logger } from "./core/logging/logger.js";

if (process.env.TEST_VERBOSE !== "1") {
  process.env.LOG_LEVEL = "silent";
  logger.level = "silent";
}
