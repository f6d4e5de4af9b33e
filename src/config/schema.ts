import { readFile } from "node:fs/promises";
import { z } from "zod";
import { createLogger } from "../core/logging/logger.js";
import { progressConfigSchema } from "../core/progress/config.js";

const logger = createLogger("config");

const verbosityFlags = z.string().regex(/^(-|[seip]*)$/, "verbosity flags are s, e, i, p or -");
const loggingFlags = z.string().regex(/^(-|[seipo]*)$/, "logging flags are s, e, i, p, o or -");

export const configSchema = z.object({
  scriptName: z.string().default(""),
  scriptVersion: z.string().default(""),
  scriptDescription: z.string().default(""),
  maxOutputWidth: z.number().int().positive().default(80),

  verbosityDefault: verbosityFlags.default("sep"),
  loggingDefault: loggingFlags.default("seio"),

  logFile: z.string().min(1).optional(),
  progressFile: z.string().min(1).optional(),

  progress: progressConfigSchema.default({}),

  status: z
    .object({
      startMessage: z.string().default("Started at %time_current%"),
      endMessage: z.string().default("Finished at %time_current% (+%time_passed%)"),
      // "rfc2822" or a luxon format string
      timeFormat: z.string().min(1).default("rfc2822"),
      timePrecision: z.number().int().nonnegative().default(3),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
    })
    .default({}),
});

/**
 * Validated toolkit options, every default filled in.
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Toolkit options as written in a config file or passed in code.
 */
export type ConfigInput = z.input<typeof configSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isRecord(value) ? value : {};
}

// The progress line follows the toolkit width unless its own section sets one.
function inheritOutputWidth(input: unknown): unknown {
  if (!isRecord(input) || input.maxOutputWidth === undefined) return input;
  if (input.progress !== undefined && !isRecord(input.progress)) return input;

  const progress = section(input, "progress");
  if (progress.maxOutputWidth !== undefined) return input;
  return { ...input, progress: { ...progress, maxOutputWidth: input.maxOutputWidth } };
}

/**
 * Validate toolkit options. A top-level `maxOutputWidth` also sets
 * `progress.maxOutputWidth` when that is not given.
 *
 * @throws Error prefixed "Failed to load configuration:" when validation fails
 */
export function parseConfig(input: unknown): Config {
  const result = configSchema.safeParse(inheritOutputWidth(input));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new Error(`Failed to load configuration: ${issues.join("; ")}`);
  }
  return result.data;
}

async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  try {
    const parsed: unknown = JSON.parse(await readFile(configPath, "utf8"));
    return isRecord(parsed) ? parsed : {};
  } catch (error) {
    // Missing or unreadable file: run on defaults and environment
    logger.debug({ event: "config_file_skipped", path: configPath, err: error });
    return {};
  }
}

/**
 * Load configuration from file and environment variables.
 *
 * Priority (higher overrides lower):
 * 1. Environment variables
 * 2. Config file specified by path parameter
 * 3. Config file at CONFIG_FILE env var
 * 4. ./loopwatch.json
 * 5. Schema defaults
 */
export async function loadConfig(path?: string, env: NodeJS.ProcessEnv = process.env): Promise<Config> {
  const configPath = path || env.CONFIG_FILE || "./loopwatch.json";
  const fileConfig = await readConfigFile(configPath);

  const envConfig: Record<string, unknown> = {};

  if (env.LOOPWATCH_LOG_FILE) {
    envConfig.logFile = env.LOOPWATCH_LOG_FILE;
  }

  if (env.LOOPWATCH_PROGRESS_FILE) {
    envConfig.progressFile = env.LOOPWATCH_PROGRESS_FILE;
  }

  // The width applies to help output and to the progress line alike
  if (env.LOOPWATCH_MAX_WIDTH) {
    const width = Number.parseInt(env.LOOPWATCH_MAX_WIDTH, 10);
    envConfig.maxOutputWidth = width;
    envConfig.progress = { ...section(fileConfig, "progress"), maxOutputWidth: width };
  }

  if (env.LOG_LEVEL) {
    envConfig.logging = { ...section(fileConfig, "logging"), level: env.LOG_LEVEL };
  }

  return parseConfig({ ...fileConfig, ...envConfig });
}
