/**
 * loopwatch: toolkit for command-line scripts that run long loops.
 *
 * @module loopwatch
 */

export { type Config, type ConfigInput, configSchema, loadConfig, parseConfig } from "./config/schema.js";
export { createLogger, type Logger, logger } from "./core/logging/logger.js";
export * from "./core/progress/index.js";
export {
  type ArrayParameter,
  type BooleanParameter,
  type DurationParameter,
  type IntegerParameter,
  type ParameterDeclaration,
  ParameterError,
  ParameterSet,
  type ParameterType,
  type ParameterValue,
  parseDurationSeconds,
  parseLeadingInteger,
  type StringParameter,
  tokenizeArguments,
} from "./io/arguments.js";
export { CliSession, type CliSessionOptions, type MessageType } from "./io/cli.js";
export { describeParameterType, type HelpOptions, renderHelp } from "./io/help.js";
export { LOG_SEPARATOR, MessageLog, type MessageLogOptions } from "./io/message-log.js";
export { formatTime, roundHalfAwayFromZero, type UnitNamingLevel } from "./lib/duration.js";
export {
  explodeString,
  justifyLine,
  strToBool,
  type TextAlignment,
  type TextAlignOptions,
  textAlign,
  textIndent,
  wordWrap,
} from "./lib/text.js";
export { formatTimestamp } from "./lib/timestamp.js";
