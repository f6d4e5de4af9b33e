/**
 * Loop progress reporting to the console and a progress file.
 *
 * @example
 * ```typescript
 * import { ProgressEngine, StreamConsoleSink } from "./core/progress/index.js";
 *
 * const progress = new ProgressEngine({ console: new StreamConsoleSink() });
 * progress.resetProgress({ totalItems: items.length });
 * items.forEach((item, i) => {
 *   handle(item);
 *   progress.updateProgress(i + 1);
 * });
 * progress.endSession();
 * ```
 *
 * @module progress
 */

export {
  DEFAULT_CONSOLE_FORMAT,
  DEFAULT_FILE_FORMAT,
  type ProgressConfig,
  type ProgressConfigInput,
  parseProgressConfig,
  progressConfigSchema,
} from "./config.js";
export { ProgressEngine, type ProgressEngineOptions } from "./engine.js";
export { ConfigurationError, type ConfigurationIssue, type SinkKind, SinkWriteError } from "./errors.js";
export { donePart, Estimator } from "./estimator.js";
export { barLength, createProgressBar, renderTemplate, substituteTags } from "./renderer.js";
export { type EnabledSinks, effectiveRefreshInterval, RefreshScheduler } from "./scheduler.js";
export { eraseSequence, StreamConsoleSink, TextFileSink } from "./sinks.js";
export { buildTagValues, initialTagValues } from "./tags.js";
export * from "./types.js";
