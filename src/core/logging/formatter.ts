/**
 * Custom log formatters for compact, readable diagnostic output.
 *
 * Three formats available:
 * - compact: Single line with all info
 * - hybrid: Event name on first line, details indented below (2 lines per log)
 * - minimal: Ultra-compact with minimal metadata
 *
 * Diagnostics go to stderr by default; stdout carries the progress line and
 * user-facing messages.
 */

import { z } from "zod";

export const LOG_FORMATS = ["compact", "hybrid", "minimal"] as const;

export type LogFormat = (typeof LOG_FORMATS)[number];

const logObjectSchema = z
  .object({
    level: z.number(),
    time: z.union([z.number(), z.string()]),
    msg: z.string().optional(),
    component: z.string().optional(),
    event: z.string().optional(),
  })
  .passthrough();

export type LogObject = z.infer<typeof logObjectSchema>;

// ANSI color codes
export const colors = {
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
  blue: "\x1b[34m",
  red: "\x1b[31m",
  reset: "\x1b[0m",
} as const;

const levelNames: Record<number, string> = {
  10: "TRACE",
  20: "DEBUG",
  30: "INFO",
  40: "WARN",
  50: "ERROR",
  60: "FATAL",
};

function formatClock(time: number | string): string {
  return new Date(time).toISOString().substring(11, 23); // HH:MM:SS.mmm
}

function formatClockMinimal(time: number | string): string {
  return new Date(time).toISOString().substring(14, 23); // MM:SS.mmm
}

function formatValue(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

function formatPairs(data: Record<string, unknown>): string[] {
  return Object.entries(data).map(
    ([key, value]) => `${colors.yellow}${key}${colors.reset}=${colors.green}${formatValue(value)}${colors.reset}`,
  );
}

function splitLog(log: LogObject) {
  const { level, time, msg, component, event, ...data } = log;
  return {
    level: levelNames[level] ?? "UNKNOWN",
    time,
    component: component ?? "app",
    title: event ?? msg ?? "",
    data,
  };
}

/**
 * Format log in compact single-line style.
 * Format: [dim]TIME LEVEL [component][/dim] [cyan]event[/cyan] [yellow]key[/yellow]=[green]value[/green] ...
 */
export function formatCompact(log: LogObject): string {
  const { level, time, component, title, data } = splitLog(log);
  const pairs = formatPairs(data);
  const details = pairs.length > 0 ? ` ${pairs.join(" ")}` : "";

  return `${colors.dim}${formatClock(time)} ${level.padEnd(5)} [${component}]${colors.reset} ${colors.cyan}${title}${colors.reset}${details}`;
}

/**
 * Format log in hybrid style (event on first line, details below).
 */
export function formatHybrid(log: LogObject): string {
  const { level, time, component, title, data } = splitLog(log);
  const firstLine = `${colors.dim}${formatClock(time)} ${level.padEnd(5)} [${component}]${colors.reset} ${colors.cyan}${title}${colors.reset}`;

  const pairs = formatPairs(data);
  return pairs.length === 0 ? firstLine : `${firstLine}\n  ${pairs.join(" ")}`;
}

/**
 * Format log in minimal style.
 * Format: [dim]MM:SS.mmm[/dim] [cyan]event[/cyan] [yellow]key[/yellow]=[green]value[/green] ...
 */
export function formatMinimal(log: LogObject): string {
  const { time, title, data } = splitLog(log);
  const pairs = formatPairs(data);
  const details = pairs.length > 0 ? ` ${pairs.join(" ")}` : "";

  return `${colors.dim}${formatClockMinimal(time)}${colors.reset} ${colors.cyan}${title}${colors.reset}${details}`;
}

export function getFormatter(format: LogFormat): (log: LogObject) => string {
  switch (format) {
    case "compact":
      return formatCompact;
    case "hybrid":
      return formatHybrid;
    case "minimal":
      return formatMinimal;
  }
}

/**
 * Create a pino destination that formats each JSON line before writing it.
 * Lines that are not pino records are written through unchanged.
 */
export function createFormatterStream(format: LogFormat, output: NodeJS.WritableStream = process.stderr) {
  const formatter = getFormatter(format);

  return {
    write(chunk: string): void {
      let parsed: unknown;
      try {
        parsed = JSON.parse(chunk);
      } catch {
        output.write(chunk);
        return;
      }

      const log = logObjectSchema.safeParse(parsed);
      output.write(log.success ? `${formatter(log.data)}\n` : chunk);
    },
  };
}
