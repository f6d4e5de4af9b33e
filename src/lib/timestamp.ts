import type { DateTime } from "luxon";

/**
 * Format a wall-clock time for status messages and log headers:
 * `"rfc2822"` or any luxon format string such as `"yyyy-LL-dd HH:mm"`.
 */
export function formatTimestamp(date: DateTime, format = "rfc2822"): string {
  if (format === "rfc2822") {
    return date.toRFC2822() ?? date.toString();
  }
  return date.toFormat(format);
}
