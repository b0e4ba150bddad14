import type { DateTime } from "luxon";

import { formatInstant, formatParsedDate, formatTimestamp } from "./formatter";
import type { Mode } from "./mode";
import type { DisplayOptions } from "./options";

/**
 * Builds the lines printed for a resolved instant. Parsed dates (including
 * "today") are echoed in a fixed layout that ignores `iso` and `utc`, but
 * their timestamp line still honours `milliseconds`.
 */
export function renderReport(
  mode: Mode,
  instant: DateTime,
  options: DisplayOptions,
): string[] {
  switch (mode.kind) {
    case "now":
      return [
        `Current date: ${formatInstant(instant, false, options)}`,
        `Current UNIX: ${formatInstant(instant, true, options)}`,
      ];

    case "timestamp":
      return [formatInstant(instant, false, options)];

    case "today":
    case "dateString":
      return [
        `Parsed date: ${formatParsedDate(instant)}`,
        `UNIX Timestamp: ${formatTimestamp(instant, options.milliseconds)}`,
      ];
  }
}
