import type { DateTime } from "luxon";

import type { DisplayOptions } from "./options";
import { localZoneAbbreviation } from "./zone";

export function formatTimestamp(
  instant: DateTime,
  milliseconds: boolean,
): string {
  return (instant.toMillis() / 1000).toFixed(milliseconds ? 3 : 0);
}

function formatZone(instant: DateTime, options: DisplayOptions): string {
  const { iso, utc } = options;
  if (iso) {
    return utc ? "Z" : instant.toFormat("ZZZ");
  }
  if (utc) {
    return "UTC";
  }
  return `${localZoneAbbreviation(instant)} (UTC${instant.toFormat("Z")})`;
}

/**
 * Renders an instant either as a UNIX timestamp or as a calendar date.
 *
 * Calendar output looks like `2021-01-01T00:00:00Z` in ISO mode and
 * `Fri 1 Jan 2021 00:00:00 UTC` otherwise.
 */
export function formatInstant(
  instant: DateTime,
  showTimestamp: boolean,
  options: DisplayOptions,
): string {
  if (showTimestamp) {
    return formatTimestamp(instant, options.milliseconds);
  }

  const local = instant.setLocale("en-US");
  const time = local.toFormat(
    options.milliseconds ? "HH:mm:ss.SSS" : "HH:mm:ss",
  );
  const date = local.toFormat(options.iso ? "yyyy-MM-dd" : "ccc d MMM yyyy");
  const zone = formatZone(local, options);

  return options.iso ? `${date}T${time}${zone}` : `${date} ${time} ${zone}`;
}

// Fixed layout used to echo back a parsed date, whatever the display flags.
export function formatParsedDate(instant: DateTime): string {
  const local = instant.setLocale("en-US");
  const stamp = local.toFormat("yyyy-MMM-dd HH:mm:ss");
  return `${stamp} ${localZoneAbbreviation(local)}`;
}
