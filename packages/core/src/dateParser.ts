import * as chrono from "chrono-node";
import type { DateTime } from "luxon";

export type ParsedDateFields = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
};

/**
 * Reads calendar fields out of free-form text. The fields are wall-clock
 * values with no zone attached; the caller decides which zone they belong
 * to. `reference` supplies "now" for relative expressions like "tomorrow".
 * Returns null when the text is not a date.
 */
export type DateParser = (
  text: string,
  reference: DateTime,
) => ParsedDateFields | null;

// Words that may surround a date without changing it, as in "on Jan 1 2021".
const FILLER_WORDS = new Set([
  "ad",
  "and",
  "at",
  "m",
  "nd",
  "of",
  "on",
  "rd",
  "st",
  "t",
  "th",
]);

function hasLeftoverWords(leftover: string): boolean {
  return leftover
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .some((word) => word !== "" && !FILLER_WORDS.has(word));
}

export function createChronoDateParser(
  parser: chrono.Chrono = chrono.casual,
): DateParser {
  return (text, reference) => {
    const [result] = parser.parse(text, {
      instant: reference.toJSDate(),
      timezone: reference.offset,
    });
    if (!result) {
      return null;
    }

    // Words chrono skipped over mean the text was only partly a date.
    const leftover =
      text.slice(0, result.index) +
      text.slice(result.index + result.text.length);
    if (hasLeftoverWords(leftover)) {
      return null;
    }

    const { start } = result;
    const year = start.get("year");
    const month = start.get("month");
    const day = start.get("day");
    if (year === null || month === null || day === null) {
      return null;
    }

    // A date without a time of day means midnight, not chrono's implied noon.
    if (!start.isCertain("hour")) {
      return {
        year,
        month,
        day,
        hour: 0,
        minute: 0,
        second: 0,
        millisecond: 0,
      };
    }

    return {
      year,
      month,
      day,
      hour: start.get("hour") ?? 0,
      minute: start.get("minute") ?? 0,
      second: start.get("second") ?? 0,
      millisecond: start.get("millisecond") ?? 0,
    };
  };
}
