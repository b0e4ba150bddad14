import { DateTime, type Zone } from "luxon";

import { createChronoDateParser, type DateParser } from "./dateParser";
import { DateParseError, InvalidTimestampError } from "./errors";
import type { Mode } from "./mode";

export type ResolveContext = {
  zone: Zone;
  now?: () => DateTime;
  parseDate?: DateParser;
};

const defaultDateParser = createChronoDateParser();

/**
 * Produces the instant a mode refers to, always attached to `zone`.
 *
 * Text handed to the date parser is read as wall-clock time in `zone`; a
 * zone written in the text itself is ignored.
 */
export function resolveInstant(mode: Mode, context: ResolveContext): DateTime {
  const { zone, now = () => DateTime.now(), parseDate = defaultDateParser } =
    context;

  switch (mode.kind) {
    case "now":
      return now().setZone(zone);

    case "today":
      return now().setZone(zone).startOf("day");

    case "timestamp": {
      const { value } = mode;
      if (!Number.isFinite(value)) {
        throw new InvalidTimestampError(value);
      }
      const instant = DateTime.fromMillis(Math.round(value * 1000), { zone });
      if (!instant.isValid) {
        throw new InvalidTimestampError(value);
      }
      return instant;
    }

    case "dateString": {
      const { text } = mode;
      const fields = parseDate(text, now().setZone(zone));
      if (!fields) {
        throw new DateParseError(text);
      }
      const instant = DateTime.fromObject(fields, { zone });
      if (!instant.isValid) {
        throw new DateParseError(text);
      }
      return instant;
    }
  }
}
