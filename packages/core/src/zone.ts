import {
  type DateTime,
  FixedOffsetZone,
  IANAZone,
  SystemZone,
  type Zone,
} from "luxon";

/**
 * Returns the zone used when `--utc` is not given: the named IANA zone when
 * one is configured, otherwise the host's own zone.
 */
export function resolveLocalZone(timezone?: string): Zone {
  if (!timezone) {
    return SystemZone.instance;
  }
  if (!IANAZone.isValidZone(timezone)) {
    throw new Error(`Unknown time zone: ${timezone}`);
  }
  return IANAZone.create(timezone);
}

export function resolveZone(
  utc: boolean,
  localZone: Zone = SystemZone.instance,
): Zone {
  return utc ? FixedOffsetZone.utcInstance : localZone;
}

// Short zone names come from ICU; some zones only have a "GMT+5:30" style name.
export function localZoneAbbreviation(instant: DateTime): string {
  return instant.setLocale("en-US").offsetNameShort ?? instant.toFormat("ZZZ");
}
