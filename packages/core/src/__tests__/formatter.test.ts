import { DateTime, FixedOffsetZone, IANAZone } from "luxon";

import {
  formatInstant,
  formatParsedDate,
  formatTimestamp,
} from "../formatter";
import { makeDisplayOptions } from "../options";

const utc = FixedOffsetZone.utcInstance;
const newYork = IANAZone.create("America/New_York");
const kolkata = IANAZone.create("Asia/Kolkata");

const newYear2021 = 1609459200000;

describe("formatTimestamp", () => {
  const instant = DateTime.fromMillis(newYear2021 + 123, { zone: utc });

  it("should print whole seconds without milliseconds", () => {
    expect(formatTimestamp(instant, false)).toBe("1609459200");
  });

  it("should print exactly three fraction digits with milliseconds", () => {
    expect(formatTimestamp(instant, true)).toBe("1609459200.123");
    expect(
      formatTimestamp(DateTime.fromMillis(newYear2021, { zone: utc }), true),
    ).toBe("1609459200.000");
  });

  it("should round rather than truncate", () => {
    const late = DateTime.fromMillis(newYear2021 + 600, { zone: utc });
    expect(formatTimestamp(late, false)).toBe("1609459201");
  });

  it("should not depend on the zone", () => {
    const local = DateTime.fromMillis(newYear2021, { zone: newYork });
    expect(formatTimestamp(local, false)).toBe("1609459200");
  });

  it("should handle instants before the epoch", () => {
    const before = DateTime.fromMillis(-1500, { zone: utc });
    expect(formatTimestamp(before, true)).toBe("-1.500");
  });
});

describe("formatInstant", () => {
  describe("timestamps", () => {
    it("should render the timestamp when requested", () => {
      const instant = DateTime.fromMillis(newYear2021 + 42, { zone: utc });
      expect(formatInstant(instant, true, makeDisplayOptions())).toBe(
        "1609459200",
      );
      expect(
        formatInstant(instant, true, makeDisplayOptions({ milis: true })),
      ).toBe("1609459200.042");
    });
  });

  describe("in UTC", () => {
    const instant = DateTime.fromMillis(newYear2021, { zone: utc });

    it("should render ISO dates with a Z suffix", () => {
      expect(
        formatInstant(
          instant,
          false,
          makeDisplayOptions({ utc: true, iso: true }),
        ),
      ).toBe("2021-01-01T00:00:00Z");
    });

    it("should render human dates with a UTC suffix", () => {
      expect(
        formatInstant(instant, false, makeDisplayOptions({ utc: true })),
      ).toBe("Fri 1 Jan 2021 00:00:00 UTC");
    });

    it("should append milliseconds to the time of day", () => {
      const precise = DateTime.fromMillis(newYear2021 + 7, { zone: utc });
      expect(
        formatInstant(
          precise,
          false,
          makeDisplayOptions({ utc: true, iso: true, milis: true }),
        ),
      ).toBe("2021-01-01T00:00:00.007Z");
      expect(
        formatInstant(
          precise,
          false,
          makeDisplayOptions({ utc: true, milis: true }),
        ),
      ).toBe("Fri 1 Jan 2021 00:00:00.007 UTC");
    });

    it("should not pad the day of month", () => {
      const later = DateTime.fromObject(
        { year: 2021, month: 3, day: 9, hour: 7, minute: 5, second: 3 },
        { zone: utc },
      );
      expect(
        formatInstant(later, false, makeDisplayOptions({ utc: true })),
      ).toBe("Tue 9 Mar 2021 07:05:03 UTC");
    });
  });

  describe("in a local zone", () => {
    it("should render ISO dates with a numeric offset", () => {
      const instant = DateTime.fromMillis(newYear2021, { zone: newYork });
      expect(
        formatInstant(instant, false, makeDisplayOptions({ iso: true })),
      ).toBe("2020-12-31T19:00:00-0500");
    });

    it("should render human dates with the zone name and offset", () => {
      const instant = DateTime.fromMillis(newYear2021, { zone: newYork });
      expect(formatInstant(instant, false, makeDisplayOptions())).toBe(
        "Thu 31 Dec 2020 19:00:00 EST (UTC-5)",
      );
    });

    it("should follow daylight saving time", () => {
      const summer = DateTime.fromMillis(1625097600000, { zone: newYork });
      expect(formatInstant(summer, false, makeDisplayOptions())).toBe(
        "Wed 30 Jun 2021 20:00:00 EDT (UTC-4)",
      );
      expect(
        formatInstant(summer, false, makeDisplayOptions({ iso: true })),
      ).toBe("2021-06-30T20:00:00-0400");
    });

    it("should keep fractional-hour offsets", () => {
      const instant = DateTime.fromMillis(newYear2021, { zone: kolkata });
      expect(
        formatInstant(instant, false, makeDisplayOptions({ iso: true })),
      ).toBe("2021-01-01T05:30:00+0530");
      expect(formatInstant(instant, false, makeDisplayOptions())).toMatch(
        /^Fri 1 Jan 2021 05:30:00 .+ \(UTC\+5:30\)$/,
      );
    });

    it("should use a five-character offset for every ISO rendering", () => {
      for (const zone of [newYork, kolkata]) {
        const rendered = formatInstant(
          DateTime.fromMillis(newYear2021, { zone }),
          false,
          makeDisplayOptions({ iso: true }),
        );
        expect(rendered.slice(-5)).toMatch(/^[+-]\d{4}$/);
      }
    });
  });
});

describe("formatParsedDate", () => {
  it("should use the fixed layout in UTC", () => {
    const instant = DateTime.fromMillis(newYear2021, { zone: utc });
    expect(formatParsedDate(instant)).toBe("2021-Jan-01 00:00:00 UTC");
  });

  it("should use the zone abbreviation in a local zone", () => {
    const instant = DateTime.fromMillis(newYear2021, { zone: newYork });
    expect(formatParsedDate(instant)).toBe("2020-Dec-31 19:00:00 EST");
  });

  it("should never show milliseconds", () => {
    const instant = DateTime.fromMillis(newYear2021 + 999, { zone: utc });
    expect(formatParsedDate(instant)).toBe("2021-Jan-01 00:00:00 UTC");
  });
});
