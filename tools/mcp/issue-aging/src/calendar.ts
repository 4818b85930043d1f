/**
 * Business calendar — civil dates and business-day counting.
 *
 * A CivilDate is a calendar date pinned to 06:00 in the time zone of the
 * instant it came from. Six in the morning sits clear of every DST switch,
 * so stepping a date forward never lands on an ambiguous or skipped wall time.
 *
 * Pure and synchronous: no I/O, no shared state.
 */

import { Temporal } from "temporal-polyfill";

/** An absolute instant carrying its own time zone (IANA name or fixed offset). */
export type Instant = Temporal.ZonedDateTime;

const ANCHOR_TIME = Temporal.PlainTime.from({ hour: 6 });

/** Elapsed hours added per step; the extra hour absorbs a DST shift. */
const STEP_HOURS = 25;

const SATURDAY = 6;
const SUNDAY = 7;

// ─── CivilDate ───────────────────────────────────────────

export class CivilDate {
  private constructor(private readonly zdt: Temporal.ZonedDateTime) {}

  /** Truncate an instant to its local date, anchored at 06:00 in the same zone */
  static of(instant: Instant | CivilDate): CivilDate {
    if (instant instanceof CivilDate) return instant;
    return new CivilDate(
      instant.toPlainDate().toZonedDateTime({
        timeZone: instant.timeZoneId,
        plainTime: ANCHOR_TIME,
      })
    );
  }

  get year(): number {
    return this.zdt.year;
  }

  get month(): number {
    return this.zdt.month;
  }

  get day(): number {
    return this.zdt.day;
  }

  /** ISO weekday: 1 = Monday … 7 = Sunday */
  get dayOfWeek(): number {
    return this.zdt.dayOfWeek;
  }

  get timeZoneId(): string {
    return this.zdt.timeZoneId;
  }

  /** UTC offset of the anchored instant, in seconds */
  get offsetSeconds(): number {
    return this.zdt.offsetNanoseconds / 1e9;
  }

  get epochNanoseconds(): bigint {
    return this.zdt.epochNanoseconds;
  }

  isWeekend(): boolean {
    return this.dayOfWeek === SATURDAY || this.dayOfWeek === SUNDAY;
  }

  toZonedDateTime(): Temporal.ZonedDateTime {
    return this.zdt;
  }

  toPlainDate(): Temporal.PlainDate {
    return this.zdt.toPlainDate();
  }

  equals(other: CivilDate): boolean {
    return this.zdt.equals(other.zdt);
  }

  /** e.g. 2018-11-05T06:00:00-06:00[America/Chicago] */
  toString(): string {
    return this.zdt.toString();
  }
}

// ─── Operations ──────────────────────────────────────────

export function normalize(instant: Instant | CivilDate): CivilDate {
  return CivilDate.of(instant);
}

/** The next calendar day, reached by adding 25 elapsed hours and re-normalizing */
export function nextCivilDate(date: CivilDate): CivilDate {
  return CivilDate.of(date.toZonedDateTime().add({ hours: STEP_HOURS }));
}

/**
 * Count the day-steps from `start` to `until`, landing only on weekdays.
 *
 * Each step counts once, including a step that jumps a weekend. `until` is
 * first moved into `start`'s zone and shifted by the offset difference, so
 * dates anchored in different zones compare on one timeline. Returns 0 when
 * `until` is not after `start`.
 *
 * A `start` falling on a weekend is counted as-is (see DESIGN.md).
 */
export function businessDaysUntil(start: CivilDate, until: CivilDate): number {
  const offsetShift = until.offsetSeconds - start.offsetSeconds;
  const alignedUntil = until
    .toZonedDateTime()
    .withTimeZone(start.timeZoneId)
    .add({ seconds: offsetShift });

  let days = 0;
  let d = start;

  while (Temporal.ZonedDateTime.compare(d.toZonedDateTime(), alignedUntil) < 0) {
    days++;
    d = nextCivilDate(d);

    while (d.isWeekend()) {
      d = nextCivilDate(d);
    }
  }

  return days;
}

// ─── Timestamp Parsing ───────────────────────────────────

export class TimestampFormatError extends Error {
  constructor(readonly input: string, cause?: unknown) {
    super(`Unrecognized timestamp: "${input}"`, { cause });
    this.name = "TimestampFormatError";
  }
}

// 2017-12-15T11:02:01.443-0500, 2018-11-06T15:39:07.272826-06:00, ...Z
const TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?)(Z|[+-]\d{2}:?\d{2})$/;

/**
 * Parse a tracker or RFC 3339 timestamp into an instant whose zone is the
 * fixed offset written in the text ("Z" becomes UTC).
 */
export function parseTimestamp(text: string): Instant {
  const match = TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) throw new TimestampFormatError(text);

  const [, local, rawOffset] = match;
  const offset =
    rawOffset === "Z"
      ? "+00:00"
      : `${rawOffset.slice(0, 3)}:${rawOffset.slice(-2)}`;
  const timeZone = rawOffset === "Z" ? "UTC" : offset;

  try {
    return Temporal.Instant.from(`${local}${offset}`).toZonedDateTimeISO(timeZone);
  } catch (error) {
    throw new TimestampFormatError(text, error);
  }
}

/** Render an instant with its numeric offset and no bracketed zone name */
export function formatInstant(instant: Instant): string {
  return instant.toString({ timeZoneName: "never" });
}
