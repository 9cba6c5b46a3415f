/**
 * Human readable date phrase resolution.
 *
 * Turns phrases such as `yesterday`, `last month`, `feb 2024` or
 * `2 weeks ago` into either a single instant or a half-open `[min, max)`
 * span, relative to an injected "now" in a given time zone.
 */

import { Temporal } from "@js-temporal/polyfill";
import { DateParseError } from "./errors";

export type ResolvedDate =
  | { type: "instant"; at: Date }
  | { type: "span"; min: Date; max: Date };

export interface DateContext {
  /** The reference time relative phrases are resolved against. */
  now: Date;
  /** IANA time zone that defines where days start. */
  timeZone: string;
}

const MONTHS: ReadonlyMap<string, number> = new Map([
  ["january", 1],
  ["jan", 1],
  ["february", 2],
  ["feb", 2],
  ["march", 3],
  ["mar", 3],
  ["april", 4],
  ["apr", 4],
  ["may", 5],
  ["june", 6],
  ["jun", 6],
  ["july", 7],
  ["jul", 7],
  ["august", 8],
  ["aug", 8],
  ["september", 9],
  ["sep", 9],
  ["sept", 9],
  ["october", 10],
  ["oct", 10],
  ["november", 11],
  ["nov", 11],
  ["december", 12],
  ["dec", 12],
]);

// ISO numbering: Monday is 1, Sunday is 7.
const WEEKDAYS: ReadonlyMap<string, number> = new Map([
  ["monday", 1],
  ["mon", 1],
  ["tuesday", 2],
  ["tue", 2],
  ["tues", 2],
  ["wednesday", 3],
  ["wed", 3],
  ["thursday", 4],
  ["thu", 4],
  ["thur", 4],
  ["thurs", 4],
  ["friday", 5],
  ["fri", 5],
  ["saturday", 6],
  ["sat", 6],
  ["sunday", 7],
  ["sun", 7],
]);

const OFFSETS: ReadonlyMap<string, number> = new Map([
  ["this", 0],
  ["last", -1],
  ["next", 1],
]);

/**
 * Calendar arithmetic anchored at the reference time.
 */
class Calendar {
  readonly now: Temporal.ZonedDateTime;
  readonly today: Temporal.PlainDate;
  readonly timeZone: string;

  constructor(context: DateContext) {
    this.timeZone = context.timeZone;
    this.now = Temporal.Instant.fromEpochMilliseconds(
      context.now.getTime(),
    ).toZonedDateTimeISO(context.timeZone);
    this.today = this.now.toPlainDate();
  }

  instant(at: Temporal.ZonedDateTime): ResolvedDate {
    return { type: "instant", at: new Date(at.epochMilliseconds) };
  }

  startOf(date: Temporal.PlainDate): Date {
    return new Date(
      date.toZonedDateTime({ timeZone: this.timeZone }).epochMilliseconds,
    );
  }

  span(from: Temporal.PlainDate, until: Temporal.PlainDate): ResolvedDate {
    return { type: "span", min: this.startOf(from), max: this.startOf(until) };
  }

  day(date: Temporal.PlainDate): ResolvedDate {
    return this.span(date, date.add({ days: 1 }));
  }

  week(start: Temporal.PlainDate): ResolvedDate {
    return this.span(start, start.add({ weeks: 1 }));
  }

  month(first: Temporal.PlainDate): ResolvedDate {
    return this.span(first, first.add({ months: 1 }));
  }

  year(first: Temporal.PlainDate): ResolvedDate {
    return this.span(first, first.add({ years: 1 }));
  }

  /** Weeks start on Sunday. */
  startOfWeek(date: Temporal.PlainDate): Temporal.PlainDate {
    return date.subtract({ days: date.dayOfWeek % 7 });
  }
}

function date(year: number, month: number, day: number): Temporal.PlainDate {
  return Temporal.PlainDate.from({ year, month, day }, { overflow: "reject" });
}

function durationOf(unit: string, amount: number): Temporal.DurationLike {
  switch (unit) {
    case "minute":
      return { minutes: amount };
    case "hour":
      return { hours: amount };
    case "day":
      return { days: amount };
    case "week":
      return { weeks: amount };
    case "month":
      return { months: amount };
    default:
      return { years: amount };
  }
}

function parseAmount(text: string): number {
  return text === "a" || text === "an" ? 1 : Number.parseInt(text, 10);
}

function parseOffsetMinutes(offset: string): number {
  if (offset === "z") return 0;
  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  const hours = Number.parseInt(digits.slice(0, 2), 10);
  const minutes = Number.parseInt(digits.slice(2), 10);
  return sign * (hours * 60 + minutes);
}

type Rule = (
  match: RegExpMatchArray,
  calendar: Calendar,
) => ResolvedDate | null;

const RULES: readonly [RegExp, Rule][] = [
  [/^now$/, (_, c) => c.instant(c.now)],
  [/^today$/, (_, c) => c.day(c.today)],
  [/^yesterday$/, (_, c) => c.day(c.today.subtract({ days: 1 }))],
  [/^tomorrow$/, (_, c) => c.day(c.today.add({ days: 1 }))],
  [
    /^(this|last|next) (day|week|month|year)$/,
    ([, which, unit], c) => {
      const offset = OFFSETS.get(which) ?? 0;
      switch (unit) {
        case "day":
          return c.day(c.today.add({ days: offset }));
        case "week":
          return c.week(c.startOfWeek(c.today).add({ weeks: offset }));
        case "month":
          return c.month(c.today.with({ day: 1 }).add({ months: offset }));
        default:
          return c.year(
            c.today.with({ month: 1, day: 1 }).add({ years: offset }),
          );
      }
    },
  ],
  [
    /^(\d+|an?) (minute|hour|day|week|month|year)s? (ago|from now)$/,
    ([, amount, unit, direction], c) => {
      const duration = durationOf(unit, parseAmount(amount));
      return c.instant(
        direction === "ago" ? c.now.subtract(duration) : c.now.add(duration),
      );
    },
  ],
  [
    /^(?:last|past) (\d+) (day|week|month|year)s?$/,
    ([, amount, unit], c) =>
      c.span(
        c.today.subtract(durationOf(unit, parseAmount(amount))),
        c.today.add({ days: 1 }),
      ),
  ],
  [
    /^(last )?([a-z]+)$/,
    ([, last, name], c) => {
      const weekday = WEEKDAYS.get(name);
      if (weekday == null) return null;
      let back = (c.today.dayOfWeek - weekday + 7) % 7;
      if (last != null && back === 0) back = 7;
      return c.day(c.today.subtract({ days: back }));
    },
  ],
  [/^(\d{4})$/, ([, year], c) => c.year(date(Number(year), 1, 1))],
  [
    /^(\d{4})-(\d{1,2})$/,
    ([, year, month], c) => c.month(date(Number(year), Number(month), 1)),
  ],
  [
    /^([a-z]+)$/,
    ([, name], c) => {
      const month = MONTHS.get(name);
      if (month == null) return null;
      const first = c.today.with({ month, day: 1 });
      // A month that has not started yet means last year's.
      return c.month(
        Temporal.PlainDate.compare(first, c.today) > 0
          ? first.subtract({ years: 1 })
          : first,
      );
    },
  ],
  [
    /^([a-z]+),? (\d{4})$/,
    ([, name, year], c) => {
      const month = MONTHS.get(name);
      return month == null ? null : c.month(date(Number(year), month, 1));
    },
  ],
  [
    /^(\d{4}) ([a-z]+)$/,
    ([, year, name], c) => {
      const month = MONTHS.get(name);
      return month == null ? null : c.month(date(Number(year), month, 1));
    },
  ],
  [
    /^([a-z]+) (\d{1,2})(?:st|nd|rd|th)?,?(?: (\d{4}))?$/,
    ([, name, day, year], c) => {
      const month = MONTHS.get(name);
      if (month == null) return null;
      const y = year == null ? c.today.year : Number(year);
      return c.day(date(y, month, Number(day)));
    },
  ],
  [
    /^(\d{1,2})(?:st|nd|rd|th)? ([a-z]+),?(?: (\d{4}))?$/,
    ([, day, name, year], c) => {
      const month = MONTHS.get(name);
      if (month == null) return null;
      const y = year == null ? c.today.year : Number(year);
      return c.day(date(y, month, Number(day)));
    },
  ],
  [
    /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/,
    ([, year, month, day], c) =>
      c.day(date(Number(year), Number(month), Number(day))),
  ],
  [
    /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/,
    ([, month, day, year], c) =>
      c.day(date(Number(year), Number(month), Number(day))),
  ],
  [
    /^(\d{4})-(\d{1,2})-(\d{1,2})[t ](\d{1,2}):(\d{2})(?::(\d{2}))?(z|[+-]\d{2}:?\d{2})?$/,
    ([, year, month, day, hour, minute, second, offset], c) => {
      const local = Temporal.PlainDateTime.from(
        {
          year: Number(year),
          month: Number(month),
          day: Number(day),
          hour: Number(hour),
          minute: Number(minute),
          second: second == null ? 0 : Number(second),
        },
        { overflow: "reject" },
      );
      if (offset == null) {
        return c.instant(local.toZonedDateTime(c.timeZone));
      }
      const utc = local.toZonedDateTime("UTC").subtract({
        minutes: parseOffsetMinutes(offset),
      });
      return c.instant(utc);
    },
  ],
];

/**
 * Resolve a date phrase against a reference time.
 *
 * Phrases naming a period (a day, week, month or year) resolve to a span;
 * phrases naming a moment (`now`, `2 hours ago`, a date with a time)
 * resolve to an instant.  Underscores are read as spaces, so
 * `last_month` works without quoting.
 *
 * @throws {DateParseError} If the phrase is not understood or names an
 *   impossible calendar date.
 *
 * @example
 * ```typescript
 * const now = new Date("2024-03-14T12:00:00Z");
 * resolveDatePhrase("last month", { now, timeZone: "UTC" });
 * // => { type: "span", min: 2024-02-01T00:00Z, max: 2024-03-01T00:00Z }
 * ```
 */
export function resolveDatePhrase(
  phrase: string,
  context: DateContext,
  options: { position?: number } = {},
): ResolvedDate {
  const normalized = phrase
    .replace(/_/g, " ")
    .trim()
    .replace(/\s+/g, " ")
    .toLowerCase();
  const calendar = new Calendar(context);
  try {
    for (const [pattern, rule] of RULES) {
      const match = normalized.match(pattern);
      if (match == null) continue;
      const resolved = rule(match, calendar);
      if (resolved != null) return resolved;
    }
  } catch (error) {
    // Temporal rejects impossible dates such as 2024-02-30.
    if (!(error instanceof RangeError)) throw error;
    throw new DateParseError(phrase, {
      position: options.position,
      cause: error,
    });
  }
  throw new DateParseError(phrase, { position: options.position });
}
