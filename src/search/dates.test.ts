import { describe, expect, it } from "vitest";
import { NOW } from "../../tests/helpers";
import { type ResolvedDate, resolveDatePhrase } from "./dates";
import { DateParseError } from "./errors";

const utc = { now: NOW, timeZone: "UTC" };

function span(min: string, max: string): ResolvedDate {
  return { type: "span", min: new Date(min), max: new Date(max) };
}

function instant(at: string): ResolvedDate {
  return { type: "instant", at: new Date(at) };
}

describe("resolveDatePhrase", () => {
  describe("relative days", () => {
    it.each([
      ["today", "2024-03-14", "2024-03-15"],
      ["yesterday", "2024-03-13", "2024-03-14"],
      ["tomorrow", "2024-03-15", "2024-03-16"],
      ["this day", "2024-03-14", "2024-03-15"],
      ["last day", "2024-03-13", "2024-03-14"],
    ])("resolves %j to a day", (phrase, min, max) => {
      expect.assertions(1);
      expect(resolveDatePhrase(phrase, utc)).toEqual(
        span(`${min}T00:00:00Z`, `${max}T00:00:00Z`),
      );
    });

    it("resolves now to the reference time", () => {
      expect.assertions(1);
      expect(resolveDatePhrase("now", utc)).toEqual(
        instant("2024-03-14T15:30:00Z"),
      );
    });
  });

  describe("calendar periods", () => {
    it.each([
      ["this week", "2024-03-10", "2024-03-17"],
      ["last week", "2024-03-03", "2024-03-10"],
      ["next week", "2024-03-17", "2024-03-24"],
      ["this month", "2024-03-01", "2024-04-01"],
      ["last month", "2024-02-01", "2024-03-01"],
      ["next month", "2024-04-01", "2024-05-01"],
      ["this year", "2024-01-01", "2025-01-01"],
      ["last year", "2023-01-01", "2024-01-01"],
      ["next year", "2025-01-01", "2026-01-01"],
    ])("resolves %j", (phrase, min, max) => {
      expect.assertions(1);
      expect(resolveDatePhrase(phrase, utc)).toEqual(
        span(`${min}T00:00:00Z`, `${max}T00:00:00Z`),
      );
    });

    it("crosses year boundaries", () => {
      expect.assertions(1);
      const context = {
        now: new Date("2024-01-10T08:00:00Z"),
        timeZone: "UTC",
      };
      expect(resolveDatePhrase("last month", context)).toEqual(
        span("2023-12-01T00:00:00Z", "2024-01-01T00:00:00Z"),
      );
    });
  });

  describe("durations", () => {
    it.each([
      ["2 weeks ago", "2024-02-29T15:30:00Z"],
      ["an hour ago", "2024-03-14T14:30:00Z"],
      ["3 hours from now", "2024-03-14T18:30:00Z"],
      ["1 month ago", "2024-02-14T15:30:00Z"],
      ["a year from now", "2025-03-14T15:30:00Z"],
      ["90 minutes ago", "2024-03-14T14:00:00Z"],
    ])("resolves %j to an instant", (phrase, at) => {
      expect.assertions(1);
      expect(resolveDatePhrase(phrase, utc)).toEqual(instant(at));
    });

    it("resolves trailing periods to a span ending today", () => {
      expect.assertions(2);
      expect(resolveDatePhrase("last 7 days", utc)).toEqual(
        span("2024-03-07T00:00:00Z", "2024-03-15T00:00:00Z"),
      );
      expect(resolveDatePhrase("past 2 months", utc)).toEqual(
        span("2024-01-14T00:00:00Z", "2024-03-15T00:00:00Z"),
      );
    });
  });

  describe("weekdays", () => {
    it.each([
      ["monday", "2024-03-11"],
      ["thursday", "2024-03-14"],
      ["last thursday", "2024-03-07"],
      ["fri", "2024-03-08"],
      ["sunday", "2024-03-10"],
    ])("resolves %j to its most recent day", (phrase, day) => {
      expect.assertions(1);
      const next = new Date(`${day}T00:00:00Z`);
      next.setUTCDate(next.getUTCDate() + 1);
      expect(resolveDatePhrase(phrase, utc)).toEqual({
        type: "span",
        min: new Date(`${day}T00:00:00Z`),
        max: next,
      });
    });
  });

  describe("months and years", () => {
    it.each([
      ["2023", "2023-01-01", "2024-01-01"],
      ["2024-02", "2024-02-01", "2024-03-01"],
      ["march", "2024-03-01", "2024-04-01"],
      ["april", "2023-04-01", "2023-05-01"],
      ["feb 2024", "2024-02-01", "2024-03-01"],
      ["February, 2023", "2023-02-01", "2023-03-01"],
      ["2023 dec", "2023-12-01", "2024-01-01"],
    ])("resolves %j to a span", (phrase, min, max) => {
      expect.assertions(1);
      expect(resolveDatePhrase(phrase, utc)).toEqual(
        span(`${min}T00:00:00Z`, `${max}T00:00:00Z`),
      );
    });
  });

  describe("calendar dates", () => {
    it.each([
      ["2024-02-29", "2024-02-29"],
      ["2024/2/29", "2024-02-29"],
      ["02/29/2024", "2024-02-29"],
      ["march 5th", "2024-03-05"],
      ["Mar 5, 2023", "2023-03-05"],
      ["5 march 2023", "2023-03-05"],
      ["22nd jan", "2024-01-22"],
    ])("resolves %j to a day", (phrase, day) => {
      expect.assertions(1);
      const min = new Date(`${day}T00:00:00Z`);
      expect(resolveDatePhrase(phrase, utc)).toEqual({
        type: "span",
        min,
        max: new Date(min.getTime() + 24 * 60 * 60 * 1000),
      });
    });

    it("resolves timestamps to instants", () => {
      expect.assertions(3);
      expect(resolveDatePhrase("2024-03-01T10:00", utc)).toEqual(
        instant("2024-03-01T10:00:00Z"),
      );
      expect(resolveDatePhrase("2024-03-01 10:00:30Z", utc)).toEqual(
        instant("2024-03-01T10:00:30Z"),
      );
      expect(resolveDatePhrase("2024-03-01T10:00+02:00", utc)).toEqual(
        instant("2024-03-01T08:00:00Z"),
      );
    });
  });

  describe("normalization", () => {
    it("reads underscores as spaces and ignores case", () => {
      expect.assertions(2);
      expect(resolveDatePhrase("Last_Month", utc)).toEqual(
        span("2024-02-01T00:00:00Z", "2024-03-01T00:00:00Z"),
      );
      expect(resolveDatePhrase("  2  weeks   ago ", utc)).toEqual(
        instant("2024-02-29T15:30:00Z"),
      );
    });
  });

  describe("time zones", () => {
    const newYork = { now: NOW, timeZone: "America/New_York" };

    it("starts days at local midnight", () => {
      expect.assertions(2);
      expect(resolveDatePhrase("today", newYork)).toEqual(
        span("2024-03-14T04:00:00Z", "2024-03-15T04:00:00Z"),
      );
      expect(resolveDatePhrase("yesterday", newYork)).toEqual(
        span("2024-03-13T04:00:00Z", "2024-03-14T04:00:00Z"),
      );
    });

    it("follows daylight saving changes", () => {
      expect.assertions(1);
      expect(resolveDatePhrase("this week", newYork)).toEqual(
        span("2024-03-10T05:00:00Z", "2024-03-17T04:00:00Z"),
      );
    });

    it("uses the local date near midnight", () => {
      expect.assertions(1);
      const lateEvening = {
        now: new Date("2024-03-15T02:00:00Z"),
        timeZone: "America/New_York",
      };
      expect(resolveDatePhrase("today", lateEvening)).toEqual(
        span("2024-03-14T04:00:00Z", "2024-03-15T04:00:00Z"),
      );
    });

    it("reads timestamps without an offset as local time", () => {
      expect.assertions(1);
      expect(resolveDatePhrase("2024-03-01 10:00", newYork)).toEqual(
        instant("2024-03-01T15:00:00Z"),
      );
    });
  });

  describe("errors", () => {
    it.each(["someday", "2023-02-29", "13/01/2024", "last fortnight", ""])(
      "rejects %j",
      (phrase) => {
        expect.assertions(1);
        expect(() => resolveDatePhrase(phrase, utc)).toThrow(DateParseError);
      },
    );

    it("carries the phrase and position", () => {
      expect.assertions(3);
      try {
        resolveDatePhrase("someday", utc, { position: 7 });
      } catch (error) {
        expect(error).toBeInstanceOf(DateParseError);
        if (!(error instanceof DateParseError)) return;
        expect(error.message).toBe("Invalid date format 'someday'");
        expect(error.position).toBe(7);
      }
    });
  });
});
