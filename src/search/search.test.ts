import { configure, type LogRecord, reset } from "@logtape/logtape";
import * as timekeeper from "timekeeper";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { fields, NOW, registry, termOf } from "../../tests/helpers";
import { SearchSyntaxError, UnknownFieldError } from "./errors";
import { compileSearch, SearchCompiler } from "./search";

describe("SearchCompiler", () => {
  describe("constructor", () => {
    it("fills in default options", () => {
      expect.assertions(1);
      expect(new SearchCompiler(fields).options).toEqual({
        timeZone: "UTC",
        strictFields: false,
        partialKeys: false,
      });
    });

    it("rejects unknown time zones", () => {
      expect.assertions(1);
      expect(
        () => new SearchCompiler(fields, { timeZone: "Mars/Olympus_Mons" }),
      ).toThrow("Unknown time zone");
    });

    it("reuses a prepared registry", () => {
      expect.assertions(1);
      expect(new SearchCompiler(registry).registry).toBe(registry);
    });
  });

  describe("compile()", () => {
    beforeEach(() => {
      timekeeper.freeze(NOW);
    });

    afterEach(() => {
      timekeeper.reset();
    });

    it("resolves relative dates against the current time", () => {
      expect.assertions(1);
      const { tree } = new SearchCompiler(fields).compile("date:today");
      expect(termOf(tree).conditions[0]?.predicate).toEqual({
        type: "dateRange",
        min: new Date("2024-03-14T00:00:00Z"),
        max: new Date("2024-03-15T00:00:00Z"),
      });
    });

    it("resolves relative dates in the configured time zone", () => {
      expect.assertions(1);
      const compiler = new SearchCompiler(fields, { timeZone: "Asia/Tokyo" });
      const { tree } = compiler.compile("date:today");
      expect(termOf(tree).conditions[0]?.predicate).toEqual({
        type: "dateRange",
        min: new Date("2024-03-14T15:00:00Z"),
        max: new Date("2024-03-15T15:00:00Z"),
      });
    });

    it("returns the query and the keys it references", () => {
      expect.assertions(2);
      const search = new SearchCompiler(fields).compile("age>30 name:bob");
      expect(search.query).toBe("age>30 name:bob");
      expect(search.referencedKeys).toEqual(["age", "name"]);
    });

    it("is deterministic", () => {
      expect.assertions(1);
      const compiler = new SearchCompiler(fields);
      const query = 'date>"last week" (price:60 or -title:x) not error:none';
      expect(compiler.compile(query)).toEqual(compiler.compile(query));
    });

    it("applies strictFields", () => {
      expect.assertions(1);
      const compiler = new SearchCompiler(fields, { strictFields: true });
      expect(() => compiler.compile("cost:$50")).toThrow(UnknownFieldError);
    });
  });

  describe("safeCompile()", () => {
    it("reports invalid queries", () => {
      expect.assertions(4);
      const result = new SearchCompiler(fields).safeCompile("(a or b", NOW);
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.query).toBe("(a or b");
      expect(result.error).toBeInstanceOf(SearchSyntaxError);
      expect(result.error.position).toBe(0);
    });

    it("returns valid searches", () => {
      expect.assertions(1);
      const compiler = new SearchCompiler(fields);
      expect(compiler.safeCompile("age>30", NOW)).toEqual({
        success: true,
        search: compiler.compile("age>30", NOW),
      });
    });
  });

  describe("describe()", () => {
    const compiler = new SearchCompiler([
      { searchKey: "name", type: "string", description: "Full name" },
      { searchKey: "age", type: "number" },
    ]);
    const fieldSummary = { name: "Full name (string)", age: "age (number)" };

    it("lists the searchable fields", () => {
      expect.assertions(1);
      expect(compiler.describe()).toEqual({ fields: fieldSummary });
    });

    it("includes the query of a search", () => {
      expect.assertions(2);
      expect(compiler.describe(compiler.safeCompile("age>30"))).toEqual({
        fields: fieldSummary,
        query: "age>30",
      });
      expect(compiler.describe(compiler.safeCompile("  "))).toEqual({
        fields: fieldSummary,
      });
    });

    it("includes the error of a failed search", () => {
      expect.assertions(1);
      expect(compiler.describe(compiler.safeCompile("age>x"))).toEqual({
        fields: fieldSummary,
        query: "age>x",
        error: "Invalid number value 'x'",
      });
    });
  });

  describe("logging", () => {
    const logs: LogRecord[] = [];

    beforeEach(async () => {
      logs.length = 0;
      await configure({
        sinks: { buffer: (record: LogRecord) => logs.push(record) },
        loggers: [
          { category: "searchstring", lowestLevel: "debug", sinks: ["buffer"] },
          { category: ["logtape", "meta"], lowestLevel: "warning", sinks: [] },
        ],
        reset: true,
      });
    });

    afterEach(async () => {
      await reset();
    });

    it("logs compiled searches at debug level", () => {
      expect.assertions(3);
      new SearchCompiler(fields).compile("age>30", NOW);
      expect(logs).toHaveLength(1);
      expect(logs[0]?.level).toBe("debug");
      expect(logs[0]?.properties).toEqual({
        query: "age>30",
        referencedKeys: ["age"],
      });
    });

    it("logs rejected searches", () => {
      expect.assertions(2);
      new SearchCompiler(fields).safeCompile("a and", NOW);
      expect(logs).toHaveLength(1);
      expect(logs[0]?.category).toEqual(["searchstring", "compiler"]);
    });
  });
});

describe("compileSearch", () => {
  it("compiles with an explicit reference time", () => {
    expect.assertions(1);
    const { tree } = compileSearch("date:yesterday", fields, {
      now: NOW,
      timeZone: "UTC",
    });
    expect(termOf(tree).conditions[0]?.predicate).toEqual({
      type: "dateRange",
      min: new Date("2024-03-13T00:00:00Z"),
      max: new Date("2024-03-14T00:00:00Z"),
    });
  });

  it("returns no tree for a blank query", () => {
    expect.assertions(1);
    expect(compileSearch("", fields, { now: NOW })).toEqual({
      query: "",
      tree: null,
      referencedKeys: [],
    });
  });
});
