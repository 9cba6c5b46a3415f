import { describe, expect, it } from "vitest";
import { logLevelFrom } from "./logging";

describe("logLevelFrom", () => {
  it("defaults to info", () => {
    expect.assertions(2);
    expect(logLevelFrom(undefined)).toBe("info");
    expect(logLevelFrom("")).toBe("info");
  });

  it("parses level names in any case", () => {
    expect.assertions(2);
    expect(logLevelFrom("debug")).toBe("debug");
    expect(logLevelFrom("WARNING")).toBe("warning");
  });

  it("rejects unknown levels", () => {
    expect.assertions(1);
    expect(() => logLevelFrom("verbose")).toThrow();
  });
});
