import { describe, expect, it } from "vitest";
import { parseJsonObject } from "../../src/utils/json";

describe("parseJsonObject", () => {
  it("parses a bare object", () => {
    expect(parseJsonObject('{"rationale":"ok"}')).toEqual({ rationale: "ok" });
  });

  it("reads a fenced block", () => {
    expect(parseJsonObject('Here you go:\n```json\n{"changes":[]}\n```')).toEqual({ changes: [] });
  });

  it("falls back to the outermost braces", () => {
    expect(parseJsonObject('prefix {"a":{"b":1}} suffix')).toEqual({ a: { b: 1 } });
  });

  it("rejects arrays and plain text", () => {
    expect(() => parseJsonObject("[1, 2]")).toThrow("No JSON object found in model output.");
    expect(() => parseJsonObject("nothing here")).toThrow("No JSON object found in model output.");
  });
});
