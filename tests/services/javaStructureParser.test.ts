import { describe, expect, it } from "vitest";
import { JavaStructureParser } from "../../src/services/javaStructureParser";

const source = [
  "package com.example;",
  "",
  "import java.util.List;",
  "import com.example.util.Helper;",
  "",
  "public class OrderService {",
  "  private final Helper helper = new Helper();",
  "",
  "  public int total(List<Integer> values) {",
  "    return helper.compute(values.size());",
  "  }",
  "}",
  "",
  "interface Priced {",
  "  int price();",
  "}",
  ""
].join("\n");

describe("JavaStructureParser", () => {
  it("reads imports and declared type names", () => {
    const structure = new JavaStructureParser().parse(source);

    expect([...structure.imports].sort()).toEqual(["com.example.util.Helper", "java.util.List"]);
    expect([...structure.typeNames].sort()).toEqual(["OrderService", "Priced"]);
  });

  it("reads call-site members and qualifiers", () => {
    const structure = new JavaStructureParser().parse(source);

    expect(structure.callSites).toContainEqual({ member: "compute", qualifier: "helper" });
    expect(structure.callSites).toContainEqual({ member: "size", qualifier: "values" });
  });

  it("reads wildcard imports", () => {
    const structure = new JavaStructureParser().parse("import java.util.*;\nclass A {}\n");
    expect(structure.imports).toEqual(["java.util.*"]);
    expect(structure.typeNames).toEqual(["A"]);
  });

  it("throws on invalid syntax", () => {
    expect(() => new JavaStructureParser().parse("public class Broken { void run( }")).toThrow();
  });
});
