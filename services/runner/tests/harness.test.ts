import { describe, expect, test } from "vitest";
import { decodeOutputValue, findForbiddenIdentifier, isValidIdentifier, stripCommentsAndStrings } from "../src/harness";

describe("stripCommentsAndStrings", () => {
  test("blanks string literals", () => {
    expect(stripCommentsAndStrings('x = "process"; y')).toBe("x =  ; y");
  });

  test("blanks block comments and template literals", () => {
    expect(stripCommentsAndStrings("a /* require */ b `eval` c")).toBe("a   b   c");
  });

  test("keeps escaped quotes inside the literal", () => {
    expect(stripCommentsAndStrings("'it\\'s' z")).toBe("  z");
  });
});

describe("findForbiddenIdentifier", () => {
  test("returns the first forbidden name in code", () => {
    expect(findForbiddenIdentifier("const a = 1;\nprocess.env;\nrequire('x');")).toBe("process");
  });

  test("matches whole identifiers only", () => {
    expect(findForbiddenIdentifier("const processed = 1; const requirement = 2;")).toBeNull();
  });

  test("ignores comments", () => {
    expect(findForbiddenIdentifier("// eval the stress\nconst s = 1;")).toBeNull();
  });

  test("skips member names and object keys", () => {
    expect(findForbiddenIdentifier("const o = { process: 1, eval: 2 }; o.process + o.eval;")).toBeNull();
    expect(findForbiddenIdentifier("class Beam { constructor(d) { this.d = d; } }")).toBeNull();
  });

  test("still flags spread, shorthand and ternary uses", () => {
    expect(findForbiddenIdentifier("const a = [...process.argv];")).toBe("process");
    expect(findForbiddenIdentifier("const o = { process };")).toBe("process");
    expect(findForbiddenIdentifier("const f = ok ? require : null;")).toBe("require");
  });
});

describe("isValidIdentifier", () => {
  test("accepts identifiers and rejects expressions", () => {
    expect(isValidIdentifier("result")).toBe(true);
    expect(isValidIdentifier("$sigma_1")).toBe(true);
    expect(isValidIdentifier("1result")).toBe(false);
    expect(isValidIdentifier("a.b")).toBe(false);
  });
});

describe("decodeOutputValue", () => {
  test("decodes each serialized kind", () => {
    expect(decodeOutputValue(null)).toBeNull();
    expect(decodeOutputValue('{"kind":"none"}')).toBeNull();
    expect(decodeOutputValue('{"kind":"number","repr":"-Infinity"}')).toBe(Number.NEGATIVE_INFINITY);
    expect(decodeOutputValue('{"kind":"json","value":[1,2]}')).toEqual([1, 2]);
    expect(decodeOutputValue('{"kind":"opaque","repr":"[unserializable value]"}')).toBe("[unserializable value]");
  });

  test("treats malformed payloads as no value", () => {
    expect(decodeOutputValue("not json")).toBeNull();
    expect(decodeOutputValue('{"kind":"mystery"}')).toBeNull();
  });
});
