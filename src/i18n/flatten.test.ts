import { describe, expect, it } from "vitest";
import { InvalidDelimiterError } from "./errors.js";
import { flattenDict, stringifyLeaf } from "./flatten.js";

describe("flattenDict", () => {
  it("flattens nested objects", () => {
    const result = flattenDict({
      a: {
        b: {
          c: "value",
        },
      },
    });
    expect(result).toEqual({ "a.b.c": "value" });
  });

  it("handles mixed nesting levels", () => {
    const result = flattenDict({
      simple: "value1",
      nested: {
        deep: "value2",
      },
    });
    expect(result).toEqual({
      simple: "value1",
      "nested.deep": "value2",
    });
  });

  it("uses array indices as path segments", () => {
    const result = flattenDict({ steps: ["open the menu", { title: "pick a role" }] });
    expect(result).toEqual({
      "steps.0": "open the menu",
      "steps.1.title": "pick a role",
    });
  });

  it("accepts a top-level array", () => {
    expect(flattenDict(["x", ["y", "z"]])).toEqual({ "0": "x", "1.0": "y", "1.1": "z" });
  });

  it("joins with a custom delimiter", () => {
    expect(flattenDict({ menu: { help: { title: "Help" } } }, "/")).toEqual({
      "menu/help/title": "Help",
    });
  });

  it("keeps non-string leaves as they are", () => {
    expect(flattenDict({ limits: { max: 3, strict: true, note: null } })).toEqual({
      "limits.max": 3,
      "limits.strict": true,
      "limits.note": null,
    });
  });

  it("keeps a leaf stored under __proto__", () => {
    const result = flattenDict(JSON.parse('{"__proto__":"P","menu":{"__proto__":"Q"},"ok":"yes"}'));
    expect(Object.keys(result)).toEqual(["__proto__", "menu.__proto__", "ok"]);
    expect(Object.hasOwn(result, "__proto__")).toBe(true);
    expect(result["__proto__"]).toBe("P");
    expect(result["menu.__proto__"]).toBe("Q");
  });

  it("drops empty objects and arrays", () => {
    expect(flattenDict({ a: {}, b: [], c: "x" })).toEqual({ c: "x" });
  });

  it("lets the last colliding path win", () => {
    expect(flattenDict({ "a.b": "first", a: { b: "second" } })).toEqual({ "a.b": "second" });
  });

  it("rejects an empty delimiter", () => {
    expect(() => flattenDict({ a: "x" }, "")).toThrow(InvalidDelimiterError);
  });
});

describe("stringifyLeaf", () => {
  it("renders leaves as text", () => {
    expect(stringifyLeaf("hi")).toBe("hi");
    expect(stringifyLeaf(42)).toBe("42");
    expect(stringifyLeaf(false)).toBe("false");
    expect(stringifyLeaf(null)).toBe("");
  });
});
