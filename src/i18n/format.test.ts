import { describe, expect, it } from "vitest";
import { formatTemplate, joinList, stringifyParam } from "./format.js";

describe("formatTemplate", () => {
  it("substitutes placeholders", () => {
    expect(formatTemplate("Hello, {name}!", { name: "Ada" })).toBe("Hello, Ada!");
  });

  it("keeps unknown placeholders as-is", () => {
    expect(formatTemplate("Hi {who}, meet {name}", { name: "Ada" })).toBe("Hi {who}, meet Ada");
  });

  it("ignores inherited object properties", () => {
    expect(formatTemplate("{toString}", {})).toBe("{toString}");
  });

  it("treats doubled braces as literal braces", () => {
    expect(formatTemplate("{{name}} is {name}", { name: "x" })).toBe("{name} is x");
    expect(formatTemplate("{{{name}}}", { name: "x" })).toBe("{x}");
  });

  it("leaves unbalanced braces alone", () => {
    expect(formatTemplate("a } b {", { b: "x" })).toBe("a } b {");
    expect(formatTemplate("{}", {})).toBe("{}");
  });

  it("resolves dotted names", () => {
    expect(formatTemplate("Reply {common.yes}", { "common.yes": "yes" })).toBe("Reply yes");
  });

  it("does not expand substituted text again", () => {
    expect(formatTemplate("{a}", { a: "{b}", b: "x" })).toBe("{b}");
  });

  it("accepts a lookup function", () => {
    const seen: string[] = [];
    const result = formatTemplate("{a}-{b}", (name) => {
      seen.push(name);
      return name === "a" ? "1" : undefined;
    });
    expect(result).toBe("1-{b}");
    expect(seen).toEqual(["a", "b"]);
  });
});

describe("joinList", () => {
  it("joins by list length", () => {
    expect(joinList([], " and ")).toBe("");
    expect(joinList(["a"], " and ")).toBe("a");
    expect(joinList(["a", "b"], " and ")).toBe("a and b");
    expect(joinList(["a", "b", "c"], " or ")).toBe("a, b or c");
  });

  it("uses a custom separator", () => {
    expect(joinList(["a", "b", "c", "d"], " & ", "; ")).toBe("a; b; c & d");
  });
});

describe("stringifyParam", () => {
  it("renders scalars", () => {
    expect(stringifyParam("x")).toBe("x");
    expect(stringifyParam(3)).toBe("3");
    expect(stringifyParam(10n)).toBe("10");
    expect(stringifyParam(true)).toBe("true");
    expect(stringifyParam(null)).toBe("");
    expect(stringifyParam(undefined)).toBe("");
  });

  it("joins lists with commas by default", () => {
    expect(stringifyParam(["a", "b"])).toBe("a, b");
    expect(stringifyParam([1, [2, 3]])).toBe("1, 2, 3");
  });

  it("passes lists through the list formatter", () => {
    expect(stringifyParam(["a", "b"], (items) => items.join("/"))).toBe("a/b");
  });
});
