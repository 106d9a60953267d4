import { describe, expect, it } from "vitest";
import { format_value } from "../format";

describe("format_value", () => {
  it("uses String() for ordinary values", () => {
    expect(format_value("Lee")).toBe("Lee");
    expect(format_value(42)).toBe("42");
    expect(format_value(null)).toBe("null");
    expect(format_value(undefined)).toBe("undefined");
    expect(format_value(Symbol("k"))).toBe("Symbol(k)");
  });

  it("falls back to the object tag for null-prototype objects", () => {
    expect(format_value(Object.create(null))).toBe("[object Object]");
  });

  it("falls back when toString throws", () => {
    const hostile = {
      toString(): string {
        throw new Error("no");
      },
    };
    expect(format_value(hostile)).toBe("[object Object]");
  });
});
