import { describe, expect, it } from "vitest";
import { OrderedStore } from "../ordered_store";
import { HashVecError } from "utils/error";

function make(...keys: string[]): OrderedStore<string, number> {
  const s = new OrderedStore<string, number>();
  keys.forEach((k, i) => s.append(k, i));
  return s;
}

describe("OrderedStore", () => {
  //=========================================================
  // append / read / write
  //=========================================================

  it("empty store has size 0", () => {
    const s = new OrderedStore<string, number>();
    expect(s.size).toBe(0);
    expect(s.keys).toEqual([]);
    expect(s.values).toEqual([]);
  });

  it("append returns the new position", () => {
    const s = new OrderedStore<string, number>();
    expect(s.append("a", 1)).toBe(0);
    expect(s.append("b", 2)).toBe(1);
    expect(s.size).toBe(2);
  });

  it("key_at / value_at read by position", () => {
    const s = make("a", "b", "c");
    expect(s.key_at(1)).toBe("b");
    expect(s.value_at(2)).toBe(2);
  });

  it("reads outside [0, size) throw", () => {
    const s = make("a");
    expect(() => s.key_at(1)).toThrow(HashVecError);
    expect(() => s.value_at(-1)).toThrow(HashVecError);
  });

  it("set_key / set_value write in place", () => {
    const s = make("a", "b");
    s.set_key(0, "z");
    s.set_value(1, 99);
    expect(s.keys).toEqual(["z", "b"]);
    expect(s.values).toEqual([0, 99]);
  });

  it("writes outside [0, size) throw and change nothing", () => {
    const s = make("a");
    expect(() => s.set_value(1, 5)).toThrow(HashVecError);
    expect(() => s.set_key(3, "x")).toThrow(HashVecError);
    expect(s.keys).toEqual(["a"]);
    expect(s.values).toEqual([0]);
  });

  //=========================================================
  // insert_at / remove_at
  //=========================================================

  it("insert_at shifts the tail later", () => {
    const s = make("a", "b", "c");
    s.insert_at(1, "x", 10);
    expect(s.keys).toEqual(["a", "x", "b", "c"]);
    expect(s.values).toEqual([0, 10, 1, 2]);
  });

  it("insert_at at size appends", () => {
    const s = make("a");
    s.insert_at(1, "b", 7);
    expect(s.keys).toEqual(["a", "b"]);
  });

  it("insert_at beyond size throws", () => {
    const s = make("a");
    expect(() => s.insert_at(2, "b", 7)).toThrow(HashVecError);
    expect(s.size).toBe(1);
  });

  it("remove_at returns the entry and preserves order", () => {
    const s = make("a", "b", "c", "d");
    expect(s.remove_at(1)).toEqual(["b", 1]);
    expect(s.keys).toEqual(["a", "c", "d"]);
    expect(s.values).toEqual([0, 2, 3]);
  });

  it("remove_at on an empty store throws", () => {
    const s = new OrderedStore<string, number>();
    expect(() => s.remove_at(0)).toThrow(HashVecError);
  });

  //=========================================================
  // pop / swap / clear / detach
  //=========================================================

  it("pop removes the last entry", () => {
    const s = make("a", "b");
    expect(s.pop()).toEqual(["b", 1]);
    expect(s.pop()).toEqual(["a", 0]);
    expect(s.pop()).toBeUndefined();
    expect(s.size).toBe(0);
  });

  it("swap exchanges keys and values together", () => {
    const s = make("a", "b", "c");
    s.swap(0, 2);
    expect(s.keys).toEqual(["c", "b", "a"]);
    expect(s.values).toEqual([2, 1, 0]);
  });

  it("swap with an invalid position throws and changes nothing", () => {
    const s = make("a", "b");
    expect(() => s.swap(0, 2)).toThrow(HashVecError);
    expect(s.keys).toEqual(["a", "b"]);
  });

  it("clear empties the store", () => {
    const s = make("a", "b");
    s.clear();
    expect(s.size).toBe(0);
    expect(s.append("c", 3)).toBe(0);
  });

  it("detach hands over the arrays and leaves the store empty", () => {
    const s = make("a", "b");
    const [keys, values] = s.detach();
    expect(keys).toEqual(["a", "b"]);
    expect(values).toEqual([0, 1]);
    expect(s.size).toBe(0);
    s.append("c", 2);
    expect(keys).toEqual(["a", "b"]);
  });
});
