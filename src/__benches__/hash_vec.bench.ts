import { bench, describe } from "vitest";
import { HashVec } from "../hash_vec/hash_vec";

//=========================================================
// Helpers
//=========================================================

function xorshift32(seed: number) {
  let state = seed;
  return () => {
    state ^= state << 13;
    state ^= state >> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}

function filled(n: number): HashVec<number, number> {
  const hv = new HashVec<number, number>();
  for (let i = 0; i < n; i++) hv.insert(i, i);
  return hv;
}

//=========================================================
// Insertion
//=========================================================

describe("insertion", () => {
  bench("insert_10k", () => {
    filled(10_000);
  });

  bench("push_existing_1k_of_10k", () => {
    const hv = filled(10_000);
    for (let i = 0; i < 1_000; i++) hv.push([i, -i]);
  });

  bench("insert_at_front_1k", () => {
    const hv = new HashVec<number, number>();
    for (let i = 0; i < 1_000; i++) hv.insert_at(0, i, i);
  });
});

//=========================================================
// Lookup
//=========================================================

describe("lookup", () => {
  const hv = filled(10_000);
  const rand = xorshift32(0x9e3779b9);

  bench("get_random_10k", () => {
    for (let i = 0; i < 10_000; i++) hv.get(Math.floor(rand() * 10_000));
  });

  bench("at_sequential_10k", () => {
    for (let i = 0; i < 10_000; i++) hv.at(i);
  });

  bench("iterate_10k", () => {
    let sum = 0;
    for (const [, v] of hv) sum += v;
    if (sum < 0) throw new Error("unreachable");
  });
});

//=========================================================
// Removal & reordering
//=========================================================

describe("removal", () => {
  bench("remove_front_1k_of_10k", () => {
    const hv = filled(10_000);
    for (let i = 0; i < 1_000; i++) hv.remove(i);
  });

  bench("pop_10k", () => {
    const hv = filled(10_000);
    while (hv.pop() !== undefined);
  });

  bench("swap_indices_10k", () => {
    const hv = filled(10_000);
    for (let i = 0; i < 5_000; i++) hv.swap_indices(i, 9_999 - i);
  });
});
