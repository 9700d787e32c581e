import { test } from "node:test";
import assert from "node:assert/strict";
import { appendUnique, classify, containsAny, type DerivedRule } from "../src/classifier.ts";
import type { KeywordTable } from "../src/types.ts";

const table: KeywordTable<"x" | "y" | "z"> = [
  { key: "x", keywords: ["alpha"] },
  { key: "y", keywords: ["beta", "gamma"] },
];

test("containsAny matches substrings", () => {
  assert.equal(containsAny("demonstrating a shot", ["demonstrat"]), true);
  assert.equal(containsAny("framing", ["frame rate"]), false);
  assert.equal(containsAny("anything", []), false);
});

test("appendUnique dedupes the seed and appends passing candidates in order", () => {
  const seed = ["b", "a", "b"];
  const result = appendUnique(seed, ["a", "c", "d"], (key) => key !== "d");
  assert.deepEqual(result, ["b", "a", "c"]);
  // Inputs are left alone.
  assert.deepEqual(seed, ["b", "a", "b"]);
});

test("classify follows table order, not text order", () => {
  assert.deepEqual(classify(table, "gamma then alpha"), ["x", "y"]);
});

test("classify keeps seeded keys first", () => {
  assert.deepEqual(classify(table, "alpha and beta", ["y"]), ["y", "x"]);
  assert.deepEqual(classify(table, "nothing here", ["y"]), ["y"]);
});

test("derived rules are scanned after their anchor", () => {
  const z: DerivedRule<"x" | "y" | "z"> = { key: "z", after: "x", applies: () => true };
  assert.deepEqual(classify(table, "alpha beta", [], [z]), ["x", "z", "y"]);
  assert.deepEqual(classify(table, "beta", [], [{ ...z, after: null }]), ["z", "y"]);
  assert.deepEqual(classify(table, "alpha beta", ["y"], [z]), ["y", "x", "z"]);
  assert.deepEqual(classify(table, "alpha", [], [{ ...z, applies: () => false }]), ["x"]);
});

test("a derived rule with an unknown anchor is scanned last", () => {
  const emptyTable: KeywordTable<"x" | "z"> = [];
  assert.deepEqual(classify(emptyTable, "", [], [{ key: "z", after: "x", applies: () => true }]), ["z"]);
});
