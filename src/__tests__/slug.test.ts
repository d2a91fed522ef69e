import assert from "node:assert/strict";
import test from "node:test";

import { createSlug } from "../slug.js";

test("createSlug lowercases, hyphenates and strips punctuation", () => {
  assert.equal(createSlug("One Piece!"), "one-piece");
});

test("createSlug collapses doubled hyphens and trims the ends", () => {
  assert.equal(createSlug("  Hello   World  "), "hello-world");
  assert.equal(createSlug("Re:Zero -- Starting Life"), "rezero-starting-life");
  assert.equal(createSlug("-Edge-"), "edge");
});

test("createSlug drops non-ASCII letters and may return an empty slug", () => {
  assert.equal(createSlug("Café 24"), "caf-24");
  assert.equal(createSlug("!!!"), "");
});
