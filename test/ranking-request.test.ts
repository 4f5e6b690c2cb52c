import test from "node:test";
import assert from "node:assert/strict";
import { parseRankingRequest } from "../src/controller/request.js";
import type { RankingRequest } from "../src/types.js";

const DEFAULT_TIMING = { previewMs: 5000, flashMs: 250 };

test("parseRankingRequest fills missing timing from defaults", () => {
  const parsed = parseRankingRequest(
    { options: [{ id: 3, stimulus: "a" }, { id: 8, stimulus: "b" }], timing: { flashMs: 100 } },
    DEFAULT_TIMING,
  );
  assert.deepEqual(parsed, {
    ok: true,
    options: [{ id: 3, stimulus: "a" }, { id: 8, stimulus: "b" }],
    timing: { previewMs: 5000, flashMs: 100 },
  });
});

test("parseRankingRequest refuses an empty option set", () => {
  assert.deepEqual(parseRankingRequest({ options: [] }, DEFAULT_TIMING), {
    ok: false,
    reason: "options: option set is empty",
  });
});

test("parseRankingRequest refuses duplicate option ids", () => {
  assert.deepEqual(
    parseRankingRequest({ options: [{ id: 1, stimulus: "a" }, { id: 1, stimulus: "b" }] }, DEFAULT_TIMING),
    { ok: false, reason: "options: option ids must be unique" },
  );
});

test("parseRankingRequest refuses fractional ids and non-positive timing", () => {
  const fractional = parseRankingRequest({ options: [{ id: 1.5, stimulus: "a" }] }, DEFAULT_TIMING);
  assert.equal(fractional.ok, false);
  assert.match(fractional.ok ? "" : fractional.reason, /^options\.0\.id: /);

  const timing = parseRankingRequest(
    { options: [{ id: 1, stimulus: "a" }], timing: { previewMs: -1 } },
    DEFAULT_TIMING,
  );
  assert.equal(timing.ok, false);
  assert.match(timing.ok ? "" : timing.reason, /^timing\.previewMs: /);
});

test("parseRankingRequest declines null and non-object options from the wire", () => {
  const withNull: RankingRequest<string> = JSON.parse('{"options":[null]}');
  const nulled = parseRankingRequest(withNull, DEFAULT_TIMING);
  assert.equal(nulled.ok, false);
  assert.match(nulled.ok ? "" : nulled.reason, /^options\.0: /);

  const withNumber: RankingRequest<string> = JSON.parse('{"options":[{"id":1,"stimulus":"a"},7]}');
  const numbered = parseRankingRequest(withNumber, DEFAULT_TIMING);
  assert.equal(numbered.ok, false);
  assert.match(numbered.ok ? "" : numbered.reason, /^options\.1: /);
});

test("parseRankingRequest declines a request without an option list", () => {
  const missing: RankingRequest<string> = JSON.parse('{"timing":{"flashMs":100}}');
  const parsed = parseRankingRequest(missing, DEFAULT_TIMING);
  assert.equal(parsed.ok, false);
  assert.match(parsed.ok ? "" : parsed.reason, /^options: /);
});
