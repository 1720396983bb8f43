import { test } from "node:test";
import assert from "node:assert/strict";

process.env.NODE_ENV = "test";
process.env.JWT_SECRET = "test-secret-community-service-00000000";

const load = async () => (await import("./moderation.js")).checkContent;

test("ordinary text passes untouched", async () => {
  const checkContent = await load();
  assert.deepEqual(checkContent("Hello neighbours, see you at the park on Sunday"), {
    isFlagged: false,
    confidence: 0,
    reasons: [],
    requiresReview: false
  });
});

test("a single link scores but stays below review", async () => {
  const checkContent = await load();
  assert.deepEqual(checkContent("Details at https://example.com"), {
    isFlagged: false,
    confidence: 0.3,
    reasons: ["Contains URL"],
    requiresReview: false
  });
});

test("link plus phone number crosses the flag threshold", async () => {
  const checkContent = await load();
  const result = checkContent("Call 01234567890 now or see www.example.org");
  assert.equal(result.confidence, 0.8);
  assert.deepEqual(result.reasons, ["Contains URL", "Contains phone number"]);
  assert.equal(result.isFlagged, true);
  assert.equal(result.requiresReview, true);
});

test("banned words match whole words case-insensitively", async () => {
  const checkContent = await load();
  const result = checkContent("Du bist ein Arschloch");
  assert.equal(result.confidence, 0.8);
  assert.deepEqual(result.reasons, ["Contains inappropriate language"]);
  assert.equal(result.isFlagged, true);
});

test("caps, repeated characters and repeated words each add to the score", async () => {
  const checkContent = await load();
  assert.deepEqual(checkContent("HELLO everyone").reasons, ["Excessive caps"]);
  assert.equal(checkContent("HELLO everyone").confidence, 0.2);
  assert.deepEqual(checkContent("that was sooooo good").reasons, ["Suspicious pattern detected"]);

  const repetitive = checkContent("buy buy buy buy buy now please friends in the town");
  assert.deepEqual(repetitive.reasons, ["Repetitive content"]);
  assert.equal(repetitive.confidence, 0.4);
  assert.equal(repetitive.requiresReview, true);
  assert.equal(repetitive.isFlagged, false);
});

test("confidence is capped at one", async () => {
  const checkContent = await load();
  const result = checkContent("ARSCHLOCH spast https://x.io");
  assert.equal(result.confidence, 1);
  assert.deepEqual(result.reasons, [
    "Contains inappropriate language",
    "Contains URL",
    "Excessive caps"
  ]);
});

test("the flag threshold is configurable", async () => {
  const checkContent = await load();
  assert.equal(checkContent("Call 01234567890 or see www.example.org", 0.9).isFlagged, false);
});

test("the threshold is compared against the capped confidence", async () => {
  const checkContent = await load();
  const result = checkContent("ARSCHLOCH spast https://x.io", 1);
  assert.equal(result.confidence, 1);
  assert.equal(result.isFlagged, false);
  assert.equal(result.requiresReview, true);
});
