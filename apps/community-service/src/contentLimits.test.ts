import { test } from "node:test";
import assert from "node:assert/strict";

process.env.NODE_ENV = "test";
process.env.JWT_SECRET = "test-secret-community-service-00000000";

const load = () => import("./contentLimits.js");

const DAY = 24 * 60 * 60 * 1000;

test("tiers follow account age, admins are trusted", async () => {
  const { userTier } = await load();
  const now = Date.parse("2030-06-30T00:00:00.000Z");
  const createdDaysAgo = (days: number) => new Date(now - days * DAY).toISOString();
  assert.equal(userTier({ is_admin: false, created_at: createdDaysAgo(1) }, now), "new");
  assert.equal(userTier({ is_admin: 0, created_at: createdDaysAgo(10) }, now), "regular");
  assert.equal(userTier({ is_admin: false, created_at: createdDaysAgo(45) }, now), "established");
  assert.equal(userTier({ is_admin: 1, created_at: createdDaysAgo(1) }, now), "trusted");
});

test("the shipped table carries the documented limits", async () => {
  const { loadLimitTable, ContentRateLimiter } = await load();
  const limiter = new ContentRateLimiter(loadLimitTable());
  assert.deepEqual(limiter.limitFor("forum_post", "new"), { hourly: 5, daily: 15, burst: 2 });
  assert.deepEqual(limiter.limitFor("event_create", "trusted"), {
    hourly: 5,
    daily: 15,
    weekly: 50,
    burst: 3
  });
});

test("burst overflow locks the user out for five minutes", async () => {
  const { ContentRateLimiter } = await load();
  let now = Date.parse("2030-01-01T00:00:00.000Z");
  const limiter = new ContentRateLimiter(
    { forum_post: { new: { hourly: 5, daily: 15, burst: 2 } } },
    () => now
  );

  const first = limiter.check("u1", "forum_post", "new");
  assert.deepEqual(first, {
    allowed: true,
    tier: "new",
    remaining: { hourly: 4, daily: 14, weekly: null, burst: 1 }
  });
  assert.equal(limiter.check("u1", "forum_post", "new").allowed, true);

  const third = limiter.check("u1", "forum_post", "new");
  assert.equal(third.allowed, false);
  if (!third.allowed) {
    assert.equal(third.reason, "burst_limit_exceeded");
    assert.equal(third.retryAfterSeconds, 300);
  }

  now += 60 * 1000;
  const locked = limiter.check("u1", "forum_post", "new");
  assert.equal(locked.allowed, false);
  if (!locked.allowed) {
    assert.equal(locked.reason, "locked_out");
    assert.equal(locked.retryAfterSeconds, 240);
  }

  // Other users and other content types are unaffected.
  assert.equal(limiter.check("u2", "forum_post", "new").allowed, true);

  now += 5 * 60 * 1000;
  assert.equal(limiter.check("u1", "forum_post", "new").allowed, true);
});

test("hourly limit applies once bursts are spaced out", async () => {
  const { ContentRateLimiter } = await load();
  let now = Date.parse("2030-01-01T00:00:00.000Z");
  const limiter = new ContentRateLimiter(
    { comment: { regular: { hourly: 2, daily: 10 } } },
    () => now
  );
  assert.equal(limiter.check("u1", "comment", "regular").allowed, true);
  now += 10 * 60 * 1000;
  assert.equal(limiter.check("u1", "comment", "regular").allowed, true);
  now += 10 * 60 * 1000;
  const denied = limiter.check("u1", "comment", "regular");
  assert.equal(denied.allowed, false);
  if (!denied.allowed) {
    assert.equal(denied.reason, "hourly_limit_exceeded");
    assert.equal(denied.limit, 2);
    assert.equal(denied.retryAfterSeconds, 40 * 60);
  }
});

test("unknown tiers fall back to the regular limits", async () => {
  const { ContentRateLimiter } = await load();
  const limiter = new ContentRateLimiter({ comment: { regular: { hourly: 1, daily: 1 } } });
  assert.deepEqual(limiter.limitFor("comment", "trusted"), { hourly: 1, daily: 1 });
  assert.equal(limiter.limitFor("poll_vote", "trusted"), undefined);
});

test("usage, overview and clear report per-user state", async () => {
  const { ContentRateLimiter } = await load();
  const now = Date.parse("2030-01-01T00:00:00.000Z");
  const limiter = new ContentRateLimiter(
    { poll_vote: { new: { hourly: 10, daily: 10, burst: 1 } } },
    () => now
  );
  limiter.check("u1", "poll_vote", "new");
  limiter.check("u1", "poll_vote", "new");

  assert.deepEqual(limiter.usage("u1"), {
    usage: { poll_vote: { hourlyUsage: 1, dailyUsage: 1 } },
    lockouts: {
      poll_vote: { lockedUntil: "2030-01-01T00:05:00.000Z", secondsRemaining: 300 }
    }
  });
  const overview = limiter.overview();
  assert.equal(overview.activeUsers, 1);
  assert.equal(overview.activeLockouts, 1);
  assert.equal(overview.trackedUsers, 1);

  assert.deepEqual(limiter.clear("u1"), { clearedAttempts: true, clearedLockouts: 1 });
  assert.deepEqual(limiter.usage("u1"), { usage: {}, lockouts: {} });
});
