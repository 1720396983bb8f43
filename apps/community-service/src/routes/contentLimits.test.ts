import { test, after } from "node:test";
import assert from "node:assert/strict";
import { bearer, createUser, hoursFromNow, startApp, stopApp } from "../testSupport.js";

process.env.CONTENT_RATE_LIMITS_ENABLED = "true";

const app = await startApp();
const { metrics } = await import("../metrics.js");

after(async () => {
  await stopApp(app);
});

const newcomer = await createUser({ displayName: "Eager" });

const createEvent = (title: string) =>
  app.inject({
    method: "POST",
    url: "/v1/events",
    headers: bearer(newcomer.token),
    payload: { title, description: "Bring snacks", startDatetime: hoursFromNow(48) }
  });

test("a second event inside the burst window is refused with 429", async () => {
  const first = await createEvent("Board games");
  assert.equal(first.statusCode, 201);

  const second = await createEvent("More board games");
  assert.equal(second.statusCode, 429);
  assert.equal(second.json().error, "rate_limited");
  assert.equal(second.json().details, "burst_limit_exceeded (5 minutes)");
  assert.equal(second.headers["retry-after"], "300");
  assert.match(
    metrics.render(),
    /content_action_total\{decision="rate_limited",service="community-service",type="event"\} 1/
  );
});

test("the lockout keeps refusing with the remaining wait", async () => {
  const third = await createEvent("Even more board games");
  assert.equal(third.statusCode, 429);
  assert.equal(third.json().details, "locked_out (lockout)");
  const retryAfter = Number(third.headers["retry-after"]);
  assert.ok(retryAfter > 0 && retryAfter <= 300);
});
