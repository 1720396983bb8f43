import { createMetricsRegistry } from "@community/shared";

export const metrics = createMetricsRegistry({ service: "community-service" });

metrics.describe("requests_total", "HTTP responses by route, method and status");
metrics.describe("worker_runs_total", "Background worker runs by outcome");
metrics.describe("content_action_total", "User content submissions by type and decision");
metrics.describe("auth_events_total", "Authentication outcomes");

for (const type of ["event", "service", "thread", "post", "comment", "poll", "vote"]) {
  for (const decision of ["created", "rejected", "rate_limited"]) {
    metrics.incCounter("content_action_total", { type, decision }, 0);
  }
}
for (const outcome of ["login_success", "login_failed", "refresh", "register"]) {
  metrics.incCounter("auth_events_total", { outcome }, 0);
}
