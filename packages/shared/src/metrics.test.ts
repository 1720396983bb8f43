import { test } from "node:test";
import assert from "node:assert/strict";
import { createMetricsRegistry } from "./metrics.js";

test("counters accumulate per label set and render with base labels", () => {
  const registry = createMetricsRegistry({ service: "svc" });
  registry.describe("requests_total", "HTTP requests");
  registry.incCounter("requests_total", { method: "GET" });
  registry.incCounter("requests_total", { method: "GET" }, 2);
  registry.incCounter("requests_total", { method: "POST" });

  assert.equal(
    registry.render(),
    [
      "# HELP requests_total HTTP requests",
      "# TYPE requests_total counter",
      'requests_total{method="GET",service="svc"} 3',
      'requests_total{method="POST",service="svc"} 1',
      ""
    ].join("\n")
  );
});

test("gauges are overwritten and label values are escaped", () => {
  const registry = createMetricsRegistry();
  registry.setGauge("backlog", { queue: 'mail "outbox"' }, 4);
  registry.setGauge("backlog", { queue: 'mail "outbox"' }, 1);
  assert.equal(registry.render(), '# TYPE backlog gauge\nbacklog{queue="mail \\"outbox\\""} 1\n');
});
