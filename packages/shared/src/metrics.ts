export type MetricLabels = Record<string, string | number | boolean>;

type MetricType = "counter" | "gauge";

type MetricEntry = {
  name: string;
  labels: MetricLabels;
  value: number;
  type: MetricType;
};

const normalizeLabels = (labels: MetricLabels) =>
  Object.entries(labels)
    .map(([key, value]) => [key, String(value)] as const)
    .sort((a, b) => a[0].localeCompare(b[0]));

const labelsKey = (labels: MetricLabels) => JSON.stringify(normalizeLabels(labels));

const escapeLabelValue = (value: string) =>
  value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');

const formatLabels = (labels: MetricLabels) => {
  const entries = normalizeLabels(labels);
  if (!entries.length) return "";
  const formatted = entries.map(([key, value]) => `${key}="${escapeLabelValue(value)}"`);
  return `{${formatted.join(",")}}`;
};

export type MetricsRegistry = ReturnType<typeof createMetricsRegistry>;

export const createMetricsRegistry = (baseLabels: MetricLabels = {}) => {
  const entries = new Map<string, MetricEntry>();
  const help = new Map<string, string>();

  const keyFor = (name: string, labels: MetricLabels) => {
    const merged = { ...baseLabels, ...labels };
    return { merged, key: `${name}:${labelsKey(merged)}` };
  };

  const describe = (name: string, text: string) => {
    help.set(name, text);
  };

  const incCounter = (name: string, labels: MetricLabels = {}, delta = 1) => {
    const { merged, key } = keyFor(name, labels);
    const existing = entries.get(key);
    if (existing) {
      existing.value += delta;
      return;
    }
    entries.set(key, { name, labels: merged, value: delta, type: "counter" });
  };

  const setGauge = (name: string, labels: MetricLabels = {}, value: number) => {
    const { merged, key } = keyFor(name, labels);
    const existing = entries.get(key);
    if (existing) {
      existing.value = value;
      return;
    }
    entries.set(key, { name, labels: merged, value, type: "gauge" });
  };

  const render = () => {
    const lines: string[] = [];
    const seen = new Set<string>();
    for (const entry of entries.values()) {
      if (!seen.has(entry.name)) {
        const text = help.get(entry.name);
        if (text) {
          lines.push(`# HELP ${entry.name} ${text}`);
        }
        lines.push(`# TYPE ${entry.name} ${entry.type}`);
        seen.add(entry.name);
      }
      lines.push(`${entry.name}${formatLabels(entry.labels)} ${entry.value}`);
    }
    return lines.join("\n") + "\n";
  };

  return { describe, incCounter, setGauge, render };
};
