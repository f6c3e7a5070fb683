type Labels = Record<string, string | number | boolean | undefined>;

type HistogramBucket = {
  le: number;
  count: number;
};

type HistogramState = {
  count: number;
  sum: number;
  buckets: HistogramBucket[];
};

const counters = new Map<string, number>();
const histograms = new Map<string, HistogramState>();

const HELP: Record<string, { help: string; type: "counter" | "histogram" }> = {
  http_requests_total: { help: "Total number of HTTP requests", type: "counter" },
  http_request_duration_seconds: {
    help: "HTTP request duration in seconds",
    type: "histogram",
  },
  recovery_requests_total: {
    help: "Password recovery requests by outcome",
    type: "counter",
  },
  recovery_mail_total: {
    help: "Recovery mail deliveries by result",
    type: "counter",
  },
  recovery_account_save_total: {
    help: "Asynchronous account saves by result",
    type: "counter",
  },
};

const REQUEST_DURATION_BUCKETS = [
  0.005,
  0.01,
  0.025,
  0.05,
  0.1,
  0.25,
  0.5,
  1,
  2.5,
  5,
  10,
];

function escapeLabel(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

function sortedEntries(labels?: Labels): [string, string][] {
  if (!labels) return [];

  return Object.entries(labels)
    .filter((entry): entry is [string, string | number | boolean] => entry[1] !== undefined)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => [k, String(v)]);
}

function labelKey(labels?: Labels): string {
  return sortedEntries(labels)
    .map(([k, v]) => `${k}=${v}`)
    .join(",");
}

function labelText(labels?: Labels): string {
  const parts = sortedEntries(labels).map(([k, v]) => `${k}="${escapeLabel(v)}"`);
  if (parts.length === 0) return "";
  return `{${parts.join(",")}}`;
}

function seriesKey(name: string, labels?: Labels): string {
  const key = labelKey(labels);
  return key ? `${name}|${key}` : name;
}

function parseSeriesKey(key: string): { name: string; labels?: Labels } {
  const [name, raw] = key.split("|", 2);
  if (!raw) return { name };

  const labels: Labels = {};
  for (const part of raw.split(",")) {
    const [k, v] = part.split("=", 2);
    labels[k] = v;
  }
  return { name, labels };
}

export function incCounter(name: string, labels?: Labels, by = 1) {
  const key = seriesKey(name, labels);
  counters.set(key, (counters.get(key) ?? 0) + by);
}

export function getCounter(name: string, labels?: Labels): number {
  return counters.get(seriesKey(name, labels)) ?? 0;
}

export function observeHistogram(
  name: string,
  value: number,
  labels?: Labels,
  buckets: number[] = REQUEST_DURATION_BUCKETS,
) {
  const key = seriesKey(name, labels);

  let state = histograms.get(key);
  if (!state) {
    state = {
      count: 0,
      sum: 0,
      buckets: buckets.map((le) => ({ le, count: 0 })),
    };
    histograms.set(key, state);
  }

  state.count += 1;
  state.sum += value;

  for (const bucket of state.buckets) {
    if (value <= bucket.le) {
      bucket.count += 1;
    }
  }
}

export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationSeconds: number,
) {
  incCounter("http_requests_total", { method, route, status: statusCode });
  observeHistogram("http_request_duration_seconds", durationSeconds, { method, route });
}

export function recordRecoveryOutcome(outcome: string) {
  incCounter("recovery_requests_total", { outcome });
}

export function recordMailDelivery(success: boolean) {
  incCounter("recovery_mail_total", { result: success ? "sent" : "failed" });
}

export function recordAccountSave(success: boolean) {
  incCounter("recovery_account_save_total", { result: success ? "saved" : "failed" });
}

export function resetMetrics() {
  counters.clear();
  histograms.clear();
}

export function renderPrometheusMetrics(): string {
  const lines: string[] = [];
  const described = new Set<string>();

  const describe = (name: string) => {
    if (described.has(name)) return;
    described.add(name);
    const meta = HELP[name];
    if (!meta) return;
    lines.push(`# HELP ${name} ${meta.help}`);
    lines.push(`# TYPE ${name} ${meta.type}`);
  };

  for (const [key, value] of counters.entries()) {
    const { name, labels } = parseSeriesKey(key);
    describe(name);
    lines.push(`${name}${labelText(labels)} ${value}`);
  }

  for (const [key, state] of histograms.entries()) {
    const { name, labels } = parseSeriesKey(key);
    describe(name);

    for (const bucket of state.buckets) {
      lines.push(`${name}_bucket${labelText({ ...labels, le: bucket.le })} ${bucket.count}`);
    }

    lines.push(`${name}_bucket${labelText({ ...labels, le: "+Inf" })} ${state.count}`);
    lines.push(`${name}_sum${labelText(labels)} ${state.sum}`);
    lines.push(`${name}_count${labelText(labels)} ${state.count}`);
  }

  if (lines.length === 0) {
    return "\n";
  }

  return `${lines.join("\n")}\n`;
}
