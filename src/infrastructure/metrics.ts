/**
 * Lightweight Prometheus Metrics
 *
 * Counter / gauge / histogram primitives rendered to Prometheus text
 * format, covering HTTP traffic, report saves, publishes and the
 * subscriber census.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface Labels {
  [key: string]: string;
}

interface Metric {
  render(): string;
}

/** Latency buckets in milliseconds; SSE connections land in +Inf. */
const LATENCY_BUCKETS_MS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

// ─────────────────────────────────────────────────────────────────────────────
// Primitives
// ─────────────────────────────────────────────────────────────────────────────

class Counter implements Metric {
  private readonly series = new Map<string, number>();

  constructor(
    private readonly name: string,
    private readonly help: string,
  ) {}

  inc(labels: Labels = {}, amount = 1): void {
    const key = serializeLabels(labels);
    this.series.set(key, (this.series.get(key) ?? 0) + amount);
  }

  render(): string {
    return renderFamily(this.name, this.help, 'counter', this.series);
  }
}

/** Gauge whose samples are read from `collect` at scrape time. */
class CollectedGauge implements Metric {
  constructor(
    private readonly name: string,
    private readonly help: string,
    private readonly collect: () => Map<string, number>,
  ) {}

  render(): string {
    return renderFamily(this.name, this.help, 'gauge', this.collect());
  }
}

interface HistogramSeries {
  count: number;
  sum: number;
  bucketCounts: number[];
}

class Histogram implements Metric {
  private readonly series = new Map<string, HistogramSeries>();

  constructor(
    private readonly name: string,
    private readonly help: string,
  ) {}

  observe(labels: Labels, value: number): void {
    const key = serializeLabels(labels);
    const entry = this.series.get(key) ?? this.createSeries(key);
    entry.count += 1;
    entry.sum += value;
    LATENCY_BUCKETS_MS.forEach((bound, i) => {
      if (value <= bound) {
        entry.bucketCounts[i] = (entry.bucketCounts[i] ?? 0) + 1;
      }
    });
  }

  private createSeries(key: string): HistogramSeries {
    const entry: HistogramSeries = { count: 0, sum: 0, bucketCounts: LATENCY_BUCKETS_MS.map(() => 0) };
    this.series.set(key, entry);
    return entry;
  }

  render(): string {
    const lines = header(this.name, this.help, 'histogram');
    for (const [key, entry] of this.series) {
      LATENCY_BUCKETS_MS.forEach((bound, i) => {
        lines.push(`${this.name}_bucket${withLabel(key, 'le', String(bound))} ${entry.bucketCounts[i] ?? 0}`);
      });
      lines.push(`${this.name}_bucket${withLabel(key, 'le', '+Inf')} ${entry.count}`);
      lines.push(`${this.name}_sum${key} ${entry.sum}`);
      lines.push(`${this.name}_count${key} ${entry.count}`);
    }
    return lines.join('\n');
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Text format helpers
// ─────────────────────────────────────────────────────────────────────────────

function header(name: string, help: string, type: string): string[] {
  return [`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`];
}

function renderFamily(name: string, help: string, type: string, series: Map<string, number>): string {
  const lines = header(name, help, type);
  for (const [key, value] of series) {
    lines.push(`${name}${key} ${value}`);
  }
  return lines.join('\n');
}

function serializeLabels(labels: Labels): string {
  const pairs = Object.entries(labels).map(([k, v]) => `${k}="${v}"`);
  return pairs.length ? `{${pairs.join(',')}}` : '';
}

/** Appends one label to an already serialized label set. */
function withLabel(key: string, name: string, value: string): string {
  const pair = `${name}="${value}"`;
  return key ? `${key.slice(0, -1)},${pair}}` : `{${pair}}`;
}

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

const registry: Metric[] = [];

function register<M extends Metric>(metric: M): M {
  registry.push(metric);
  return metric;
}

/** Render all registered metrics in Prometheus text exposition format. */
export function renderMetrics(): string {
  return registry.map((m) => m.render()).join('\n\n') + '\n';
}

// ─────────────────────────────────────────────────────────────────────────────
// Application Metrics
// ─────────────────────────────────────────────────────────────────────────────

export const httpRequestsTotal = register(
  new Counter('report_stream_http_requests_total', 'Total HTTP requests handled'),
);

/** For the SSE stream this is the lifetime of the connection. */
export const httpRequestDurationMs = register(
  new Histogram('report_stream_http_request_duration_ms', 'HTTP request latency in milliseconds'),
);

/** Labelled by outcome: saved, empty_content, storage_error. */
export const reportsSavedTotal = register(
  new Counter('report_stream_reports_saved_total', 'Report save attempts by outcome'),
);

export const reportsPublishedTotal = register(
  new Counter('report_stream_reports_published_total', 'Reports published to subscribers'),
);

export const subscribersWokenTotal = register(
  new Counter('report_stream_subscribers_woken_total', 'Parked subscriptions woken by publishes'),
);

export const sessionsClosedTotal = register(
  new Counter('report_stream_sessions_closed_total', 'Stream sessions closed by reason'),
);

let subscriberCountSource: (() => number) | null = null;

register(
  new CollectedGauge(
    'report_stream_active_subscribers',
    'Subscribers currently connected to the report stream',
    () => new Map<string, number>(subscriberCountSource ? [['', subscriberCountSource()]] : []),
  ),
);

/** Point the active-subscribers gauge at a live count (the subscriber registry). */
export function setSubscriberCountSource(source: (() => number) | null): void {
  subscriberCountSource = source;
}
