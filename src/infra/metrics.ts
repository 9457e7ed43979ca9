import type { DisputeStatus } from "../domain/types.js";

type Labels = Readonly<Record<string, string>>;

interface Series<TValue> {
  labels: Labels;
  value: TValue;
}

function renderLabels(labels: Labels): string {
  const pairs = Object.entries(labels).map(
    ([name, value]) => `${name}="${value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"')}"`,
  );
  return pairs.length === 0 ? "" : `{${pairs.join(",")}}`;
}

/** Keeps one entry per distinct label set, in first-seen order. */
class SeriesTable<TValue> {
  private readonly series = new Map<string, Series<TValue>>();

  constructor(private readonly initial: () => TValue) {}

  get(labels: Labels): Series<TValue> {
    const key = JSON.stringify(Object.values(labels));
    let entry = this.series.get(key);
    if (!entry) {
      entry = { labels, value: this.initial() };
      this.series.set(key, entry);
    }
    return entry;
  }

  entries(): IterableIterator<Series<TValue>> {
    return this.series.values();
  }
}

class Counter {
  private readonly table = new SeriesTable(() => 0);

  constructor(
    readonly name: string,
    private readonly help: string,
  ) {}

  inc(labels: Labels = {}): void {
    this.table.get(labels).value += 1;
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} counter`];
    for (const { labels, value } of this.table.entries()) {
      lines.push(`${this.name}${renderLabels(labels)} ${value}`);
    }
    return lines;
  }
}

interface DurationStats {
  count: number;
  sum: number;
  /** Cumulative counts, aligned with the bucket bounds. */
  below: number[];
}

class DurationHistogram {
  private readonly table: SeriesTable<DurationStats>;

  constructor(
    readonly name: string,
    private readonly help: string,
    private readonly bounds: readonly number[],
  ) {
    this.table = new SeriesTable(() => ({ count: 0, sum: 0, below: bounds.map(() => 0) }));
  }

  observe(labels: Labels, seconds: number): void {
    const stats = this.table.get(labels).value;
    stats.count += 1;
    stats.sum += seconds;
    stats.below = stats.below.map((count, index) => (seconds <= (this.bounds[index] ?? 0) ? count + 1 : count));
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`];
    for (const { labels, value } of this.table.entries()) {
      const buckets = [
        ...this.bounds.map((bound, index) => ({ le: String(bound), count: value.below[index] ?? 0 })),
        { le: "+Inf", count: value.count },
      ];
      for (const bucket of buckets) {
        lines.push(`${this.name}_bucket${renderLabels({ ...labels, le: bucket.le })} ${bucket.count}`);
      }
      lines.push(`${this.name}_sum${renderLabels(labels)} ${value.sum}`);
      lines.push(`${this.name}_count${renderLabels(labels)} ${value.count}`);
    }
    return lines;
  }
}

export class DisputeMetricsRegistry {
  private readonly httpRequests = new Counter(
    "dsp_http_requests_total",
    "Total number of HTTP requests handled by route, method, and status code.",
  );
  private readonly httpDuration = new DurationHistogram(
    "dsp_http_request_duration_seconds",
    "HTTP request duration in seconds by route and method.",
    [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  );
  private readonly disputesFiled = new Counter(
    "dsp_disputes_filed_total",
    "Total number of dispute cases created by initial status.",
  );
  private readonly duplicateRejections = new Counter(
    "dsp_duplicate_rejections_total",
    "Total number of filings rejected because a case already exists.",
  );
  private readonly storeRetries = new Counter(
    "dsp_store_retries_total",
    "Total number of throttled store calls retried by operation.",
  );
  private readonly caseResolutions = new Counter(
    "dsp_case_resolutions_total",
    "Total number of manual case resolutions by target status.",
  );

  recordHttpRequest(method: string, route: string, statusCode: number, durationSeconds: number): void {
    const verb = method.toUpperCase();
    this.httpRequests.inc({ method: verb, route, status_code: String(statusCode) });
    this.httpDuration.observe({ method: verb, route }, durationSeconds);
  }

  recordDisputeFiled(status: DisputeStatus): void {
    this.disputesFiled.inc({ status });
  }

  recordDuplicateRejection(): void {
    this.duplicateRejections.inc();
  }

  recordStoreRetry(operation: string): void {
    this.storeRetries.inc({ operation });
  }

  recordCaseResolution(status: DisputeStatus): void {
    this.caseResolutions.inc({ status });
  }

  renderPrometheus(): string {
    const lines = [
      ...this.httpRequests.render(),
      ...this.httpDuration.render(),
      ...this.disputesFiled.render(),
      ...this.duplicateRejections.render(),
      ...this.storeRetries.render(),
      ...this.caseResolutions.render(),
    ];
    return `${lines.join("\n")}\n`;
  }
}
