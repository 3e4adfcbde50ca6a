type Labels = Record<string, string>;

interface Sample {
  value: number;
  labels: Labels;
}

interface Histogram {
  buckets: number[];
  counts: number[];
  sum: number;
  labels: Labels;
}

// Tick durations in seconds; the slow end covers stalled `ps` calls
const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5];

export class MetricsCollector {
  private counters = new Map<string, Sample[]>();
  private gauges = new Map<string, Sample[]>();
  private histograms = new Map<string, Histogram[]>();

  constructor(private readonly enabled: boolean = true) {}

  isEnabled(): boolean {
    return this.enabled;
  }

  incrementCounter(name: string, labels: Labels = {}, value: number = 1): void {
    if (!this.enabled) return;
    const sample = this.findOrCreate(this.counters, name, labels);
    sample.value += value;
  }

  setGauge(name: string, value: number, labels: Labels = {}): void {
    if (!this.enabled) return;
    const sample = this.findOrCreate(this.gauges, name, labels);
    sample.value = value;
  }

  observeHistogram(name: string, value: number, labels: Labels = {}): void {
    if (!this.enabled) return;

    let series = this.histograms.get(name);
    if (!series) {
      series = [];
      this.histograms.set(name, series);
    }

    let histogram = series.find(h => labelsMatch(h.labels, labels));
    if (!histogram) {
      histogram = {
        buckets: DEFAULT_BUCKETS,
        counts: new Array<number>(DEFAULT_BUCKETS.length + 1).fill(0),
        sum: 0,
        labels,
      };
      series.push(histogram);
    }

    histogram.sum += value;
    histogram.counts[findBucketIndex(value, histogram.buckets)] += 1;
  }

  getCounter(name: string, labels: Labels = {}): number {
    return this.counters.get(name)?.find(c => labelsMatch(c.labels, labels))?.value ?? 0;
  }

  getGauge(name: string, labels: Labels = {}): number | undefined {
    return this.gauges.get(name)?.find(g => labelsMatch(g.labels, labels))?.value;
  }

  /**
   * Prometheus text exposition format.
   */
  exportPrometheus(): string {
    if (!this.enabled) {
      return '# Metrics collection is disabled\n';
    }

    const lines: string[] = [];

    for (const [name, samples] of [...this.counters.entries(), ...this.gauges.entries()]) {
      for (const sample of samples) {
        lines.push(`${name}${formatLabels(sample.labels)} ${sample.value}`);
      }
    }

    for (const [name, series] of this.histograms.entries()) {
      for (const histogram of series) {
        let cumulative = 0;
        histogram.buckets.forEach((bound, i) => {
          cumulative += histogram.counts[i];
          lines.push(`${name}_bucket${formatLabels({ ...histogram.labels, le: String(bound) })} ${cumulative}`);
        });

        const total = histogram.counts.reduce((a, b) => a + b, 0);
        lines.push(`${name}_bucket${formatLabels({ ...histogram.labels, le: '+Inf' })} ${total}`);
        lines.push(`${name}_sum${formatLabels(histogram.labels)} ${histogram.sum}`);
        lines.push(`${name}_count${formatLabels(histogram.labels)} ${total}`);
      }
    }

    return lines.join('\n') + '\n';
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
  }

  private findOrCreate(store: Map<string, Sample[]>, name: string, labels: Labels): Sample {
    let samples = store.get(name);
    if (!samples) {
      samples = [];
      store.set(name, samples);
    }

    let sample = samples.find(s => labelsMatch(s.labels, labels));
    if (!sample) {
      sample = { value: 0, labels };
      samples.push(sample);
    }
    return sample;
  }
}

function labelsMatch(a: Labels, b: Labels): boolean {
  const keysA = Object.keys(a);
  if (keysA.length !== Object.keys(b).length) return false;
  return keysA.every(key => a[key] === b[key]);
}

function formatLabels(labels: Labels): string {
  const entries = Object.entries(labels).sort(([a], [b]) => a.localeCompare(b));
  if (entries.length === 0) return '';
  return `{${entries.map(([k, v]) => `${k}="${escapeLabelValue(v)}"`).join(',')}}`;
}

function escapeLabelValue(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n');
}

function findBucketIndex(value: number, buckets: number[]): number {
  const index = buckets.findIndex(bound => value <= bound);
  return index === -1 ? buckets.length : index;
}
