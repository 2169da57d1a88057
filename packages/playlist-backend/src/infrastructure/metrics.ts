// packages/playlist-backend/src/infrastructure/metrics.ts

// Minimal metrics facade used by the pipeline executor and worker pool.
// Default implementation is noop so the service runs without a metrics stack.
// Hook up Prometheus/statsd/etc by replacing the exported `metrics` in one place.

export interface MetricsTags {
  [key: string]: string | number | boolean | undefined;
}

export interface Metrics {
  increment(name: string, value?: number, tags?: MetricsTags): void;
  timing(name: string, ms: number, tags?: MetricsTags): void;
}

// metrics.declaration()
export const metrics: Metrics = {
  increment() {
    // noop
  },
  timing() {
    // noop
  },
};

export interface RecordedMetric {
  name: string;
  value: number;
  tags?: MetricsTags;
}

/** Keeps every sample in memory; lets tests assert on emitted metrics. */
export class RecordingMetrics implements Metrics {
  readonly counters: RecordedMetric[] = [];
  readonly timings: RecordedMetric[] = [];

  increment(name: string, value = 1, tags?: MetricsTags): void {
    this.counters.push({ name, value, tags });
  }

  timing(name: string, ms: number, tags?: MetricsTags): void {
    this.timings.push({ name, value: ms, tags });
  }

  count(name: string, tags?: MetricsTags): number {
    return this.counters
      .filter((entry) => entry.name === name && matchesTags(entry.tags, tags))
      .reduce((sum, entry) => sum + entry.value, 0);
  }
}

function matchesTags(actual: MetricsTags | undefined, expected: MetricsTags | undefined): boolean {
  if (!expected) return true;
  return Object.entries(expected).every(([key, value]) => actual?.[key] === value);
}
