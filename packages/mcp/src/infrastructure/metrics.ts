/**
 * Metrics Collector
 *
 * Collects operational metrics for the MCP server:
 * - Tool call counts and durations
 * - Error counts by code
 */

export interface MetricLabels {
  tool?: string | undefined;
  success?: string | undefined;
  errorCode?: string | undefined;
}

type LabelName = keyof MetricLabels;

const LABEL_NAMES: readonly LabelName[] = ['tool', 'success', 'errorCode'];

export interface HistogramBuckets {
  le_10: number;
  le_50: number;
  le_100: number;
  le_250: number;
  le_500: number;
  le_1000: number;
  le_2500: number;
  le_5000: number;
  le_inf: number;
  sum: number;
  count: number;
}

export interface MetricsSummary {
  totalRequests: number;
  totalErrors: number;
  avgDurationMs: number;
  requestsByTool: Record<string, number>;
  errorsByCode: Record<string, number>;
}

export const METRIC_NAMES = {
  requests: 'sonargate_mcp_requests_total',
  errors: 'sonargate_mcp_errors_total',
  duration: 'sonargate_mcp_request_duration_ms',
} as const;

const BUCKET_BOUNDS: ReadonlyArray<[number, Exclude<keyof HistogramBuckets, 'le_inf' | 'sum' | 'count'>]> = [
  [10, 'le_10'],
  [50, 'le_50'],
  [100, 'le_100'],
  [250, 'le_250'],
  [500, 'le_500'],
  [1000, 'le_1000'],
  [2500, 'le_2500'],
  [5000, 'le_5000'],
];

export class MetricsCollector {
  private counters: Map<string, number> = new Map();
  private histograms: Map<string, HistogramBuckets> = new Map();

  /**
   * Increment a counter
   */
  increment(name: string, labels: MetricLabels = {}, value: number = 1): void {
    const key = this.makeKey(name, labels);
    const current = this.counters.get(key) ?? 0;
    this.counters.set(key, current + value);
  }

  /**
   * Record a histogram observation
   */
  observe(name: string, value: number, labels: MetricLabels = {}): void {
    const key = this.makeKey(name, labels);

    let buckets = this.histograms.get(key);
    if (!buckets) {
      buckets = createEmptyBuckets();
      this.histograms.set(key, buckets);
    }

    for (const [bound, bucket] of BUCKET_BOUNDS) {
      if (value <= bound) buckets[bucket]++;
    }
    buckets.le_inf++;
    buckets.sum += value;
    buckets.count++;
  }

  // Convenience methods for common metrics

  recordRequest(tool: string, durationMs: number, success: boolean): void {
    this.increment(METRIC_NAMES.requests, { tool, success: String(success) });
    this.observe(METRIC_NAMES.duration, durationMs, { tool });
  }

  recordError(tool: string, errorCode: string): void {
    this.increment(METRIC_NAMES.errors, { tool, errorCode });
  }

  getSummary(): MetricsSummary {
    let totalRequests = 0;
    let totalErrors = 0;
    const requestsByTool: Record<string, number> = {};
    const errorsByCode: Record<string, number> = {};

    for (const [key, value] of this.counters) {
      const { name, labels } = this.parseKey(key);
      if (name === METRIC_NAMES.requests) {
        totalRequests += value;
        if (labels.tool !== undefined) {
          requestsByTool[labels.tool] = (requestsByTool[labels.tool] ?? 0) + value;
        }
      }
      if (name === METRIC_NAMES.errors) {
        totalErrors += value;
        if (labels.errorCode !== undefined) {
          errorsByCode[labels.errorCode] = (errorsByCode[labels.errorCode] ?? 0) + value;
        }
      }
    }

    let totalDuration = 0;
    let durationCount = 0;
    for (const [key, buckets] of this.histograms) {
      if (this.parseKey(key).name === METRIC_NAMES.duration) {
        totalDuration += buckets.sum;
        durationCount += buckets.count;
      }
    }

    return {
      totalRequests,
      totalErrors,
      avgDurationMs: durationCount > 0 ? totalDuration / durationCount : 0,
      requestsByTool,
      errorsByCode,
    };
  }

  /**
   * Export metrics in Prometheus format
   */
  toPrometheus(): string {
    const lines: string[] = [];

    for (const [key, value] of this.counters) {
      const { name, labels } = this.parseKey(key);
      lines.push(`${name}${this.formatLabels(labels)} ${value}`);
    }

    for (const [key, buckets] of this.histograms) {
      const { name, labels } = this.parseKey(key);
      const labelStr = this.formatLabels(labels);
      for (const [bound, bucket] of BUCKET_BOUNDS) {
        lines.push(`${name}_bucket${this.addLabel(labelStr, 'le', String(bound))} ${buckets[bucket]}`);
      }
      lines.push(`${name}_bucket${this.addLabel(labelStr, 'le', '+Inf')} ${buckets.le_inf}`);
      lines.push(`${name}_sum${labelStr} ${buckets.sum}`);
      lines.push(`${name}_count${labelStr} ${buckets.count}`);
    }

    return lines.join('\n');
  }

  clear(): void {
    this.counters.clear();
    this.histograms.clear();
  }

  // Private methods

  private makeKey(name: string, labels: MetricLabels): string {
    const labelParts = LABEL_NAMES.filter((label) => labels[label] !== undefined)
      .sort((a, b) => a.localeCompare(b))
      .map((label) => `${label}:${labels[label]}`);

    return labelParts.length > 0 ? `${name}{${labelParts.join(',')}}` : name;
  }

  private parseKey(key: string): { name: string; labels: MetricLabels } {
    const braceAt = key.indexOf('{');
    if (braceAt === -1 || !key.endsWith('}')) {
      return { name: key, labels: {} };
    }

    const labels: MetricLabels = {};
    for (const part of key.slice(braceAt + 1, -1).split(',')) {
      const separator = part.indexOf(':');
      const label = part.slice(0, separator);
      const value = part.slice(separator + 1);
      const known = LABEL_NAMES.find((name) => name === label);
      if (separator > 0 && known !== undefined && value.length > 0) {
        labels[known] = value;
      }
    }

    return { name: key.slice(0, braceAt), labels };
  }

  private formatLabels(labels: MetricLabels): string {
    const parts = LABEL_NAMES.filter((label) => labels[label] !== undefined).map(
      (label) => `${label}="${labels[label]}"`
    );

    return parts.length > 0 ? `{${parts.join(',')}}` : '';
  }

  private addLabel(labelStr: string, key: string, value: string): string {
    if (labelStr === '') {
      return `{${key}="${value}"}`;
    }
    return labelStr.replace('}', `,${key}="${value}"}`);
  }
}

function createEmptyBuckets(): HistogramBuckets {
  return {
    le_10: 0,
    le_50: 0,
    le_100: 0,
    le_250: 0,
    le_500: 0,
    le_1000: 0,
    le_2500: 0,
    le_5000: 0,
    le_inf: 0,
    sum: 0,
    count: 0,
  };
}
