import type { ApiErrorType } from './errors.js';
import type { AttemptOutcome } from './types.js';

export interface RequestMetric {
  client: string;
  endpoint: string; // Path only, sanitized
  method: string;
  attempt: number;
  outcome: AttemptOutcome;
  status: number; // 0 when no response was received
  durationMs: number;
  timestamp: number;
  errorType?: ApiErrorType | undefined;
}

export interface MetricsSummary {
  total: number;
  avgDuration: number;
  byClient: Record<string, number>;
  byOutcome: Partial<Record<AttemptOutcome, number>>;
  byEndpoint: Record<string, EndpointMetrics>;
}

export interface EndpointMetrics {
  calls: number;
  failures: number;
  avgDuration: number;
}

export class InstrumentationCollector {
  private metrics: RequestMetric[] = [];

  record(metric: RequestMetric): void {
    this.metrics.push(metric);
  }

  getMetrics(): RequestMetric[] {
    return this.metrics;
  }

  clear(): void {
    this.metrics = [];
  }

  getSummary(): MetricsSummary {
    if (this.metrics.length === 0) {
      return {
        total: 0,
        avgDuration: 0,
        byClient: {},
        byOutcome: {},
        byEndpoint: {},
      };
    }

    const byClient: Record<string, number> = {};
    const byOutcome: Partial<Record<AttemptOutcome, number>> = {};
    const byEndpoint: Record<string, EndpointMetrics> = {};

    for (const m of this.metrics) {
      byClient[m.client] = (byClient[m.client] ?? 0) + 1;
      byOutcome[m.outcome] = (byOutcome[m.outcome] ?? 0) + 1;

      const key = `${m.client}:${m.method} ${m.endpoint}`;
      const current = byEndpoint[key] ?? { calls: 0, failures: 0, avgDuration: 0 };
      const totalDuration = current.avgDuration * current.calls + m.durationMs;
      current.calls += 1;
      current.failures += m.outcome === 'success' ? 0 : 1;
      current.avgDuration = totalDuration / current.calls;
      byEndpoint[key] = current;
    }

    const totalDuration = this.metrics.reduce((sum, m) => sum + m.durationMs, 0);

    return {
      total: this.metrics.length,
      avgDuration: totalDuration / this.metrics.length,
      byClient,
      byOutcome,
      byEndpoint,
    };
  }
}

/**
 * Reduces an endpoint to a low-cardinality path: query strings are dropped and
 * identifiers replaced with placeholders.
 */
export function sanitizeEndpoint(endpoint: string): string {
  try {
    const url = new URL(endpoint, 'http://placeholder.com');
    const pathname = url.pathname;

    return pathname
      .replace(/\/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}(?=\/|$)/gi, '/{id}') // UUIDs
      .replace(/\/\d+(?=\/|$)/g, '/{id}') // Numeric ids
      .replace(/\/[A-Za-z0-9_-]{24,}(?=\/|$)/g, '/{token}'); // Opaque keys
  } catch {
    // Not parseable as a URL: keep as-is
    return endpoint;
  }
}
