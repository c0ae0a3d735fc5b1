/**
 * In-process call counters, with optional forwarding to an external system.
 */

export type Tags = Record<string, string>;

export interface CounterSample {
  value: number;
  tags?: Tags;
}

export interface MetricsSnapshot {
  counters: Record<string, CounterSample[]>;
  collectedAt: string;
}

/** Adapter interface for external metrics systems (Prometheus, StatsD, etc.) */
export interface MetricsAdapter {
  onCounter(name: string, value: number, tags?: Tags): void;
}

function tagsKey(tags?: Tags): string {
  if (!tags || Object.keys(tags).length === 0) return '';
  return Object.entries(tags).sort(([a], [b]) => a.localeCompare(b)).map(([k, v]) => `${k}=${v}`).join(',');
}

export class MetricsCollector {
  private counters = new Map<string, Map<string, CounterSample>>();
  private adapters: MetricsAdapter[] = [];

  registerAdapter(adapter: MetricsAdapter): void {
    this.adapters.push(adapter);
  }

  /** Increment a counter by 1 (or by `amount`). */
  counter(name: string, tags?: Tags, amount = 1): void {
    const key = tagsKey(tags);
    let byTags = this.counters.get(name);
    if (!byTags) {
      byTags = new Map();
      this.counters.set(name, byTags);
    }
    const existing = byTags.get(key);
    if (existing) {
      existing.value += amount;
    } else {
      byTags.set(key, tags ? { value: amount, tags: { ...tags } } : { value: amount });
    }
    for (const a of this.adapters) a.onCounter(name, amount, tags);
  }

  /** Counter value for exact tags, or the sum over all tag sets when `tags` is omitted. */
  getCounter(name: string, tags?: Tags): number {
    const byTags = this.counters.get(name);
    if (!byTags) return 0;
    if (tags) return byTags.get(tagsKey(tags))?.value ?? 0;
    let total = 0;
    for (const sample of byTags.values()) total += sample.value;
    return total;
  }

  getSnapshot(): MetricsSnapshot {
    const counters: MetricsSnapshot['counters'] = {};
    for (const [name, byTags] of this.counters) {
      counters[name] = Array.from(byTags.values(), s => ({ ...s }));
    }
    return { counters, collectedAt: new Date().toISOString() };
  }

  reset(): void {
    this.counters.clear();
  }
}

/** Global metrics instance (singleton for convenience). */
export const globalMetrics = new MetricsCollector();
