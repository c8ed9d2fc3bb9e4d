/**
 * Counters for degraded paths: rows stored empty, dropped keys, calls on a
 * torn-down engine, failed starts and sends, failing engine callbacks.
 *
 * Each metric has a fixed tag shape; a metric without tags takes none.
 */

export type MetricTagMap = {
  scrollback_row_skipped: undefined;
  input_dropped: { key: string };
  engine_absent: { op: 'feed' | 'flush' | 'translate' };
  job_send_failed: undefined;
  session_start_failed: { reason: 'job' | 'window' };
  callback_failed: { callback: string };
  attr_table_full: undefined;
};

export type MetricName = keyof MetricTagMap;

const counters = new Map<MetricName, Map<string, number>>();

function tagKey(tags: Record<string, string> | undefined): string {
  if (!tags) return '';
  return Object.keys(tags)
    .sort()
    .map((key) => `${key}=${tags[key]}`)
    .join(',');
}

export function incMetric<N extends MetricName>(name: N, tags?: MetricTagMap[N]): void {
  let byTags = counters.get(name);
  if (!byTags) {
    byTags = new Map();
    counters.set(name, byTags);
  }
  const key = tagKey(tags);
  byTags.set(key, (byTags.get(key) ?? 0) + 1);
}

/** Count for `name` with exactly `tags`; without tags, the untagged count. */
export function getMetric<N extends MetricName>(name: N, tags?: MetricTagMap[N]): number {
  return counters.get(name)?.get(tagKey(tags)) ?? 0;
}

/** Sum over every tag set of `name`. */
export function getMetricTotal(name: MetricName): number {
  let total = 0;
  for (const count of counters.get(name)?.values() ?? []) total += count;
  return total;
}

/** `name` or `name|key=value,...` → count. */
export function getMetricSnapshot(): Record<string, number> {
  const snapshot: Record<string, number> = {};
  for (const [name, byTags] of counters) {
    for (const [key, count] of byTags) {
      snapshot[key.length > 0 ? `${name}|${key}` : name] = count;
    }
  }
  return snapshot;
}

export function resetMetrics(): void {
  counters.clear();
}
