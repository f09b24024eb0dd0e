import { MetricMismatchError } from './errors.js';
import type { ComparisonResult, MetricComparison, MetricRecord, VerdictGate } from './types.js';

interface FlatMetric {
  kernel: string;
  metric: string;
  value: number;
}

export function metricName(kernel: string, metric: string): string {
  return `${kernel}/${metric}`;
}

function flatten(record: MetricRecord): Map<string, FlatMetric> {
  const flat = new Map<string, FlatMetric>();
  for (const [kernel, metrics] of Object.entries(record.kernels)) {
    for (const [metric, value] of Object.entries(metrics)) {
      flat.set(metricName(kernel, metric), { kernel, metric, value });
    }
  }
  return flat;
}

/**
 * Compare guest metrics against host metrics.
 *
 * Each metric passes when guest/host >= targetRatio. With the `headline`
 * gate only the named metric decides the overall verdict; the others are
 * still computed and reported.
 */
export function compare(
  host: MetricRecord,
  guest: MetricRecord,
  targetRatio: number,
  gate: VerdictGate = { mode: 'all' }
): ComparisonResult {
  const hostMetrics = flatten(host);
  const guestMetrics = flatten(guest);
  const hostNames = [...hostMetrics.keys()].sort();
  const guestNames = [...guestMetrics.keys()].sort();

  if (host.benchmark !== guest.benchmark) {
    throw new MetricMismatchError(
      `Cannot compare ${host.benchmark} (host) with ${guest.benchmark} (guest)`,
      hostNames,
      guestNames
    );
  }

  const sameKeys = hostNames.length === guestNames.length
    && hostNames.every((name, i) => name === guestNames[i]);
  if (!sameKeys) {
    throw new MetricMismatchError(
      `Host and guest metrics differ for ${host.benchmark}: [${hostNames.join(', ')}] vs [${guestNames.join(', ')}]`,
      hostNames,
      guestNames
    );
  }

  const metrics: MetricComparison[] = [];
  for (const [name, hostMetric] of hostMetrics) {
    const guestMetric = guestMetrics.get(name);
    if (!guestMetric) continue;
    // equal values are at parity, zeros included
    const ratio = guestMetric.value === hostMetric.value ? 1 : guestMetric.value / hostMetric.value;
    metrics.push({
      name,
      kernel: hostMetric.kernel,
      metric: hostMetric.metric,
      host: hostMetric.value,
      guest: guestMetric.value,
      ratio,
      // a zero host value against a non-zero guest never passes
      passed: Number.isFinite(ratio) && ratio >= targetRatio,
    });
  }

  let passed: boolean;
  if (gate.mode === 'headline') {
    const headlineName = metricName(gate.kernel, gate.metric);
    const headline = metrics.find(m => m.name === headlineName);
    if (!headline) {
      throw new MetricMismatchError(
        `Headline metric ${headlineName} missing from ${host.benchmark}`,
        hostNames,
        guestNames
      );
    }
    passed = headline.passed;
  } else {
    passed = metrics.every(m => m.passed);
  }

  return {
    benchmark: host.benchmark,
    host,
    guest,
    targetRatio,
    gate,
    metrics,
    passed,
  };
}
