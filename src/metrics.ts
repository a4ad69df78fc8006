/** In-memory Prometheus-compatible counters. Values reset on process restart. */

const counters = {
  alerts_received_total: 0,
  alerts_sent_total: 0,
  alerts_skipped_total: 0,
  config_errors_total: 0,
  delivery_errors_total: 0,
} as const satisfies Record<string, number>;

export type CounterName = keyof typeof counters;

const state: Record<CounterName, number> = { ...counters };

export function inc(name: CounterName): void {
  state[name]++;
}

/** Serialize all counters in Prometheus text exposition format. */
export function metricsText(): string {
  const lines: string[] = [];
  for (const name of Object.keys(state) as CounterName[]) {
    lines.push(`# TYPE ${name} counter`);
    lines.push(`${name} ${state[name]}`);
  }
  return lines.join("\n") + "\n";
}
