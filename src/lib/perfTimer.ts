/**
 * Performance instrumentation for render stages.
 */

export interface TimingSummary {
  avg: number;
  max: number;
  count: number;
}

const timings = new Map<string, number[]>();

export function startTimer(label: string): () => number {
  const start = performance.now();
  return () => {
    const elapsed = performance.now() - start;
    const samples = timings.get(label);
    if (samples) samples.push(elapsed);
    else timings.set(label, [elapsed]);
    console.debug(`[perf] ${label}: ${elapsed.toFixed(1)}ms`);
    return elapsed;
  };
}

export function getTimings(): Record<string, TimingSummary> {
  const result: Record<string, TimingSummary> = {};
  for (const [label, times] of timings) {
    const total = times.reduce((a, b) => a + b, 0);
    result[label] = {
      avg: Math.round(total / times.length),
      max: Math.round(Math.max(...times)),
      count: times.length,
    };
  }
  return result;
}

export function clearTimings(): void {
  timings.clear();
}
