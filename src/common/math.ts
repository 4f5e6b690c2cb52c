export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return Number.NaN;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function populationStd(values: readonly number[]): number {
  if (values.length === 0) {
    return Number.NaN;
  }
  const m = mean(values);
  const variance = values.reduce((sum, value) => sum + (value - m) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

export function median(values: readonly number[]): number {
  if (values.length === 0) {
    return Number.NaN;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const n = sorted.length;
  if (n % 2 === 1) {
    return sorted[Math.floor(n / 2)];
  }
  return (sorted[n / 2 - 1] + sorted[n / 2]) / 2;
}

/** Mean of the `count` largest values; fewer values are averaged as they are. */
export function meanOfLargest(values: readonly number[], count: number): number {
  if (values.length === 0) {
    return Number.NEGATIVE_INFINITY;
  }
  const top = [...values].sort((a, b) => b - a).slice(0, Math.max(1, count));
  return mean(top);
}
