const round = (value: number): number => Number(value.toFixed(1));

/**
 * Exponential moving average of the stress score. A degraded score is
 * published as-is and kept out of the average, so stale or zero substitutes
 * do not drag the trend.
 */
export class StressTrend {
  private value: number | null = null;

  constructor(private readonly smoothing: number = 0.3) {}

  /**
   * Feed one score and get the value to publish for this cycle
   */
  update(score: number, degraded: boolean = false): number {
    if (degraded) {
      return round(score);
    }

    this.value = this.value === null
      ? score
      : this.value + this.smoothing * (score - this.value);

    return round(this.value);
  }

  current(): number {
    return this.value === null ? 0 : round(this.value);
  }

  reset(): void {
    this.value = null;
  }
}
