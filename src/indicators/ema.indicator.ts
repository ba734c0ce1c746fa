/**
 * Incremental Exponential Moving Average over a price stream
 *
 * Formula: EMA = (Price × α) + (Previous EMA × (1 - α))
 * Where α = 2 / (period + 1)
 *
 * The first value is the Simple Moving Average of the first `period` prices.
 */
export class EmaTracker {
  private readonly alpha: number;
  private readonly seed: number[] = [];
  private current: number | undefined;

  constructor(readonly period: number) {
    if (!Number.isInteger(period) || period <= 0) {
      throw new Error(`EMA period must be a positive integer. Got: ${period}`);
    }
    this.alpha = 2 / (period + 1);
  }

  get value(): number | undefined {
    return this.current;
  }

  get isReady(): boolean {
    return this.current !== undefined;
  }

  /** Feed one price; returns the EMA once enough prices have been seen. */
  update(price: number): number | undefined {
    if (this.current === undefined) {
      this.seed.push(price);
      if (this.seed.length === this.period) {
        this.current = this.seed.reduce((sum, value) => sum + value, 0) / this.period;
      }
      return this.current;
    }

    this.current = price * this.alpha + this.current * (1 - this.alpha);
    return this.current;
  }
}
