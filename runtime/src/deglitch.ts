// Counts consecutive fault observations. A fault is reported only once it
// has been observed `threshold` times in a row; any clean reading resets the
// count.
export class DeglitchCounter {
  readonly threshold: number;
  private count = 0;

  constructor(threshold: number) {
    if (!Number.isInteger(threshold) || threshold < 1) {
      throw new Error(`Deglitch threshold must be a positive integer: ${threshold}`);
    }
    this.threshold = threshold;
  }

  update(faultObserved: boolean): boolean {
    if (faultObserved) {
      if (this.count < this.threshold) {
        this.count += 1;
      }
    } else {
      this.count = 0;
    }

    return this.isFaulted();
  }

  isFaulted(): boolean {
    return this.count >= this.threshold;
  }

  getCount(): number {
    return this.count;
  }

  reset(): void {
    this.count = 0;
  }
}
