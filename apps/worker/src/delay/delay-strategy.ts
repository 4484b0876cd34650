/**
 * Simulated processing latency. Real tasks take time; clients poll.
 */
export interface DelayStrategy {
  nextDelayMs(): number;
}

export class UniformDelay implements DelayStrategy {
  constructor(
    private readonly minMs: number,
    private readonly maxMs: number,
    private readonly random: () => number = Math.random,
  ) {
    if (minMs < 0 || maxMs < minMs) {
      throw new RangeError(`Invalid delay range [${minMs}, ${maxMs}]`);
    }
  }

  /** Integer in [minMs, maxMs], both ends included. */
  nextDelayMs(): number {
    const span = this.maxMs - this.minMs + 1;
    return this.minMs + Math.min(Math.floor(this.random() * span), span - 1);
  }
}

export class FixedDelay implements DelayStrategy {
  constructor(private readonly ms: number) {}

  nextDelayMs(): number {
    return this.ms;
  }
}
