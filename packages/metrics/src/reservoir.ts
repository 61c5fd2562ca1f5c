const DEFAULT_CAPACITY = 10000;

/**
 * Fixed-size uniform sample of a latency stream (Algorithm R).
 *
 * The first `capacity` values are kept as is; after that each new value
 * replaces a random slot with probability capacity / seen.
 */
export class LatencyReservoir {
  readonly capacity: number;

  private readonly random: () => number;
  private samples: number[] = [];
  private seenCount = 0;

  constructor(capacity: number = DEFAULT_CAPACITY, random: () => number = Math.random) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Reservoir capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.random = random;
  }

  /** Values offered so far, kept or not */
  get seen(): number {
    return this.seenCount;
  }

  get size(): number {
    return this.samples.length;
  }

  add(value: number): void {
    this.seenCount++;
    if (this.samples.length < this.capacity) {
      this.samples.push(value);
      return;
    }
    const slot = Math.floor(this.random() * this.seenCount);
    if (slot < this.capacity) {
      this.samples[slot] = value;
    }
  }

  /**
   * Nearest-rank percentiles over the current sample, one per entry of `ranks`
   * (each in 0-100). Null for every rank when the reservoir is empty.
   */
  percentiles(ranks: readonly number[]): (number | null)[] {
    if (this.samples.length === 0) {
      return ranks.map(() => null);
    }
    const sorted = [...this.samples].sort((a, b) => a - b);
    return ranks.map((rank) => nearestRank(sorted, rank));
  }

  percentile(rank: number): number | null {
    return this.percentiles([rank])[0] ?? null;
  }

  clear(): void {
    this.samples = [];
    this.seenCount = 0;
  }
}

function nearestRank(sorted: readonly number[], rank: number): number {
  if (rank < 0 || rank > 100) {
    throw new RangeError(`Percentile must be within 0-100, got ${rank}`);
  }
  const index = Math.max(Math.ceil((rank / 100) * sorted.length), 1) - 1;
  return sorted[Math.min(index, sorted.length - 1)];
}
