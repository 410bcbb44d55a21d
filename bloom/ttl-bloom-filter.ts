/**
 * Recently-seen cache for relayed frame keys.
 *
 * A counting bloom filter answers the common "never seen" case; the entry
 * map holds insertion times so keys leave the filter once their window has
 * passed or once capacity forces the oldest out. Counting cells allow true
 * removal, so the false positive rate does not degrade over a long run.
 */

import { CountingBloomFilter } from "bloom-filters";

type Clock = () => number;

export type TTLBloomStats = {
  totalEntries: number;
  expiredEntries: number;
  activeEntries: number;
  ttlMs: number;
  capacity: number;
  filterLength: number;
  falsePositiveRate: number;
};

export default class TTLBloomFilter {
  private bloomFilter: CountingBloomFilter;
  // insertion ordered, oldest first
  private entries = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly capacity: number;
  private readonly now: Clock;

  /**
   * @param capacity - Maximum number of keys held at once
   * @param errorRate - Target false positive rate of the underlying filter
   * @param ttlMs - How long a key stays "seen"
   */
  constructor(
    capacity: number,
    errorRate: number,
    ttlMs: number,
    now: Clock = Date.now,
  ) {
    this.bloomFilter = CountingBloomFilter.create(capacity, errorRate);
    this.capacity = capacity;
    this.ttlMs = ttlMs;
    this.now = now;
  }

  public add(key: string, timestamp?: number): void {
    const insertedAt = timestamp ?? this.now();

    if (this.entries.has(key)) {
      // refresh the window and move to the young end
      this.entries.delete(key);
      this.entries.set(key, insertedAt);
      return;
    }

    while (this.entries.size >= this.capacity) {
      this.evictOldest();
    }

    this.bloomFilter.add(key);
    this.entries.set(key, insertedAt);
  }

  public has(key: string): boolean {
    if (!this.bloomFilter.has(key)) {
      return false;
    }

    const insertedAt = this.entries.get(key);

    // bloom false positive
    if (insertedAt === undefined) {
      return false;
    }

    if (this.isExpired(insertedAt)) {
      this.remove(key);
      return false;
    }

    return true;
  }

  /**
   * Test and record in one step.
   * @returns true when the key was already present inside its window
   */
  public checkAndAdd(key: string): boolean {
    if (this.has(key)) {
      return true;
    }

    this.add(key);
    return false;
  }

  public remove(key: string): void {
    if (this.entries.delete(key)) {
      this.bloomFilter.remove(key);
    }
  }

  /**
   * Drop every key whose window has passed.
   * @returns Number of entries removed
   */
  public pruneExpired(): number {
    const now = this.now();
    const expired: string[] = [];

    for (const [key, insertedAt] of this.entries) {
      if (this.isExpired(insertedAt, now)) {
        expired.push(key);
      }
    }

    for (const key of expired) {
      this.remove(key);
    }

    if (expired.length > 0) {
      console.log(
        `[TTLBloom] Pruned ${expired.length} expired entries, ${this.entries.size} remain`,
      );
    }

    return expired.length;
  }

  public clear(): void {
    for (const key of Array.from(this.entries.keys())) {
      this.remove(key);
    }
  }

  public size(): number {
    return this.entries.size;
  }

  public stats(): TTLBloomStats {
    const now = this.now();
    let expiredCount = 0;

    for (const insertedAt of this.entries.values()) {
      if (this.isExpired(insertedAt, now)) {
        expiredCount++;
      }
    }

    return {
      totalEntries: this.entries.size,
      expiredEntries: expiredCount,
      activeEntries: this.entries.size - expiredCount,
      ttlMs: this.ttlMs,
      capacity: this.capacity,
      filterLength: this.bloomFilter.length,
      falsePositiveRate: this.bloomFilter.rate(),
    };
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next();
    if (oldest.done) {
      return;
    }
    this.remove(oldest.value);
  }

  private isExpired(insertedAt: number, now: number = this.now()): boolean {
    return now - insertedAt >= this.ttlMs;
  }
}
