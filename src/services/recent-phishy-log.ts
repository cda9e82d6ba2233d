import PQueue from 'p-queue';
import { RecentPhishyEntry } from '../types';
import { logger, shortAddress } from '../utils/logger';

/**
 * Bounded, process-wide list of tokens that came back phishy.
 * Appends go through a single-slot queue so concurrent requests never
 * interleave a read-modify-write.
 */
export class RecentPhishyLog {
  private entries: RecentPhishyEntry[] = [];
  private queue: PQueue;

  constructor(private readonly maxEntries: number = 100) {
    this.queue = new PQueue({ concurrency: 1 });
  }

  async append(entry: RecentPhishyEntry): Promise<void> {
    await this.queue.add(() => {
      this.entries = [entry, ...this.entries].slice(0, this.maxEntries);
      logger.debug(`Recorded phishy token ${shortAddress(entry.tokenAddress)}`, {
        size: this.entries.length,
      });
    });
  }

  /** Most recent first */
  list(): RecentPhishyEntry[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}
