import { Queue, type ConnectionOptions, type JobsOptions } from 'bullmq';
import type { CatalogStore } from '../store.js';

export const REGENERATION_QUEUE = 'thumbnail-regeneration';

export interface RegenerateThumbnailJob {
  pictureId: number;
}

/**
 * Shared by single and bulk enqueue. Failed jobs are dropped once their
 * attempts run out so the fixed job id can be queued again.
 */
export const REGENERATION_JOB_OPTIONS = {
  removeOnComplete: true,
  removeOnFail: true,
  attempts: 3,
  backoff: { type: 'exponential', delay: 1000 },
} satisfies JobsOptions;

/**
 * One job per picture. The job id is derived from the picture id, so
 * enqueueing the same picture twice while a job is pending adds nothing and a
 * sweep interrupted half-way can simply be enqueued again.
 */
export class RegenerationQueue {
  private queue: Queue<RegenerateThumbnailJob>;

  constructor(connection: ConnectionOptions) {
    this.queue = new Queue<RegenerateThumbnailJob>(REGENERATION_QUEUE, { connection });
  }

  async enqueue(pictureId: number): Promise<void> {
    await this.queue.add('regenerate', { pictureId }, { ...REGENERATION_JOB_OPTIONS, jobId: jobIdFor(pictureId) });
  }

  /**
   * Enqueue every picture after `after`, in id order. Returns the number queued.
   */
  async enqueueAll(store: CatalogStore, options: { after?: number | null; batchSize?: number } = {}): Promise<number> {
    const batchSize = options.batchSize ?? 500;
    let after = options.after ?? null;
    let queued = 0;

    for (;;) {
      const batch = await store.listPicturesAfter(after, batchSize);
      if (batch.length === 0) break;

      await this.queue.addBulk(
        batch.map((picture) => ({
          name: 'regenerate',
          data: { pictureId: picture.id },
          opts: { ...REGENERATION_JOB_OPTIONS, jobId: jobIdFor(picture.id) },
        }))
      );

      queued += batch.length;
      after = batch[batch.length - 1].id;
    }

    console.log(`[Regen Queue] Enqueued ${queued} thumbnail jobs`);
    return queued;
  }

  async getStats(): Promise<{ waiting: number; active: number; completed: number; failed: number }> {
    const [waiting, active, completed, failed] = await Promise.all([
      this.queue.getWaitingCount(),
      this.queue.getActiveCount(),
      this.queue.getCompletedCount(),
      this.queue.getFailedCount(),
    ]);

    return { waiting, active, completed, failed };
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}

export function jobIdFor(pictureId: number): string {
  return `regenerate-${pictureId}`;
}
