import { Job, Worker } from 'bullmq';
import type { Redis } from 'ioredis';
import { MissingArtifactError, PictureNotFoundError } from '../errors.js';
import { REGENERATION_QUEUE, type RegenerateThumbnailJob } from '../services/regeneration-queue.js';
import type { CatalogEngine } from '../services/catalog-engine.js';

export type RegenerationOutcome = 'regenerated' | 'skipped';

export interface RegenerationResult {
  pictureId: number;
  outcome: RegenerationOutcome;
  thumbnail?: string;
}

export interface WorkerOptions {
  connection: Redis;
  concurrency?: number;
}

/**
 * Handle one job. Pictures deleted since enqueueing and pictures whose
 * original is missing complete as skipped rather than failing the job.
 */
export async function processRegenerationJob(
  engine: Pick<CatalogEngine, 'regenerateThumbnail'>,
  data: RegenerateThumbnailJob
): Promise<RegenerationResult> {
  try {
    const picture = await engine.regenerateThumbnail(data.pictureId);
    return { pictureId: data.pictureId, outcome: 'regenerated', thumbnail: picture.thumbnail };
  } catch (error) {
    if (error instanceof MissingArtifactError || error instanceof PictureNotFoundError) {
      console.warn(`[Regen Worker] Skipping picture ${data.pictureId}: ${error.message}`);
      return { pictureId: data.pictureId, outcome: 'skipped' };
    }
    throw error;
  }
}

/**
 * Thumbnail Regeneration Worker
 *
 * Background worker consuming the regeneration queue.
 */
export class ThumbnailRegenerationWorker {
  private worker: Worker<RegenerateThumbnailJob, RegenerationResult>;

  constructor(engine: CatalogEngine, options: WorkerOptions) {
    this.worker = new Worker<RegenerateThumbnailJob, RegenerationResult>(
      REGENERATION_QUEUE,
      async (job: Job<RegenerateThumbnailJob>) => processRegenerationJob(engine, job.data),
      {
        connection: options.connection,
        concurrency: options.concurrency ?? 2, // sharp already uses a thread pool per job
      }
    );

    this.worker.on('completed', (job, result) => {
      console.log(`[Regen Worker] Job ${job.id} ${result.outcome} picture ${result.pictureId}`);
    });

    this.worker.on('failed', (job, error) => {
      console.error(`[Regen Worker] Job ${job?.id} failed:`, error);
    });
  }

  async run(): Promise<void> {
    console.log('[Regen Worker] Starting thumbnail regeneration worker...');
    await this.worker.waitUntilReady();
  }

  async close(): Promise<void> {
    console.log('[Regen Worker] Closing thumbnail regeneration worker...');
    await this.worker.close();
  }

  getStatus() {
    return {
      running: this.worker.isRunning(),
      queue: this.worker.name,
    };
  }
}

export async function createRegenerationWorker(
  engine: CatalogEngine,
  redis: Redis,
  options?: Partial<WorkerOptions>
): Promise<ThumbnailRegenerationWorker> {
  const worker = new ThumbnailRegenerationWorker(engine, {
    connection: redis,
    ...options,
  });

  await worker.run();
  return worker;
}
