import PQueue from 'p-queue';
import logger from './logger.js';
import { withTimeout } from './errors.js';
import {
  DOWNLOAD_TIMEOUT_MS,
  DOWNLOAD_WORKERS,
  EXTRACT_TIMEOUT_MS,
  EXTRACT_WORKERS,
} from '../config.js';

/**
 * Fixed-size pool for yt-dlp child processes. Every job is bounded by a hard
 * timeout so a hung extractor cannot hold a worker slot forever.
 */
export class MediaWorkerPool {
  private readonly queue: PQueue;

  constructor(
    readonly name: string,
    concurrency: number,
    private readonly timeoutMs: number,
  ) {
    this.queue = new PQueue({ concurrency });
  }

  /** The timeout starts when a worker picks the job up, not when it is queued. */
  run<T>(label: string, job: () => Promise<T>, timeoutMs = this.timeoutMs): Promise<T> {
    if (this.queue.size > 0) {
      logger.debug(`[MWP] ${this.name} pool busy, ${this.queue.size} waiting before ${label}`);
    }
    return this.queue.add(() => withTimeout(job(), timeoutMs, `${this.name} ${label}`));
  }
}

export const downloadPool = new MediaWorkerPool('download', DOWNLOAD_WORKERS, DOWNLOAD_TIMEOUT_MS);
export const extractPool = new MediaWorkerPool('extract', EXTRACT_WORKERS, EXTRACT_TIMEOUT_MS);
