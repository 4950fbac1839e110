import fs from 'fs';
import path from 'path';
import logger from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { downloadPool, MediaWorkerPool } from '../../utils/mediaWorkerPool.js';
import { cacheBytesGauge, cacheEntriesGauge } from '../../metrics.js';
import { AudioDownloader, Track } from './types.js';

interface CacheEntry {
    filePath: string;
    size: number;
}

export interface AudioCacheOptions {
    cacheDir: string;
    maxFiles: number;
    maxBytes: number;
    downloadTimeoutMs: number;
    downloader: AudioDownloader;
    pool?: MediaWorkerPool;
}

/**
 * Local audio cache shared by every session. Entries are evicted in the order
 * their downloads completed, since each track is consumed once and then
 * dropped after playback.
 */
export class AudioCache {
    private readonly cacheDir: string;
    private readonly maxFiles: number;
    private readonly maxBytes: number;
    private readonly downloadTimeoutMs: number;
    private readonly downloader: AudioDownloader;
    private readonly pool: MediaWorkerPool;

    private entries = new Map<string, CacheEntry>(); // insertion order = eviction order
    private cacheBytes = 0;
    private downloadLocks = new Map<string, Promise<boolean>>();
    // Downloads that timed out but are still running; their ids stay blocked
    private lateDownloads = new Map<string, Promise<void>>();
    // In-flight downloads whose track was removed meanwhile; dropped on arrival
    private discarded = new Set<string>();
    // Bumped by cleanupAll so abandoned downloads do not register themselves
    private generation = 0;

    constructor(options: AudioCacheOptions) {
        this.cacheDir = options.cacheDir;
        this.maxFiles = options.maxFiles;
        this.maxBytes = options.maxBytes;
        this.downloadTimeoutMs = options.downloadTimeoutMs;
        this.downloader = options.downloader;
        this.pool = options.pool ?? downloadPool;
    }

    get entryCount(): number {
        return this.entries.size;
    }

    get totalBytes(): number {
        return this.cacheBytes;
    }

    isReady(youtubeId: string): boolean {
        return this.entries.has(youtubeId);
    }

    /**
     * Makes sure the track has a local file, downloading if needed. Sets
     * `track.localPath` on success. Never throws.
     */
    async ensureDownloaded(track: Track): Promise<boolean> {
        const id = track.youtubeId;

        const entry = this.entries.get(id);
        if (entry) {
            if (fs.existsSync(entry.filePath)) {
                track.localPath = entry.filePath;
                return true;
            }
            logger.warn(`[CM] Cached file for ${id} vanished, downloading again`);
            this.forget(id);
        }

        if (this.lateDownloads.has(id)) {
            logger.debug(`[CM] Timed-out download for ${id} is still running, not starting another`);
            return false;
        }

        const existingLock = this.downloadLocks.get(id);
        if (existingLock) {
            logger.debug(`[CM] Download already in progress for ${id}. Waiting...`);
            return this.attachWhenDone(track, existingLock);
        }

        return this.attachWhenDone(track, this.startDownload(track));
    }

    /** Fire-and-forget prefetch. No-op when cached or already downloading. */
    startBackgroundDownload(track: Track): void {
        const id = track.youtubeId;
        if (this.entries.has(id) || this.downloadLocks.has(id) || this.lateDownloads.has(id)) {
            return;
        }

        logger.debug(`[CM] Prefetching audio for: ${id}`);
        this.startDownload(track).catch(error => {
            logger.error(`[CM] Background prefetch failed for ${id}:`, error);
        });
    }

    /** Deletes the entry and its file. Safe to call repeatedly. */
    async remove(youtubeId: string): Promise<void> {
        if (this.downloadLocks.has(youtubeId)) {
            this.discarded.add(youtubeId);
        }
        const entry = this.forget(youtubeId);
        if (!entry) return;

        try {
            await fs.promises.rm(entry.filePath, { force: true });
        } catch (error) {
            logger.warn(`[CM] Failed to delete ${entry.filePath}: ${errorMessage(error)}`);
        }
    }

    /** Abandons in-flight downloads and removes every entry. */
    async cleanupAll(): Promise<void> {
        this.generation++;
        this.downloadLocks.clear();
        this.discarded.clear();
        const ids = [...this.entries.keys()];
        await Promise.all(ids.map(id => this.remove(id)));
        logger.info(`[CM] Cleared ${ids.length} cached files`);
    }

    /** Wipes whatever a previous process left in the cache directory. */
    async purgeStaleFiles(): Promise<number> {
        await fs.promises.mkdir(this.cacheDir, { recursive: true });
        const dirents = await fs.promises.readdir(this.cacheDir, { withFileTypes: true });
        const files = dirents.filter(d => d.isFile());

        await Promise.all(files.map(async (file) => {
            try {
                await fs.promises.rm(path.join(this.cacheDir, file.name), { force: true });
            } catch (error) {
                logger.warn(`[CM] Could not remove stale file ${file.name}: ${errorMessage(error)}`);
            }
        }));

        if (files.length > 0) {
            logger.info(`[CM] Purged ${files.length} stale files from ${this.cacheDir}`);
        }
        return files.length;
    }

    private async attachWhenDone(track: Track, download: Promise<boolean>): Promise<boolean> {
        const ok = await download;
        const entry = this.entries.get(track.youtubeId);
        if (ok && entry) {
            track.localPath = entry.filePath;
            return true;
        }
        return false;
    }

    private startDownload(track: Track): Promise<boolean> {
        const id = track.youtubeId;
        const generation = this.generation;
        const downloadPromise = this.performDownload(track, generation).finally(() => {
            if (this.downloadLocks.get(id) === downloadPromise) {
                this.downloadLocks.delete(id);
                this.discarded.delete(id);
            }
        });
        this.downloadLocks.set(id, downloadPromise);
        return downloadPromise;
    }

    private async performDownload(track: Track, generation: number): Promise<boolean> {
        const id = track.youtubeId;
        const inFlight: { download?: Promise<string | null> } = {};
        try {
            const filePath = await this.pool.run(`download ${id}`, () => {
                inFlight.download = this.downloader.download(id, track.webpageUrl);
                return inFlight.download;
            }, this.downloadTimeoutMs);
            if (!filePath) {
                return false;
            }

            if (generation !== this.generation || this.discarded.has(id)) {
                logger.debug(`[CM] Discarding abandoned download for ${id}`);
                await fs.promises.rm(filePath, { force: true });
                return false;
            }

            const { size } = await fs.promises.stat(filePath);
            await this.insert(id, filePath, size);
            logger.info(`✓ [CM] Audio cached for ${id}: ${filePath} (${size} bytes)`);
            return this.entries.has(id);
        } catch (error) {
            logger.error(`❌ [CM] Failed to cache audio for ${id}: ${errorMessage(error)}`);
            if (inFlight.download) {
                this.trackLateDownload(id, inFlight.download);
            }
            return false;
        }
    }

    private trackLateDownload(youtubeId: string, download: Promise<string | null>): void {
        const settled = this.discardLateFile(youtubeId, download).finally(() => {
            if (this.lateDownloads.get(youtubeId) === settled) {
                this.lateDownloads.delete(youtubeId);
            }
        });
        this.lateDownloads.set(youtubeId, settled);
    }

    // Whatever the abandoned download writes is never tracked, so it goes
    private async discardLateFile(youtubeId: string, download: Promise<string | null>): Promise<void> {
        try {
            const lateFile = await download;
            if (lateFile && this.entries.get(youtubeId)?.filePath !== lateFile) {
                logger.debug(`[CM] Removing late download for ${youtubeId}`);
                await fs.promises.rm(lateFile, { force: true });
            }
        } catch (error) {
            logger.debug(`[CM] Abandoned download for ${youtubeId} ended with: ${errorMessage(error)}`);
        }
    }

    private async insert(youtubeId: string, filePath: string, size: number): Promise<void> {
        this.forget(youtubeId);
        this.entries.set(youtubeId, { filePath, size });
        this.cacheBytes += size;
        this.reportSize();
        await this.enforceLimits();
    }

    // Count ceiling first, then bytes, always evicting the oldest entry
    private async enforceLimits(): Promise<void> {
        const evictions: Promise<void>[] = [];

        while (this.entries.size > this.maxFiles) {
            const oldest = this.oldestId();
            if (oldest === undefined) break;
            evictions.push(this.remove(oldest));
        }

        while (this.cacheBytes > this.maxBytes && this.entries.size > 0) {
            const oldest = this.oldestId();
            if (oldest === undefined) break;
            evictions.push(this.remove(oldest));
        }

        if (evictions.length > 0) {
            logger.debug(`[CM] Evicted ${evictions.length} entries to stay within limits`);
        }
        await Promise.all(evictions);
    }

    private oldestId(): string | undefined {
        const first = this.entries.keys().next();
        return first.done ? undefined : first.value;
    }

    // Drops bookkeeping synchronously; the file itself is handled by the caller
    private forget(youtubeId: string): CacheEntry | undefined {
        const entry = this.entries.get(youtubeId);
        if (!entry) return undefined;
        this.entries.delete(youtubeId);
        this.cacheBytes = Math.max(0, this.cacheBytes - entry.size);
        this.reportSize();
        return entry;
    }

    private reportSize(): void {
        cacheEntriesGauge.set(this.entries.size);
        cacheBytesGauge.set(this.cacheBytes);
    }
}
