import logger from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { formatDuration, renderProgressBar } from '../../utils/format.js';
import { SessionMutex } from '../../utils/sessionMutex.js';
import { playNextOutcomeCounter, tracksStartedCounter } from '../../metrics.js';
import { AutoplayManager } from './autoplayManager.js';
import { AudioCache } from './cacheManager.js';
import { RecommendationService } from './recommendationService.js';
import { BackgroundTask, CancellationToken, SessionState } from './playerStateManager.js';
import {
  AudioSink,
  AudioSource,
  PlaybackSource,
  PlayerSettings,
  PlayNextResult,
  Track,
  VoiceLink,
} from './types.js';

export interface SessionPlayerDeps {
  sessionKey: string;
  cache: AudioCache;
  recommendations: RecommendationService;
  autoplay: AutoplayManager;
  mutex: SessionMutex;
  sink: AudioSink;
  settings: PlayerSettings;
  now?: () => number;
}

const MAX_ADVANCE_ATTEMPTS = 5;

function isNetworkUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return (url.protocol === 'http:' || url.protocol === 'https:') && url.hostname.length > 0;
  } catch {
    return false;
  }
}

function shuffleInPlace<T>(items: T[]): void {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(Math.random() * (i + 1));
    [items[i], items[j]] = [items[j], items[i]];
  }
}

/**
 * Playback state machine for one session: Idle -> Playing <-> Paused -> Idle.
 * The sink's completion callback feeds back into playNext(), so a session
 * keeps playing until both queues run dry.
 */
export class SessionPlayer {
  readonly sessionKey: string;
  private readonly state: SessionState;
  private readonly cache: AudioCache;
  private readonly autoplay: AutoplayManager;
  private readonly mutex: SessionMutex;
  private readonly sink: AudioSink;
  private readonly settings: PlayerSettings;
  private readonly now: () => number;

  // Identifies the active sink source; stale completions are ignored
  private playGeneration = 0;
  private injectionChain: Promise<unknown> = Promise.resolve();

  constructor(deps: SessionPlayerDeps) {
    this.sessionKey = deps.sessionKey;
    this.cache = deps.cache;
    this.autoplay = deps.autoplay;
    this.mutex = deps.mutex;
    this.sink = deps.sink;
    this.settings = deps.settings;
    this.now = deps.now ?? Date.now;
    this.state = new SessionState(deps.sessionKey, deps.recommendations, deps.settings.recentLimit);
  }

  // --- Voice link ---

  setVoiceLink(link: VoiceLink | null): void {
    this.state.voiceLink = link;
  }

  isConnected(): boolean {
    return this.state.isConnected();
  }

  // --- Queue ---

  async enqueue(track: Track): Promise<number> {
    return this.mutex.run(this.sessionKey, () => {
      this.state.queue.push(track);
      logger.debug(`[SP] ${this.sessionKey}: queued ${track.title} at ${this.state.queue.length}`);
      return this.state.queue.length;
    });
  }

  async enqueueMany(tracks: readonly Track[]): Promise<number> {
    return this.mutex.run(this.sessionKey, () => {
      this.state.queue.push(...tracks);
      logger.info(`[SP] ${this.sessionKey}: queued ${tracks.length} tracks`);
      return tracks.length;
    });
  }

  async shuffleQueue(): Promise<number> {
    return this.mutex.run(this.sessionKey, () => {
      shuffleInPlace(this.state.queue);
      return this.state.queue.length;
    });
  }

  // --- Core transition ---

  async playNext(): Promise<PlayNextResult> {
    const result = await this.mutex.run(this.sessionKey, () => this.playNextLocked());
    playNextOutcomeCounter.inc({ status: result.status });
    if (result.status === 'playing') {
      tracksStartedCounter.inc({ source: result.source });
    }
    return result;
  }

  /** playNext(), moving past tracks that fail to start. */
  async advance(): Promise<PlayNextResult> {
    let result = await this.playNext();
    for (let attempt = 1; result.status === 'failed' && attempt < MAX_ADVANCE_ATTEMPTS; attempt++) {
      logger.info(`[SP] ${this.sessionKey}: ${result.track.title} failed (${result.reason}), trying next`);
      result = await this.playNext();
    }
    return result;
  }

  private async playNextLocked(): Promise<PlayNextResult> {
    this.cancelDisconnectTimer();

    if (!this.state.isConnected()) {
      logger.warn(`[SP] ${this.sessionKey}: playNext without a voice connection`);
      return { status: 'disconnected' };
    }

    const track = await this.pickNextTrack();
    if (!track) {
      logger.info(`[SP] ${this.sessionKey}: nothing left to play`);
      this.goIdle();
      return { status: 'exhausted' };
    }

    const previous = this.state.currentTrack;
    const replaced = previous && (this.sink.isPlaying() || this.sink.isPaused()) ? previous : null;

    this.state.currentTrack = track;
    this.state.pushRecent(track.youtubeId);
    this.state.startedTrackIds.add(track.youtubeId);
    this.state.recommendations.markPlayed(track.youtubeId);

    if (replaced && replaced.youtubeId !== track.youtubeId) {
      this.state.startedTrackIds.delete(replaced.youtubeId);
      await this.cache.remove(replaced.youtubeId);
    }

    const acquired = await this.acquireAudio(track);
    if (!acquired) {
      logger.warn(`[SP] ${this.sessionKey}: no playable audio for ${track.title}`);
      this.goIdle();
      return { status: 'failed', reason: 'acquisition', track };
    }

    const playId = ++this.playGeneration;
    try {
      await this.sink.play(acquired.source, (error) => this.handleCompletion(playId, track, error));
    } catch (error) {
      logger.error(`[SP] ${this.sessionKey}: sink failed to start ${track.title}: ${errorMessage(error)}`);
      this.goIdle();
      return { status: 'failed', reason: 'sink', track };
    }

    this.sink.setVolume(this.state.volume);
    this.state.markStarted(this.now());
    logger.info(`[SP] ${this.sessionKey}: now playing ${track.title} [${formatDuration(track.duration)}] (${acquired.kind})`);

    this.startBackgroundWork();

    return { status: 'playing', track, source: acquired.kind };
  }

  // Nothing is playing any more; elapsed time goes back to null
  private goIdle(): void {
    this.state.currentTrack = null;
    this.state.clearTiming();
    this.startDisconnectTimer();
  }

  private async pickNextTrack(): Promise<Track | null> {
    const queued = this.state.queue.shift();
    if (queued) return queued;

    if (!this.state.autoplayEnabled) return null;

    const buffered = this.state.autoplayQueue.shift();
    if (buffered) return buffered;

    if (this.state.currentTrack || this.state.getRecentHistory().length > 0) {
      return this.autoplay.fetchFallbackTrack(this.state);
    }
    return null;
  }

  private async acquireAudio(track: Track): Promise<{ source: AudioSource; kind: PlaybackSource } | null> {
    const cached = await this.cache.ensureDownloaded(track);
    if (cached && track.localPath) {
      return { source: { kind: 'file', path: track.localPath }, kind: 'cache' };
    }

    if (isNetworkUrl(track.streamUrl)) {
      logger.debug(`[SP] ${this.sessionKey}: cache miss for ${track.youtubeId}, streaming directly`);
      return { source: { kind: 'stream', url: track.streamUrl }, kind: 'stream' };
    }
    return null;
  }

  // Called by the sink; hand off through the event loop before touching state
  private handleCompletion(playId: number, track: Track, error?: Error): void {
    if (playId !== this.playGeneration) return;

    if (error) {
      logger.warn(`[SP] ${this.sessionKey}: playback of ${track.title} ended with error: ${error.message}`);
    }

    setImmediate(() => {
      this.advanceAfter(track).catch((advanceError) => {
        logger.error(`[SP] ${this.sessionKey}: failed to advance after ${track.title}:`, advanceError);
      });
    });
  }

  private async advanceAfter(track: Track): Promise<void> {
    this.state.startedTrackIds.delete(track.youtubeId);
    await this.cache.remove(track.youtubeId);
    const result = await this.advance();
    logger.debug(`[SP] ${this.sessionKey}: advanced after ${track.youtubeId} -> ${result.status}`);
  }

  // --- Background prefetch / refill ---

  private startBackgroundWork(): void {
    this.stopBackgroundWork();

    // Queued tracks are known now; buffer tracks may arrive with the refill
    this.prefetchUpcoming();

    const token: CancellationToken = { cancelled: false };
    const refill = this.state.autoplayEnabled
      ? this.autoplay.refillAutoplayBuffer(this.state, this.settings.autoplayBufferTarget, token)
      : Promise.resolve(0);

    const promise = refill
      .then(() => {
        if (!token.cancelled) this.prefetchUpcoming();
      })
      .catch((error) => {
        logger.error(`[SP] ${this.sessionKey}: background work failed:`, error);
      })
      .finally(() => {
        if (this.state.backgroundTask?.token === token) {
          this.state.backgroundTask = null;
        }
      });

    this.state.backgroundTask = { token, promise };
  }

  private prefetchUpcoming(): void {
    const upcoming = [
      ...this.state.queue.slice(0, this.settings.prefetchQueueAhead),
      ...this.state.autoplayQueue.slice(0, this.settings.prefetchAutoplayAhead),
    ];
    for (const track of upcoming) {
      this.cache.startBackgroundDownload(track);
    }
  }

  // Cancelled work never appends; callers that tear down await `promise`
  private stopBackgroundWork(): BackgroundTask | null {
    const task = this.state.backgroundTask;
    if (!task) return null;
    task.token.cancelled = true;
    this.state.backgroundTask = null;
    return task;
  }

  // --- Disconnect timer ---

  private startDisconnectTimer(): void {
    this.cancelDisconnectTimer();
    if (!this.state.voiceLink) return;

    const timer = setTimeout(() => {
      this.state.disconnectTimer = null;
      logger.info(`[SP] ${this.sessionKey}: idle for ${this.settings.disconnectTimeoutMs}ms, disconnecting`);
      this.disconnect().catch((error) => {
        logger.error(`[SP] ${this.sessionKey}: idle disconnect failed:`, error);
      });
    }, this.settings.disconnectTimeoutMs);
    timer.unref();
    this.state.disconnectTimer = timer;
  }

  private cancelDisconnectTimer(): void {
    if (this.state.disconnectTimer) {
      clearTimeout(this.state.disconnectTimer);
      this.state.disconnectTimer = null;
    }
  }

  hasDisconnectTimer(): boolean {
    return this.state.disconnectTimer !== null;
  }

  // --- Controls ---

  skip(): boolean {
    if (this.sink.isPlaying() || this.sink.isPaused()) {
      this.sink.stop();
      return true;
    }
    return false;
  }

  pause(): boolean {
    if (!this.sink.isPlaying() || this.sink.isPaused()) return false;
    if (!this.sink.pause()) return false;
    this.state.markPaused(this.now());
    return true;
  }

  resume(): boolean {
    if (!this.sink.isPaused()) return false;
    if (!this.sink.resume()) return false;
    this.state.markResumed(this.now());
    return true;
  }

  toggleAutoplay(): boolean {
    this.state.autoplayEnabled = !this.state.autoplayEnabled;
    logger.info(`[SP] ${this.sessionKey}: autoplay ${this.state.autoplayEnabled ? 'enabled' : 'disabled'}`);
    return this.state.autoplayEnabled;
  }

  /** A refill still in flight is cancelled so it cannot repopulate the buffer. */
  async clearHistory(): Promise<void> {
    this.stopBackgroundWork();
    await this.mutex.run(this.sessionKey, () => {
      this.state.clearRecent();
      this.state.autoplayQueue.length = 0;
      this.state.recommendations.clearHistory();
    });
  }

  setVolume(volume: number): number {
    const clamped = Math.max(0, Math.min(1, volume));
    this.state.volume = clamped;
    this.sink.setVolume(clamped);
    return clamped;
  }

  // --- Queries ---

  getQueue(): Track[] {
    return [...this.state.queue];
  }

  getAutoplayQueue(): Track[] {
    return [...this.state.autoplayQueue];
  }

  getCurrentTrack(): Track | null {
    return this.state.currentTrack;
  }

  getRecentHistory(): string[] {
    return this.state.getRecentHistory();
  }

  isPlaying(): boolean {
    return this.sink.isPlaying() || this.sink.isPaused();
  }

  isPaused(): boolean {
    return this.sink.isPaused();
  }

  isAutoplayEnabled(): boolean {
    return this.state.autoplayEnabled;
  }

  getVolume(): number {
    return this.state.volume;
  }

  elapsedSeconds(): number | null {
    return this.state.elapsedSeconds(this.now());
  }

  /** Progress of the current track, or null when idle. */
  progressBar(width?: number): string | null {
    const track = this.state.currentTrack;
    const elapsed = this.elapsedSeconds();
    if (!track || elapsed === null) return null;
    return renderProgressBar(elapsed, track.duration, width);
  }

  // --- Out-of-band audio ---

  /**
   * Plays a file over the music (e.g. a spoken reply). Music is paused for the
   * duration and resumed only if it was playing before. Calls are serialised.
   */
  playAudioFile(filePath: string): Promise<boolean> {
    const run = this.injectionChain.then(() => this.playInjected(filePath));
    this.injectionChain = run.catch(() => undefined);
    return run;
  }

  private async playInjected(filePath: string): Promise<boolean> {
    if (!this.state.isConnected()) {
      logger.warn(`[SP] ${this.sessionKey}: cannot play ${filePath} without a voice connection`);
      return false;
    }

    const pausedMusic = this.pause();
    try {
      await this.sink.playInjected(filePath, this.settings.injectedAudioTimeoutMs);
      return true;
    } catch (error) {
      logger.error(`[SP] ${this.sessionKey}: injected audio failed: ${errorMessage(error)}`);
      return false;
    } finally {
      if (pausedMusic) this.resume();
    }
  }

  // --- Teardown ---

  /** Full stop: timers, background work, sink, queues, cache entries and voice link. */
  async disconnect(): Promise<void> {
    this.cancelDisconnectTimer();
    const pending = this.stopBackgroundWork();
    if (pending) {
      await pending.promise;
    }

    const purge = await this.mutex.run(this.sessionKey, () => {
      this.cancelDisconnectTimer();
      this.playGeneration++;

      if (this.sink.isPlaying() || this.sink.isPaused()) {
        this.sink.stop();
      }

      const ids = this.resetSession();

      if (this.state.voiceLink) {
        this.state.voiceLink.destroy();
        this.state.voiceLink = null;
      }
      return ids;
    });

    await this.purgeCache(purge);
    logger.info(`[SP] ${this.sessionKey}: disconnected, purged ${purge.length} cache candidates`);
  }

  /** The bot was removed from voice externally; the connection is already gone. */
  async handleForcedRemoval(): Promise<void> {
    this.cancelDisconnectTimer();
    const pending = this.stopBackgroundWork();
    if (pending) {
      await pending.promise;
    }

    const purge = await this.mutex.run(this.sessionKey, () => {
      this.playGeneration++;
      this.state.voiceLink = null;
      return this.resetSession();
    });

    await this.purgeCache(purge);
    logger.info(`[SP] ${this.sessionKey}: removed from voice, purged ${purge.length} cache candidates`);
  }

  // Runs under the mutex; returns every id this session may have cached
  private resetSession(): string[] {
    const ids = new Set(this.state.startedTrackIds);
    if (this.state.currentTrack) ids.add(this.state.currentTrack.youtubeId);
    for (const track of this.state.queue) ids.add(track.youtubeId);
    for (const track of this.state.autoplayQueue) ids.add(track.youtubeId);
    this.state.startedTrackIds.clear();

    this.state.reset();
    this.state.recommendations.clearHistory();
    return [...ids];
  }

  private async purgeCache(ids: readonly string[]): Promise<void> {
    await Promise.all(ids.map(id => this.cache.remove(id)));
  }

  destroy(): void {
    this.cancelDisconnectTimer();
    this.stopBackgroundWork();
    this.sink.destroy();
  }
}
