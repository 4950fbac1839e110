import { RecommendationService } from './recommendationService.js';
import { Track, VoiceLink } from './types.js';

export interface CancellationToken {
  cancelled: boolean;
}

export interface BackgroundTask {
  token: CancellationToken;
  promise: Promise<void>;
}

/**
 * Mutable per-session state. Owned by a SessionPlayer; every change that
 * affects what plays next happens under that session's mutex.
 */
export class SessionState {
  readonly queue: Track[] = [];
  readonly autoplayQueue: Track[] = [];
  currentTrack: Track | null = null;
  autoplayEnabled = false;
  volume = 1.0;
  voiceLink: VoiceLink | null = null;

  disconnectTimer: NodeJS.Timeout | null = null;
  backgroundTask: BackgroundTask | null = null;

  // Tracks started and not yet finished, so teardown can purge their cache entries
  readonly startedTrackIds = new Set<string>();

  private recent: string[] = [];
  private startedAt: number | null = null;
  private pausedTotal = 0;
  private pausedAt: number | null = null;

  constructor(
    readonly sessionKey: string,
    readonly recommendations: RecommendationService,
    private readonly recentLimit: number,
  ) {}

  isConnected(): boolean {
    return this.voiceLink !== null && this.voiceLink.isConnected();
  }

  /** Oldest first, newest last. */
  getRecentHistory(): string[] {
    return [...this.recent];
  }

  pushRecent(youtubeId: string): void {
    if (this.recent[this.recent.length - 1] === youtubeId) return;

    const existing = this.recent.indexOf(youtubeId);
    if (existing !== -1) {
      this.recent.splice(existing, 1);
    }
    this.recent.push(youtubeId);
    while (this.recent.length > this.recentLimit) {
      this.recent.shift();
    }
  }

  clearRecent(): void {
    this.recent = [];
  }

  // --- Timing ---

  markStarted(now: number): void {
    this.startedAt = now;
    this.pausedTotal = 0;
    this.pausedAt = null;
  }

  markPaused(now: number): void {
    if (this.pausedAt === null) {
      this.pausedAt = now;
    }
  }

  markResumed(now: number): void {
    if (this.pausedAt !== null) {
      this.pausedTotal += now - this.pausedAt;
      this.pausedAt = null;
    }
  }

  clearTiming(): void {
    this.startedAt = null;
    this.pausedTotal = 0;
    this.pausedAt = null;
  }

  elapsedSeconds(now: number): number | null {
    if (this.startedAt === null) return null;
    const paused = this.pausedTotal + (this.pausedAt !== null ? now - this.pausedAt : 0);
    return Math.max(0, Math.floor((now - this.startedAt - paused) / 1000));
  }

  /** Empties queues, history and timing. The voice link is left to the caller. */
  reset(): void {
    this.queue.length = 0;
    this.autoplayQueue.length = 0;
    this.currentTrack = null;
    this.recent = [];
    this.clearTiming();
  }
}
