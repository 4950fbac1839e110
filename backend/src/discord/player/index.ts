import logger from '../../utils/logger.js';
import { SessionNotFoundError } from '../../utils/errors.js';
import { SessionMutex } from '../../utils/sessionMutex.js';
import {
    AUTOPLAY_BUFFER_TARGET,
    DISCONNECT_TIMEOUT_MS,
    INJECTED_AUDIO_TIMEOUT_MS,
    PLAYED_HISTORY_LIMIT,
    PREFETCH_AUTOPLAY_AHEAD,
    PREFETCH_QUEUE_AHEAD,
    REC_CACHE_LIMIT,
    REC_FETCH_LIMIT,
    RECENT_SONGS_LIMIT,
} from '../../config.js';
import { AutoplayManager } from './autoplayManager.js';
import { AudioCache } from './cacheManager.js';
import { RecommendationOptions, RecommendationService } from './recommendationService.js';
import { SessionPlayer } from './sessionPlayer.js';
import {
    AudioSink,
    CatalogSearch,
    CatalogTrack,
    PlayerSettings,
    PlayNextResult,
    RatingStore,
    Track,
    TrackResolver,
    VoiceGateway,
    VoiceLink,
} from './types.js';

export const DEFAULT_PLAYER_SETTINGS: PlayerSettings = {
    recentLimit: RECENT_SONGS_LIMIT,
    autoplayBufferTarget: AUTOPLAY_BUFFER_TARGET,
    prefetchQueueAhead: PREFETCH_QUEUE_AHEAD,
    prefetchAutoplayAhead: PREFETCH_AUTOPLAY_AHEAD,
    disconnectTimeoutMs: DISCONNECT_TIMEOUT_MS,
    injectedAudioTimeoutMs: INJECTED_AUDIO_TIMEOUT_MS,
};

export const DEFAULT_RECOMMENDATION_OPTIONS: RecommendationOptions = {
    seedCacheLimit: REC_CACHE_LIMIT,
    playedLimit: PLAYED_HISTORY_LIMIT,
    fetchLimit: REC_FETCH_LIMIT,
};

export interface SessionRegistryOptions<C, S extends AudioSink> {
    resolver: TrackResolver;
    catalog: CatalogSearch;
    ratings: RatingStore;
    cache: AudioCache;
    voice: VoiceGateway<C, S>;
    createSink: (sessionKey: string) => S;
    settings?: Partial<PlayerSettings>;
    recommendations?: Partial<RecommendationOptions>;
    now?: () => number;
}

interface SessionEntry<S> {
    player: SessionPlayer;
    sink: S;
    recommendations: RecommendationService;
}

/**
 * Owns every live session, keyed by session (guild) id. Sessions are created
 * on first use and never removed; an idle session is just empty. Operations
 * on a session that was never created throw SessionNotFoundError.
 */
export class SessionRegistry<C, S extends AudioSink> {
    private readonly sessions = new Map<string, SessionEntry<S>>();
    private readonly mutex = new SessionMutex();
    private readonly autoplay: AutoplayManager;
    private readonly settings: PlayerSettings;
    private readonly recommendationOptions: RecommendationOptions;

    constructor(private readonly options: SessionRegistryOptions<C, S>) {
        this.autoplay = new AutoplayManager(options.resolver, this.mutex);
        this.settings = { ...DEFAULT_PLAYER_SETTINGS, ...options.settings };
        this.recommendationOptions = { ...DEFAULT_RECOMMENDATION_OPTIONS, ...options.recommendations };
    }

    // --- Session lookup ---

    public getSession(sessionKey: string): SessionPlayer {
        return this.ensureEntry(sessionKey).player;
    }

    public hasSession(sessionKey: string): boolean {
        return this.sessions.has(sessionKey);
    }

    public sessionKeys(): string[] {
        return [...this.sessions.keys()];
    }

    private ensureEntry(sessionKey: string): SessionEntry<S> {
        const existing = this.sessions.get(sessionKey);
        if (existing) return existing;

        const sink = this.options.createSink(sessionKey);
        const recommendations = new RecommendationService(
            sessionKey,
            this.options.catalog,
            this.options.ratings,
            this.recommendationOptions,
        );
        const player = new SessionPlayer({
            sessionKey,
            cache: this.options.cache,
            recommendations,
            autoplay: this.autoplay,
            mutex: this.mutex,
            sink,
            settings: this.settings,
            now: this.options.now,
        });

        const entry: SessionEntry<S> = { player, sink, recommendations };
        this.sessions.set(sessionKey, entry);
        logger.debug(`[SR] Created session ${sessionKey}`);
        return entry;
    }

    private require(sessionKey: string): SessionPlayer {
        const entry = this.sessions.get(sessionKey);
        if (!entry) {
            throw new SessionNotFoundError(sessionKey);
        }
        return entry.player;
    }

    // --- Connection ---

    /** Joins (or moves to) the channel, creating the session if needed. */
    public async connect(sessionKey: string, channel: C): Promise<VoiceLink> {
        const entry = this.ensureEntry(sessionKey);
        const link = await this.options.voice.join(sessionKey, channel, entry.sink);
        entry.player.setVoiceLink(link);
        logger.info(`[SR] ${sessionKey}: connected to ${link.channelId}`);
        return link;
    }

    /** No-op for sessions that never existed. */
    public async disconnect(sessionKey: string): Promise<void> {
        const entry = this.sessions.get(sessionKey);
        if (!entry) return;
        await entry.player.disconnect();
    }

    public async handleForcedRemoval(sessionKey: string): Promise<void> {
        const entry = this.sessions.get(sessionKey);
        if (!entry) return;
        await entry.player.handleForcedRemoval();
    }

    // --- Commands ---

    public enqueue(sessionKey: string, track: Track): Promise<number> {
        return this.getSession(sessionKey).enqueue(track);
    }

    public enqueueMany(sessionKey: string, tracks: readonly Track[]): Promise<number> {
        return this.getSession(sessionKey).enqueueMany(tracks);
    }

    public playNext(sessionKey: string): Promise<PlayNextResult> {
        return this.require(sessionKey).playNext();
    }

    public skip(sessionKey: string): boolean {
        return this.require(sessionKey).skip();
    }

    public pause(sessionKey: string): boolean {
        return this.require(sessionKey).pause();
    }

    public resume(sessionKey: string): boolean {
        return this.require(sessionKey).resume();
    }

    public toggleAutoplay(sessionKey: string): boolean {
        return this.getSession(sessionKey).toggleAutoplay();
    }

    public clearHistory(sessionKey: string): Promise<void> {
        return this.require(sessionKey).clearHistory();
    }

    public shuffleQueue(sessionKey: string): Promise<number> {
        return this.require(sessionKey).shuffleQueue();
    }

    public setVolume(sessionKey: string, volume: number): number {
        return this.getSession(sessionKey).setVolume(volume);
    }

    public playAudioFile(sessionKey: string, filePath: string): Promise<boolean> {
        return this.require(sessionKey).playAudioFile(filePath);
    }

    /** Autocomplete suggestions, scoped to the session's recommendation engine. */
    public searchTracks(sessionKey: string, text: string, limit?: number): Promise<CatalogTrack[]> {
        return this.ensureEntry(sessionKey).recommendations.searchTracks(text, limit);
    }

    // --- Queries ---

    public getQueue(sessionKey: string): Track[] {
        return this.require(sessionKey).getQueue();
    }

    public getAutoplayQueue(sessionKey: string): Track[] {
        return this.require(sessionKey).getAutoplayQueue();
    }

    public getCurrentTrack(sessionKey: string): Track | null {
        return this.require(sessionKey).getCurrentTrack();
    }

    public isPlaying(sessionKey: string): boolean {
        return this.require(sessionKey).isPlaying();
    }

    public isPaused(sessionKey: string): boolean {
        return this.require(sessionKey).isPaused();
    }

    public elapsedSeconds(sessionKey: string): number | null {
        return this.require(sessionKey).elapsedSeconds();
    }

    public progressBar(sessionKey: string, width?: number): string | null {
        return this.require(sessionKey).progressBar(width);
    }

    public getVolume(sessionKey: string): number {
        return this.require(sessionKey).getVolume();
    }

    public isAutoplayEnabled(sessionKey: string): boolean {
        return this.require(sessionKey).isAutoplayEnabled();
    }

    // --- Lifecycle ---

    /** Disconnects every session and releases sinks. */
    public async shutdown(): Promise<void> {
        logger.info(`[SR] Shutting down ${this.sessions.size} sessions`);
        const entries = [...this.sessions.values()];
        await Promise.all(entries.map(entry => entry.player.disconnect()));
        for (const entry of entries) {
            entry.player.destroy();
        }
        await this.options.cache.cleanupAll();
    }
}

export { SessionPlayer } from './sessionPlayer.js';
export { AudioCache } from './cacheManager.js';
export { RecommendationService } from './recommendationService.js';
export { AutoplayManager } from './autoplayManager.js';
export * from './types.js';
