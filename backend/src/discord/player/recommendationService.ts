import logger from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { LruCache } from '../../utils/lruCache.js';
import { CappedSet } from '../../utils/cappedSet.js';
import { CatalogSearch, CatalogTrack, RatingStore } from './types.js';

export interface RecommendationOptions {
    seedCacheLimit: number;
    playedLimit: number;
    fetchLimit: number;
    maxSeeds?: number;
}

// Lower sorts first: liked, neutral, disliked, heavily disliked
function ratingTier(score: number): number {
    if (score > 0) return 0;
    if (score === 0) return 1;
    if (score > -2) return 2;
    return 3;
}

/**
 * Autoplay recommendations for one session. Keeps a per-seed cache of the
 * catalog's "similar tracks" lists and a capped set of everything played, so
 * autoplay does not repeat itself within that window.
 */
export class RecommendationService {
    private readonly seedCache: LruCache<string, CatalogTrack[]>;
    private readonly played: CappedSet<string>;
    private readonly fetchLimit: number;
    private readonly maxSeeds: number;

    constructor(
        private readonly sessionKey: string,
        private readonly catalog: CatalogSearch,
        private readonly ratings: RatingStore,
        options: RecommendationOptions,
    ) {
        this.seedCache = new LruCache<string, CatalogTrack[]>(options.seedCacheLimit);
        this.played = new CappedSet<string>(options.playedLimit);
        this.fetchLimit = options.fetchLimit;
        this.maxSeeds = options.maxSeeds ?? 3;
    }

    /** Similar tracks for a seed, minus the seed itself and anything already played. */
    public async getRecommendations(seedId: string, limit: number): Promise<CatalogTrack[]> {
        let similar = this.seedCache.get(seedId);

        if (!similar) {
            try {
                similar = await this.catalog.getSimilar(seedId, Math.max(this.fetchLimit, limit));
            } catch (error) {
                logger.warn(`[RS] Similar-track lookup failed for ${seedId}: ${errorMessage(error)}`);
                return [];
            }
            const evicted = this.seedCache.set(seedId, similar);
            if (evicted) {
                logger.debug(`[RS] Seed cache full, dropped ${evicted}`);
            }
        }

        return similar
            .filter(track => track.youtubeId !== seedId && !this.played.has(track.youtubeId))
            .slice(0, limit);
    }

    /**
     * Merges recommendations from the most recent seeds (newest first), drops
     * duplicates and the seeds themselves, then orders by session rating.
     * `recentIds` is ordered oldest to newest.
     */
    public async blendedRecommendations(recentIds: readonly string[], limit: number): Promise<CatalogTrack[]> {
        if (recentIds.length === 0 || limit <= 0) {
            return [];
        }

        const seeds = recentIds.slice(-this.maxSeeds).reverse();
        const excluded = new Set(recentIds);
        const perSeedLimit = Math.max(Math.floor(limit / seeds.length), 2) + 2;

        const merged: CatalogTrack[] = [];
        const seen = new Set<string>();
        for (const seed of seeds) {
            const recs = await this.getRecommendations(seed, perSeedLimit);
            for (const rec of recs) {
                if (seen.has(rec.youtubeId) || excluded.has(rec.youtubeId)) continue;
                seen.add(rec.youtubeId);
                merged.push(rec);
            }
        }

        const scores = await this.loadRatings();
        const scoreOf = (track: CatalogTrack) => scores.get(track.youtubeId) ?? 0;

        // Array.prototype.sort is stable, so equal tiers keep first-seen order
        const ranked = [...merged].sort((a, b) => {
            const sa = scoreOf(a);
            const sb = scoreOf(b);
            const tierDiff = ratingTier(sa) - ratingTier(sb);
            if (tierDiff !== 0) return tierDiff;
            return sa > 0 ? sb - sa : 0;
        });

        return ranked.slice(0, limit);
    }

    /** Autocomplete search. Short input and pasted URLs get no suggestions. */
    public async searchTracks(text: string, limit = 10): Promise<CatalogTrack[]> {
        const query = text.trim();
        if (query.length < 2 || /^https?:\/\//i.test(query)) {
            return [];
        }

        try {
            return await this.catalog.searchTracks(query, limit);
        } catch (error) {
            logger.warn(`[RS] Catalog search failed for "${query}": ${errorMessage(error)}`);
            return [];
        }
    }

    public markPlayed(youtubeId: string): void {
        this.played.add(youtubeId);
    }

    public clearHistory(): void {
        this.played.clear();
        this.seedCache.clear();
        logger.debug(`[RS] Cleared recommendation history for ${this.sessionKey}`);
    }

    private async loadRatings(): Promise<Map<string, number>> {
        try {
            return await this.ratings.getRatingsForSession(this.sessionKey);
        } catch (error) {
            logger.warn(`[RS] Ratings unavailable for ${this.sessionKey}, treating all as neutral: ${errorMessage(error)}`);
            return new Map();
        }
    }
}
