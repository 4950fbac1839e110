import logger from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { SessionMutex } from '../../utils/sessionMutex.js';
import { CancellationToken, SessionState } from './playerStateManager.js';
import { Track, TrackResolver } from './types.js';

const FALLBACK_CANDIDATES = 5;
const REFILL_OVERFETCH = 2;

type AppendOutcome = 'added' | 'duplicate' | 'stop';

/**
  * Keeps a session's autoplay buffer topped up from blended recommendations.
  * Resolution runs outside the session lock; only the check and the append
  * take it.
  */
export class AutoplayManager {
    constructor(
        private readonly resolver: TrackResolver,
        private readonly mutex: SessionMutex,
    ) {}

    /** Returns how many tracks were appended. Never throws. */
    async refillAutoplayBuffer(
        session: SessionState,
        targetCount: number,
        token: CancellationToken = { cancelled: false },
    ): Promise<number> {
        const recent = session.getRecentHistory();
        if (recent.length === 0) {
            return 0;
        }

        let appended = 0;
        try {
            const candidates = await session.recommendations.blendedRecommendations(recent, targetCount + REFILL_OVERFETCH);
            logger.debug(`[AM] ${session.sessionKey}: ${candidates.length} autoplay candidates`);

            for (const candidate of candidates) {
                const shouldResolve = await this.mutex.run(session.sessionKey, () =>
                    !token.cancelled
                    && session.autoplayQueue.length < targetCount
                    && !session.autoplayQueue.some(t => t.youtubeId === candidate.youtubeId),
                );
                if (!shouldResolve) {
                    if (token.cancelled || session.autoplayQueue.length >= targetCount) break;
                    continue;
                }

                const result = await this.resolver.resolve(candidate.youtubeId);
                if (!result.ok) {
                    logger.debug(`[AM] Skipping ${candidate.youtubeId}: ${result.reason}`);
                    continue;
                }
                const track = result.track;

                const outcome = await this.mutex.run(session.sessionKey, (): AppendOutcome => {
                    if (token.cancelled || session.autoplayQueue.length >= targetCount) return 'stop';
                    if (session.autoplayQueue.some(t => t.youtubeId === track.youtubeId)) return 'duplicate';
                    session.autoplayQueue.push(track);
                    return 'added';
                });

                if (outcome === 'stop') break;
                if (outcome === 'added') {
                    appended++;
                    logger.info(`[AM] Buffered autoplay track for ${session.sessionKey}: ${track.title}`);
                }
            }
        } catch (error) {
            logger.error(`[AM] Autoplay refill failed for ${session.sessionKey}: ${errorMessage(error)}`);
        }

        return appended;
    }

    /**
      * On-demand pick used when the buffer is empty. Called with the session
      * lock already held, so it must not take it again.
      */
    async fetchFallbackTrack(session: SessionState): Promise<Track | null> {
        const recent = session.getRecentHistory();
        if (recent.length === 0) {
            return null;
        }

        try {
            const candidates = await session.recommendations.blendedRecommendations(recent, FALLBACK_CANDIDATES);
            for (const candidate of candidates) {
                const result = await this.resolver.resolve(candidate.youtubeId);
                if (result.ok) {
                    logger.info(`[AM] Fallback autoplay pick for ${session.sessionKey}: ${result.track.title}`);
                    return result.track;
                }
            }
        } catch (error) {
            logger.error(`[AM] Fallback recommendation failed for ${session.sessionKey}: ${errorMessage(error)}`);
        }

        return null;
    }
}
