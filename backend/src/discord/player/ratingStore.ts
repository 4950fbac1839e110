import Redis from 'ioredis';
import logger from '../../utils/logger.js';
import { REDIS } from '../../config.js';
import { RatingStore } from './types.js';

export type RatingValue = 1 | -1;

export interface RatingCounts {
  likes: number;
  dislikes: number;
}

export interface RatedTrackInfo {
  title?: string;
  artist?: string;
}

// Key layout, all scoped by session (guild):
//   ratings:{guild}:tracks        set of rated track ids
//   ratings:{guild}:{track}       hash userId -> 1 | -1
//   ratings:{guild}:{track}:meta  hash title/artist
const tracksKey = (sessionKey: string) => `ratings:${sessionKey}:tracks`;
const votesKey = (sessionKey: string, youtubeId: string) => `ratings:${sessionKey}:${youtubeId}`;
const metaKey = (sessionKey: string, youtubeId: string) => `ratings:${sessionKey}:${youtubeId}:meta`;

function sumVotes(values: string[]): number {
  return values.reduce((total, value) => total + (Number(value) || 0), 0);
}

export function createRedisClient(): Redis {
  const client = new Redis({
    host: REDIS.HOST,
    port: REDIS.PORT,
    password: REDIS.PASSWORD,
    lazyConnect: true,
  });
  client.on('error', (error) => {
    logger.error('[RS] Redis error:', error);
  });
  return client;
}

/** Like/dislike votes per session, one vote per user per track. */
export class RedisRatingStore implements RatingStore {
  constructor(private readonly redis: Redis) {}

  async rateTrack(
    sessionKey: string,
    youtubeId: string,
    userId: string,
    rating: RatingValue,
    info: RatedTrackInfo = {},
  ): Promise<void> {
    const meta: Record<string, string> = {};
    if (info.title) meta.title = info.title;
    if (info.artist) meta.artist = info.artist;

    const pipeline = this.redis.multi()
      .sadd(tracksKey(sessionKey), youtubeId)
      .hset(votesKey(sessionKey, youtubeId), userId, String(rating));
    if (Object.keys(meta).length > 0) {
      pipeline.hset(metaKey(sessionKey, youtubeId), meta);
    }
    await pipeline.exec();
    logger.debug(`[RS] ${userId} rated ${youtubeId} ${rating > 0 ? 'up' : 'down'} in ${sessionKey}`);
  }

  /** Returns true when a vote was actually removed. */
  async removeRating(sessionKey: string, youtubeId: string, userId: string): Promise<boolean> {
    const removed = await this.redis.hdel(votesKey(sessionKey, youtubeId), userId);
    if (removed > 0 && (await this.redis.hlen(votesKey(sessionKey, youtubeId))) === 0) {
      await this.redis.srem(tracksKey(sessionKey), youtubeId);
    }
    return removed > 0;
  }

  async getTrackScore(sessionKey: string, youtubeId: string): Promise<number> {
    const values = await this.redis.hvals(votesKey(sessionKey, youtubeId));
    return sumVotes(values);
  }

  async getUserRating(sessionKey: string, youtubeId: string, userId: string): Promise<RatingValue | null> {
    const value = await this.redis.hget(votesKey(sessionKey, youtubeId), userId);
    if (value === '1') return 1;
    if (value === '-1') return -1;
    return null;
  }

  async getRatingCounts(sessionKey: string, youtubeId: string): Promise<RatingCounts> {
    const values = await this.redis.hvals(votesKey(sessionKey, youtubeId));
    return {
      likes: values.filter(v => Number(v) > 0).length,
      dislikes: values.filter(v => Number(v) < 0).length,
    };
  }

  async getTrackInfo(sessionKey: string, youtubeId: string): Promise<RatedTrackInfo> {
    const meta = await this.redis.hgetall(metaKey(sessionKey, youtubeId));
    return { title: meta.title, artist: meta.artist };
  }

  /** Aggregate score for every rated track in the session. */
  async getRatingsForSession(sessionKey: string): Promise<Map<string, number>> {
    const ids = await this.redis.smembers(tracksKey(sessionKey));
    const scores = new Map<string, number>();
    if (ids.length === 0) return scores;

    const votes = await Promise.all(ids.map(id => this.redis.hvals(votesKey(sessionKey, id))));
    ids.forEach((id, index) => {
      scores.set(id, sumVotes(votes[index] ?? []));
    });
    return scores;
  }
}
