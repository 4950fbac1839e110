import { Router } from 'express';
import logger from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export interface PingableStore {
  ping(): Promise<string>;
}

export interface HealthSources {
  redis?: PingableStore;
  sessionCount: () => number;
  cache: {
    readonly entryCount: number;
    readonly totalBytes: number;
  };
}

interface HealthStatus {
  status: 'healthy' | 'degraded';
  timestamp: string;
  services: {
    redis: {
      status: 'healthy' | 'unhealthy' | 'disabled';
      latency?: number;
    };
  };
  sessions: number;
  cache: {
    entries: number;
    bytes: number;
  };
  uptime: number;
  memory: NodeJS.MemoryUsage;
}

export function createHealthRouter(sources: HealthSources): Router {
  const router = Router();

  /**
   * GET /health
   * Overall status. Ratings are optional, so a dead Redis only degrades.
   */
  router.get('/', async (_req, res) => {
    const status: HealthStatus = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      services: {
        redis: { status: sources.redis ? 'unhealthy' : 'disabled' },
      },
      sessions: sources.sessionCount(),
      cache: {
        entries: sources.cache.entryCount,
        bytes: sources.cache.totalBytes,
      },
      uptime: process.uptime(),
      memory: process.memoryUsage(),
    };

    if (sources.redis) {
      try {
        const redisStart = Date.now();
        await sources.redis.ping();
        status.services.redis = {
          status: 'healthy',
          latency: Date.now() - redisStart,
        };
      } catch (error) {
        status.status = 'degraded';
        logger.error('Redis health check failed:', error);
      }
    }

    res.status(200).json(status);
  });

  router.get('/liveness', (_req, res) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/readiness', async (_req, res) => {
    try {
      if (sources.redis) {
        await sources.redis.ping();
      }

      res.status(200).json({
        status: 'ready',
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'not_ready',
        timestamp: new Date().toISOString(),
        error: process.env.NODE_ENV === 'development' ? errorMessage(error) : undefined,
      });
    }
  });

  return router;
}
