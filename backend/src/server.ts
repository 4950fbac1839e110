import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import { Socket } from 'net';
import logger from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import { activeSessionsGauge, register } from './metrics.js';
import { createHealthRouter, HealthSources } from './routes/health.js';

export function createHttpApp(sources: HealthSources): express.Express {
  const app = express();

  app.use('/health', createHealthRouter(sources));

  app.get('/metrics', async (_req, res, next) => {
    try {
      activeSessionsGauge.set(sources.sessionCount());
      res.set('Content-Type', register.contentType);
      res.end(await register.metrics());
    } catch (error) {
      next(error);
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled HTTP error:', error);
    res.status(500).json({ error: errorMessage(error) });
  });

  return app;
}

export interface TrackedServer {
  server: http.Server;
  closeAllConnections: () => void;
  close: () => Promise<void>;
}

/** Starts listening and keeps track of sockets so shutdown does not hang. */
export function startHttpServer(app: express.Express, port: number): TrackedServer {
  const server = http.createServer(app);
  const connections = new Set<Socket>();

  server.on('connection', (socket) => {
    connections.add(socket);
    socket.on('close', () => {
      connections.delete(socket);
    });
  });

  server.listen(port, () => {
    logger.info(`HTTP server is running on port ${port}`);
  });

  const closeAllConnections = () => {
    if (connections.size > 0) {
      logger.info(`Forcefully closing ${connections.size} active connections`);
      for (const socket of connections) {
        socket.destroy();
      }
      connections.clear();
    }
  };

  const close = () => new Promise<void>((resolve, reject) => {
    closeAllConnections();
    server.close((err) => {
      if (err) {
        reject(err);
      } else {
        logger.info('HTTP server closed successfully');
        resolve();
      }
    });
  });

  return { server, closeAllConnections, close };
}
