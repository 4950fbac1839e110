import { Client, GatewayIntentBits, VoiceBasedChannel } from 'discord.js';
import type Redis from 'ioredis';
import logger from './utils/logger.js';
import getEnv from './utils/env.js';
import {
  AUDIO_CACHE_DIR,
  DOWNLOAD_TIMEOUT_MS,
  MAX_CACHE_SIZE_MB,
  MAX_CACHED_FILES,
} from './config.js';
import { AudioCache, SessionRegistry } from './discord/player/index.js';
import { AudioPlaybackEngine } from './discord/player/audioPlaybackEngine.js';
import { YtDlpAudioDownloader } from './discord/player/audioDownloader.js';
import { YtDlpCatalogSearch } from './discord/player/catalogSearch.js';
import { createRedisClient, RedisRatingStore } from './discord/player/ratingStore.js';
import { YtDlpTrackResolver } from './discord/player/trackResolver.js';
import { VoiceConnectionManager } from './discord/player/voiceConnectionManager.js';
import { handleVoiceStateUpdate } from './discord/events/voiceStateUpdate.js';
import { createHttpApp, startHttpServer, TrackedServer } from './server.js';

const env = getEnv();

// Flag to prevent duplicate shutdown processes
let isShuttingDown = false;

interface Runtime {
  client: Client;
  registry: SessionRegistry<VoiceBasedChannel, AudioPlaybackEngine>;
  redis: Redis;
  http?: TrackedServer;
}

async function gracefulShutdown(runtime: Runtime, signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.info(`Additional ${signal} signal received during shutdown, ignoring`);
    return;
  }

  isShuttingDown = true;
  logger.info(`${signal} signal received: starting graceful shutdown`);

  // Set a timeout to force exit if graceful shutdown takes too long
  const forceExitTimeout = setTimeout(() => {
    logger.error('Graceful shutdown timed out after 10 seconds, forcing exit');
    process.exit(1);
  }, 10000);

  try {
    if (runtime.http) {
      logger.info('Closing HTTP server (no longer accepting requests)');
      await runtime.http.close();
    }

    await runtime.registry.shutdown();
    logger.info('All sessions disconnected');

    await runtime.redis.quit();
    await runtime.client.destroy();

    clearTimeout(forceExitTimeout);
    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during graceful shutdown:', error);
    clearTimeout(forceExitTimeout);
    process.exit(1);
  }
}

async function start(): Promise<void> {
  env.requireVars(['DISCORD_TOKEN']);

  const cache = new AudioCache({
    cacheDir: AUDIO_CACHE_DIR,
    maxFiles: MAX_CACHED_FILES,
    maxBytes: MAX_CACHE_SIZE_MB * 1024 * 1024,
    downloadTimeoutMs: DOWNLOAD_TIMEOUT_MS,
    downloader: new YtDlpAudioDownloader(AUDIO_CACHE_DIR),
  });
  await cache.purgeStaleFiles();

  const redis = createRedisClient();
  const registry = new SessionRegistry({
    resolver: new YtDlpTrackResolver(),
    catalog: new YtDlpCatalogSearch(),
    ratings: new RedisRatingStore(redis),
    cache,
    voice: new VoiceConnectionManager(),
    createSink: (sessionKey: string) => new AudioPlaybackEngine(sessionKey),
  });

  const client = new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildVoiceStates,
    ],
  });

  client.on('voiceStateUpdate', (oldState, newState) =>
    handleVoiceStateUpdate(oldState, newState, client.user?.id, registry));

  // Auto-join the configured voice channel when ready
  client.once('ready', async (readyClient) => {
    logger.info(`🤖 Bot is ready as ${readyClient.user.tag}`);

    const targetChannelId = env.getString('DISCORD_DEFAULT_VOICE_CHANNEL_ID', '');
    if (!targetChannelId) {
      logger.debug('No default voice channel configured');
      return;
    }

    const channel = readyClient.channels.cache.get(targetChannelId);
    if (!channel?.isVoiceBased()) {
      logger.error('Could not find target voice channel or channel is not a voice channel');
      return;
    }

    try {
      await registry.connect(channel.guild.id, channel);
      logger.info(`🎵 Joined voice channel: ${channel.name}`);
    } catch (error) {
      logger.error('Failed to join default voice channel:', error);
    }
  });

  const runtime: Runtime = { client, registry, redis };

  const port = env.getNumber('PORT', 0);
  if (port > 0) {
    const app = createHttpApp({
      redis,
      cache,
      sessionCount: () => registry.sessionKeys().length,
    });
    runtime.http = startHttpServer(app, port);
  }

  process.on('SIGTERM', () => {
    void gracefulShutdown(runtime, 'SIGTERM');
  });
  process.on('SIGINT', () => {
    void gracefulShutdown(runtime, 'SIGINT');
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection:', reason);
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught Exception:', error);
    void gracefulShutdown(runtime, 'UNCAUGHT_EXCEPTION');
  });

  await client.login(env.getString('DISCORD_TOKEN'));
}

start().catch((error) => {
  logger.error('Failed to start:', error);
  process.exit(1);
});
