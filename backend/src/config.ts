import path from 'path';
import { getEnv } from './utils/env.js';

const env = getEnv();

// Cache configuration
export const CACHE_DIR = env.getString('CACHE_DIR', path.join(process.cwd(), 'cache'));
export const AUDIO_CACHE_DIR = path.join(CACHE_DIR, 'audio');
export const MAX_CACHED_FILES = env.getNumber('MAX_CACHED_FILES', 10);
export const MAX_CACHE_SIZE_MB = env.getNumber('MAX_CACHE_SIZE_MB', 500);

// Timeouts
export const DOWNLOAD_TIMEOUT_MS = env.getNumber('DOWNLOAD_TIMEOUT', 60) * 1000;
export const EXTRACT_TIMEOUT_MS = env.getNumber('EXTRACT_TIMEOUT', 30) * 1000;
export const DISCONNECT_TIMEOUT_MS = env.getNumber('DISCONNECT_TIMEOUT', 300) * 1000; // 5 minutes idle
export const INJECTED_AUDIO_TIMEOUT_MS = env.getNumber('INJECTED_AUDIO_TIMEOUT', 120) * 1000;
export const VOICE_READY_TIMEOUT_MS = 20_000;

// Autoplay configuration
export const RECENT_SONGS_LIMIT = 3;
export const PLAYED_HISTORY_LIMIT = env.getNumber('PLAYED_HISTORY_LIMIT', 200);
export const REC_CACHE_LIMIT = env.getNumber('REC_CACHE_LIMIT', 20);
export const REC_FETCH_LIMIT = 25;
export const AUTOPLAY_BUFFER_TARGET = env.getNumber('AUTOPLAY_BUFFER_SIZE', 3);
export const PREFETCH_QUEUE_AHEAD = 2;
export const PREFETCH_AUTOPLAY_AHEAD = 1;

// Worker pools for yt-dlp child processes
export const DOWNLOAD_WORKERS = env.getNumber('DOWNLOAD_WORKERS', 2);
export const EXTRACT_WORKERS = env.getNumber('EXTRACT_WORKERS', 3);

// External binaries
export const YT_DLP_PATH = env.getString('YT_DLP_PATH', 'yt-dlp');
export const FFMPEG_PATH = env.getString('FFMPEG_PATH', 'ffmpeg');
export const YT_DLP_COOKIES = env.getString('YT_DLP_COOKIES', path.join(process.cwd(), 'youtube_cookies.txt'));

// Ratings storage
export const REDIS = {
  HOST: env.getString('REDIS_HOST', 'localhost'),
  PORT: env.getNumber('REDIS_PORT', 6379),
  PASSWORD: process.env.REDIS_PASSWORD || undefined,
};
