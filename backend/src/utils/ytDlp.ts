import fs from 'fs';
import execa from 'execa';
import logger from './logger.js';
import { YT_DLP_COOKIES, YT_DLP_PATH } from '../config.js';

export type YtDlpJson = Record<string, unknown>;

const YOUTUBE_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;

export function isYoutubeId(value: string): boolean {
  return YOUTUBE_ID_PATTERN.test(value);
}

export function watchUrl(youtubeId: string): string {
  return `https://www.youtube.com/watch?v=${youtubeId}`;
}

function cookieArgs(): string[] {
  try {
    fs.accessSync(YT_DLP_COOKIES, fs.constants.R_OK);
    return ['--cookies', YT_DLP_COOKIES];
  } catch {
    return [];
  }
}

/**
 * Runs yt-dlp and returns stdout. `timeoutMs` kills the child process so a
 * stuck extractor releases its worker.
 */
export async function runYtDlp(args: string[], timeoutMs: number): Promise<string> {
  const fullArgs = [...args, ...cookieArgs(), '--no-warnings'];
  logger.debug(`[YTDLP] ${YT_DLP_PATH} ${fullArgs.join(' ')}`);
  const { stdout } = await execa(YT_DLP_PATH, fullArgs, { timeout: timeoutMs });
  return stdout;
}

function isRecord(value: unknown): value is YtDlpJson {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parses yt-dlp `--dump-json` output, one JSON object per line. */
export function parseJsonLines(stdout: string): YtDlpJson[] {
  const rows: YtDlpJson[] = [];
  for (const line of stdout.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (isRecord(parsed)) rows.push(parsed);
    } catch (error) {
      logger.warn('[YTDLP] Skipping unparseable output line:', error);
    }
  }
  return rows;
}

export function stringField(row: YtDlpJson, key: string): string | null {
  const value = row[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

export function numberField(row: YtDlpJson, key: string): number | null {
  const value = row[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function recordList(row: YtDlpJson, key: string): YtDlpJson[] {
  const value = row[key];
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/** First artist, falling back to channel/uploader. */
export function artistOf(row: YtDlpJson): string {
  const artists = row.artists;
  if (Array.isArray(artists) && typeof artists[0] === 'string') {
    return artists[0];
  }
  return stringField(row, 'artist')
    ?? stringField(row, 'channel')
    ?? stringField(row, 'uploader')
    ?? 'Unknown';
}
