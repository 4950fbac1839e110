import logger from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { extractPool, MediaWorkerPool } from '../../utils/mediaWorkerPool.js';
import {
  isYoutubeId,
  numberField,
  parseJsonLines,
  recordList,
  runYtDlp,
  stringField,
  watchUrl,
  YtDlpJson,
} from '../../utils/ytDlp.js';
import { EXTRACT_TIMEOUT_MS } from '../../config.js';
import { PlaylistEntry, ResolveResult, Track, TrackResolver } from './types.js';

const RUNTIME_MISSING_MARKERS = ['JavaScript', 'nsig'];

function classifyFailure(message: string): 'runtime_missing' | 'not_found' {
  return RUNTIME_MISSING_MARKERS.some(marker => message.includes(marker))
    ? 'runtime_missing'
    : 'not_found';
}

// Prefer the top-level URL, else the last format that carries audio
function pickStreamUrl(info: YtDlpJson): string | null {
  const direct = stringField(info, 'url');
  if (direct) return direct;

  const audioFormats = recordList(info, 'formats').filter(f => f.acodec !== 'none');
  const last = audioFormats[audioFormats.length - 1];
  return last ? stringField(last, 'url') : null;
}

export function trackFromInfo(info: YtDlpJson, query: string): Track | null {
  const youtubeId = stringField(info, 'id');
  const streamUrl = pickStreamUrl(info);
  if (!youtubeId || !streamUrl) return null;

  return {
    youtubeId,
    title: stringField(info, 'title') ?? 'Unknown',
    duration: numberField(info, 'duration') ?? 0,
    thumbnail: stringField(info, 'thumbnail'),
    streamUrl,
    webpageUrl: stringField(info, 'webpage_url') ?? query,
  };
}

export class YtDlpTrackResolver implements TrackResolver {
  constructor(private readonly pool: MediaWorkerPool = extractPool) {}

  isPlaylistUrl(url: string): boolean {
    return url.includes('list=') || url.includes('/playlist');
  }

  async resolve(queryOrUrl: string): Promise<ResolveResult> {
    // Bare ids come from catalog results
    const query = isYoutubeId(queryOrUrl) && !queryOrUrl.startsWith('http')
      ? watchUrl(queryOrUrl)
      : queryOrUrl;

    try {
      const stdout = await this.pool.run(`resolve ${query}`, () =>
        runYtDlp([query, '--dump-json', '--no-download', '--no-playlist', '-f', 'bestaudio/best'], EXTRACT_TIMEOUT_MS),
      );
      const [info] = parseJsonLines(stdout);
      if (!info) {
        return { ok: false, reason: 'not_found', message: `No metadata returned for ${query}` };
      }

      const track = trackFromInfo(info, query);
      if (!track) {
        return { ok: false, reason: 'not_found', message: `No playable audio for ${query}` };
      }

      logger.debug(`[TR] Resolved ${query} -> ${track.title} (${track.youtubeId})`);
      return { ok: true, track };
    } catch (error) {
      const message = errorMessage(error);
      const reason = classifyFailure(message);
      if (reason === 'runtime_missing') {
        logger.error('[TR] yt-dlp needs a JavaScript runtime (Deno or Node.js) to extract YouTube streams');
      } else {
        logger.warn(`[TR] Failed to resolve ${query}: ${message}`);
      }
      return { ok: false, reason, message };
    }
  }

  async search(text: string): Promise<Track | null> {
    const result = await this.resolve(`ytsearch1:${text}`);
    return result.ok ? result.track : null;
  }

  async resolvePlaylist(url: string): Promise<PlaylistEntry[]> {
    let rows: YtDlpJson[];
    try {
      const stdout = await this.pool.run(`playlist ${url}`, () =>
        runYtDlp([url, '--flat-playlist', '--dump-json', '--ignore-errors'], EXTRACT_TIMEOUT_MS),
      );
      rows = parseJsonLines(stdout);
    } catch (error) {
      logger.warn(`[TR] Failed to read playlist ${url}: ${errorMessage(error)}`);
      return [];
    }

    const entries: PlaylistEntry[] = [];
    for (const row of rows) {
      const youtubeId = stringField(row, 'id');
      if (!youtubeId) continue;
      entries.push({ youtubeId, title: stringField(row, 'title') ?? 'Unknown' });
    }
    logger.info(`[TR] Playlist ${url} has ${entries.length} entries`);
    return entries;
  }
}
