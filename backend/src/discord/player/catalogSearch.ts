import logger from '../../utils/logger.js';
import { extractPool, MediaWorkerPool } from '../../utils/mediaWorkerPool.js';
import { artistOf, numberField, parseJsonLines, runYtDlp, stringField, YtDlpJson } from '../../utils/ytDlp.js';
import { EXTRACT_TIMEOUT_MS } from '../../config.js';
import { CatalogSearch, CatalogTrack } from './types.js';

function toCatalogTrack(row: YtDlpJson): CatalogTrack | null {
  const youtubeId = stringField(row, 'id');
  if (!youtubeId) return null;
  return {
    youtubeId,
    title: stringField(row, 'title') ?? 'Unknown',
    artist: artistOf(row),
    duration: numberField(row, 'duration'),
  };
}

/**
 * Catalog lookups through yt-dlp flat extraction. Similar tracks come from
 * the YouTube Music radio mix seeded by the track.
 */
export class YtDlpCatalogSearch implements CatalogSearch {
  constructor(private readonly pool: MediaWorkerPool = extractPool) {}

  async searchTracks(text: string, limit: number): Promise<CatalogTrack[]> {
    return this.flatList(`ytsearch${limit}:${text}`, limit, 'search');
  }

  async getSimilar(youtubeId: string, limit: number): Promise<CatalogTrack[]> {
    const mixUrl = `https://music.youtube.com/watch?v=${youtubeId}&list=RDAMVM${youtubeId}`;
    return this.flatList(mixUrl, limit, 'mix');
  }

  // Errors propagate: the recommendation layer decides what a failed lookup means
  private async flatList(target: string, limit: number, label: string): Promise<CatalogTrack[]> {
    const stdout = await this.pool.run(`${label} ${target}`, () =>
      runYtDlp([target, '--flat-playlist', '--dump-json', '--playlist-end', String(limit)], EXTRACT_TIMEOUT_MS),
    );

    const tracks: CatalogTrack[] = [];
    for (const row of parseJsonLines(stdout)) {
      const track = toCatalogTrack(row);
      if (track) tracks.push(track);
      if (tracks.length >= limit) break;
    }
    logger.debug(`[CS] ${label} returned ${tracks.length} tracks for ${target}`);
    return tracks;
  }
}
