import fs from 'fs';
import path from 'path';
import logger from '../../utils/logger.js';
import { runYtDlp } from '../../utils/ytDlp.js';
import { DOWNLOAD_TIMEOUT_MS } from '../../config.js';
import { AudioDownloader } from './types.js';

const AUDIO_FORMATS = '251/250/249/140/139/bestaudio/best';

export class YtDlpAudioDownloader implements AudioDownloader {
  constructor(private readonly cacheDir: string) {}

  async download(youtubeId: string, webpageUrl: string): Promise<string | null> {
    await fs.promises.mkdir(this.cacheDir, { recursive: true });
    // Leftovers from an interrupted attempt would confuse the lookup below
    await this.removeFilesFor(youtubeId);

    const outputTemplate = path.join(this.cacheDir, `${youtubeId}.%(ext)s`);
    await runYtDlp(
      [webpageUrl, '-f', AUDIO_FORMATS, '-o', outputTemplate, '--no-playlist', '--no-cache-dir', '--quiet'],
      DOWNLOAD_TIMEOUT_MS,
    );

    const written = await this.findFileFor(youtubeId);
    if (!written) {
      logger.warn(`[AD] yt-dlp finished but no file found for ${youtubeId}`);
    }
    return written;
  }

  private async findFileFor(youtubeId: string): Promise<string | null> {
    const names = await fs.promises.readdir(this.cacheDir);
    const match = names.find(name => name.startsWith(`${youtubeId}.`) && !name.endsWith('.part'));
    return match ? path.join(this.cacheDir, match) : null;
  }

  private async removeFilesFor(youtubeId: string): Promise<void> {
    const names = await fs.promises.readdir(this.cacheDir);
    await Promise.all(
      names
        .filter(name => name.startsWith(`${youtubeId}.`))
        .map(name => fs.promises.rm(path.join(this.cacheDir, name), { force: true })),
    );
  }
}
