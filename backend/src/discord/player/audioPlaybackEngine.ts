import {
  createAudioPlayer,
  createAudioResource,
  entersState,
  AudioPlayer,
  AudioPlayerStatus,
  AudioResource,
  StreamType,
  demuxProbe,
  NoSubscriberBehavior,
  VoiceConnection,
} from '@discordjs/voice';
import { createReadStream } from 'fs';
import execa, { ExecaChildProcess } from 'execa';
import logger from '../../utils/logger.js';
import { SinkError } from '../../utils/errors.js';
import { FFMPEG_PATH } from '../../config.js';
import { AudioSink, AudioSource, CompletionHandler } from './types.js';

// Reconnect on dropped network streams
const FFMPEG_BEFORE_OPTIONS = ['-reconnect', '1', '-reconnect_streamed', '1', '-reconnect_delay_max', '5'];
const FFMPEG_OUTPUT_OPTIONS = ['-vn', '-analyzeduration', '0', '-loglevel', '0', '-f', 's16le', '-ar', '48000', '-ac', '2', 'pipe:1'];

/**
 * Discord audio sink for one guild. Music goes through `audioPlayer`; spoken
 * replies and other injected clips go through a second player that is
 * swapped onto the connection while they play.
 */
export class AudioPlaybackEngine implements AudioSink {
  private readonly audioPlayer: AudioPlayer;
  private readonly injectionPlayer: AudioPlayer;
  private connection?: VoiceConnection;
  private currentResource?: AudioResource<AudioSource>;
  private transcoder: ExecaChildProcess | null = null;
  private onComplete: CompletionHandler | null = null;
  private pendingError?: Error;
  private volume = 1.0;

  constructor(private readonly sessionKey: string) {
    this.audioPlayer = createAudioPlayer({
      behaviors: {
        noSubscriber: NoSubscriberBehavior.Play,
      },
    });
    this.injectionPlayer = createAudioPlayer({
      behaviors: {
        noSubscriber: NoSubscriberBehavior.Stop,
      },
    });

    this.audioPlayer.on('stateChange', (oldState, newState) => {
      logger.debug(`[APE] ${this.sessionKey}: ${oldState.status} -> ${newState.status}`);

      if (newState.status === AudioPlayerStatus.Idle && oldState.status !== AudioPlayerStatus.Idle) {
        this.finishCurrent();
      } else if (newState.status === AudioPlayerStatus.Playing) {
        this.currentResource?.volume?.setVolume(this.volume);
      }
    });

    // An error is always followed by Idle, which reports it
    this.audioPlayer.on('error', (error) => {
      logger.error(`[APE] ${this.sessionKey}: audio player error: ${error.message}`);
      this.pendingError = error;
    });

    this.injectionPlayer.on('error', (error) => {
      logger.error(`[APE] ${this.sessionKey}: injected audio error: ${error.message}`);
    });
  }

  public attachTo(connection: VoiceConnection): void {
    this.connection = connection;
    connection.subscribe(this.audioPlayer);
    logger.debug(`[APE] ${this.sessionKey}: subscribed to voice connection`);
  }

  public async play(source: AudioSource, onComplete: CompletionHandler): Promise<void> {
    // Whatever was playing is being replaced; its completion must not fire
    this.onComplete = null;
    this.stopTranscoder();

    let resource: AudioResource<AudioSource>;
    try {
      resource = source.kind === 'file'
        ? await this.createResourceFromFile(source.path, source)
        : this.createResourceFromStream(source.url, source);
    } catch (error) {
      throw new SinkError(`Could not open audio source for ${this.sessionKey}`, { cause: error });
    }

    resource.volume?.setVolume(this.volume);
    this.currentResource = resource;
    this.pendingError = undefined;
    this.onComplete = onComplete;
    this.audioPlayer.play(resource);
  }

  private async createResourceFromFile(filePath: string, metadata: AudioSource): Promise<AudioResource<AudioSource>> {
    const stream = createReadStream(filePath);
    // Use demuxProbe to determine the input type
    const { stream: demuxedStream, type } = await demuxProbe(stream);
    logger.debug(`[APE] Creating AudioResource with type: ${type}`);
    return createAudioResource(demuxedStream, {
      inputType: type,
      inlineVolume: true,
      metadata,
    });
  }

  private createResourceFromStream(url: string, metadata: AudioSource): AudioResource<AudioSource> {
    const transcoder = execa(FFMPEG_PATH, [...FFMPEG_BEFORE_OPTIONS, '-i', url, ...FFMPEG_OUTPUT_OPTIONS], {
      buffer: false,
      stdin: 'ignore',
      stderr: 'ignore',
    });
    // Killed on skip/stop, so a rejection here is routine
    transcoder.catch((error: unknown) => {
      logger.debug(`[APE] ${this.sessionKey}: ffmpeg exited:`, error);
    });

    if (!transcoder.stdout) {
      transcoder.kill('SIGKILL');
      throw new SinkError('ffmpeg produced no output stream');
    }

    this.transcoder = transcoder;
    return createAudioResource(transcoder.stdout, {
      inputType: StreamType.Raw,
      inlineVolume: true,
      metadata,
    });
  }

  private finishCurrent(): void {
    const callback = this.onComplete;
    const error = this.pendingError;
    this.onComplete = null;
    this.pendingError = undefined;
    this.currentResource = undefined;
    this.stopTranscoder();
    callback?.(error);
  }

  private stopTranscoder(): void {
    if (this.transcoder) {
      this.transcoder.kill('SIGKILL');
      this.transcoder = null;
    }
  }

  public pause(): boolean {
    if (this.audioPlayer.state.status === AudioPlayerStatus.Playing) {
      const success = this.audioPlayer.pause();
      logger.debug(`[APE] ${this.sessionKey}: pause issued, success=${success}`);
      return success;
    }
    return false;
  }

  public resume(): boolean {
    const status = this.audioPlayer.state.status;
    if (status === AudioPlayerStatus.Paused || status === AudioPlayerStatus.AutoPaused) {
      const success = this.audioPlayer.unpause();
      logger.debug(`[APE] ${this.sessionKey}: resume issued, success=${success}`);
      return success;
    }
    return false;
  }

  /** Ends the current source; the completion callback still fires. */
  public stop(): void {
    this.audioPlayer.stop(true);
  }

  public isPlaying(): boolean {
    const status = this.audioPlayer.state.status;
    return status === AudioPlayerStatus.Playing || status === AudioPlayerStatus.Buffering;
  }

  public isPaused(): boolean {
    const status = this.audioPlayer.state.status;
    return status === AudioPlayerStatus.Paused || status === AudioPlayerStatus.AutoPaused;
  }

  public setVolume(volume: number): void {
    this.volume = Math.max(0, Math.min(1, volume));
    this.currentResource?.volume?.setVolume(this.volume);
  }

  public async playInjected(filePath: string, timeoutMs: number): Promise<void> {
    const connection = this.connection;
    if (!connection) {
      throw new SinkError(`No voice connection for ${this.sessionKey}`);
    }

    const resource = await this.createResourceFromFile(filePath, { kind: 'file', path: filePath });
    connection.subscribe(this.injectionPlayer);
    try {
      this.injectionPlayer.play(resource);
      await entersState(this.injectionPlayer, AudioPlayerStatus.Idle, timeoutMs);
    } finally {
      this.injectionPlayer.stop(true);
      connection.subscribe(this.audioPlayer);
    }
  }

  public destroy(): void {
    logger.debug(`[APE] ${this.sessionKey}: destroying audio players`);
    this.onComplete = null;
    this.stopTranscoder();
    this.audioPlayer.stop(true);
    this.injectionPlayer.stop(true);
    this.audioPlayer.removeAllListeners();
    this.injectionPlayer.removeAllListeners();
    this.connection = undefined;
  }
}
