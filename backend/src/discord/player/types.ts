// Track produced by the resolver. Only `localPath` is ever written after creation.
export interface Track {
  readonly youtubeId: string;
  readonly title: string;
  readonly duration: number; // seconds, <= 0 means live/unknown
  readonly thumbnail: string | null;
  readonly streamUrl: string;
  readonly webpageUrl: string;
  localPath?: string;
}

export interface PlaylistEntry {
  youtubeId: string;
  title: string;
}

// Lightweight catalog row used for autocomplete and recommendations
export interface CatalogTrack {
  youtubeId: string;
  title: string;
  artist: string;
  duration: number | null;
}

export type ResolveFailure = 'not_found' | 'runtime_missing' | 'error';

export type ResolveResult =
  | { ok: true; track: Track }
  | { ok: false; reason: ResolveFailure; message: string };

export interface TrackResolver {
  resolve(queryOrUrl: string): Promise<ResolveResult>;
  resolvePlaylist(url: string): Promise<PlaylistEntry[]>;
  search(text: string): Promise<Track | null>;
  isPlaylistUrl(url: string): boolean;
}

export interface CatalogSearch {
  searchTracks(text: string, limit: number): Promise<CatalogTrack[]>;
  getSimilar(youtubeId: string, limit: number): Promise<CatalogTrack[]>;
}

export interface RatingStore {
  getRatingsForSession(sessionKey: string): Promise<Map<string, number>>;
}

export interface AudioDownloader {
  /** Downloads into the cache directory; resolves to the written file or null. */
  download(youtubeId: string, webpageUrl: string): Promise<string | null>;
}

export type AudioSource =
  | { kind: 'file'; path: string }
  | { kind: 'stream'; url: string };

export type CompletionHandler = (error?: Error) => void;

export interface AudioSink {
  /**
   * Starts playback. `onComplete` fires exactly once when the source ends for
   * any reason, unless a later `play` call replaces the source first.
   */
  play(source: AudioSource, onComplete: CompletionHandler): Promise<void>;
  stop(): void;
  pause(): boolean;
  resume(): boolean;
  isPlaying(): boolean;
  isPaused(): boolean;
  setVolume(volume: number): void;
  /** Plays a file on the out-of-band channel and resolves when it finishes. */
  playInjected(filePath: string, timeoutMs: number): Promise<void>;
  destroy(): void;
}

export interface VoiceLink {
  readonly channelId: string;
  isConnected(): boolean;
  destroy(): void;
}

export interface VoiceGateway<C, S extends AudioSink> {
  join(sessionKey: string, channel: C, sink: S): Promise<VoiceLink>;
}

export type PlaybackSource = 'cache' | 'stream';

export type PlayNextResult =
  | { status: 'playing'; track: Track; source: PlaybackSource }
  | { status: 'exhausted' }
  | { status: 'disconnected' }
  | { status: 'failed'; reason: 'acquisition' | 'sink'; track: Track };

export interface PlayerSettings {
  recentLimit: number;
  autoplayBufferTarget: number;
  prefetchQueueAhead: number;
  prefetchAutoplayAhead: number;
  disconnectTimeoutMs: number;
  injectedAudioTimeoutMs: number;
}
