/// <reference types="jest" />
import fs from 'fs';
import os from 'os';
import path from 'path';
import { AutoplayManager } from '../discord/player/autoplayManager';
import { AudioCache } from '../discord/player/cacheManager';
import { RecommendationService } from '../discord/player/recommendationService';
import { SessionPlayer } from '../discord/player/sessionPlayer';
import { PlayerSettings, Track } from '../discord/player/types';
import { MediaWorkerPool } from '../utils/mediaWorkerPool';
import { SessionMutex } from '../utils/sessionMutex';
import {
  catalogTrack,
  FakeCatalog,
  FakeDownloader,
  FakeRatingStore,
  FakeResolver,
  FakeSink,
  FakeVoiceLink,
  makeTrack,
  settle,
  waitFor,
} from './fakes';

const SETTINGS: PlayerSettings = {
  recentLimit: 3,
  autoplayBufferTarget: 3,
  prefetchQueueAhead: 2,
  prefetchAutoplayAhead: 1,
  disconnectTimeoutMs: 300_000,
  injectedAudioTimeoutMs: 1000,
};

describe('SessionPlayer', () => {
  let dir: string;
  let downloader: FakeDownloader;
  let cache: AudioCache;
  let catalog: FakeCatalog;
  let resolver: FakeResolver;
  let sink: FakeSink;
  let link: FakeVoiceLink;
  let clock: number;
  let player: SessionPlayer;

  const createPlayer = (settings: Partial<PlayerSettings> = {}) => {
    const mutex = new SessionMutex();
    const recommendations = new RecommendationService('111', catalog, new FakeRatingStore(), {
      seedCacheLimit: 20,
      playedLimit: 200,
      fetchLimit: 25,
    });
    const created = new SessionPlayer({
      sessionKey: '111',
      cache,
      recommendations,
      autoplay: new AutoplayManager(resolver, mutex),
      mutex,
      sink,
      settings: { ...SETTINGS, ...settings },
      now: () => clock,
    });
    created.setVoiceLink(link);
    return created;
  };

  const queueIds = () => player.getQueue().map(t => t.youtubeId);

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'session-player-'));
    downloader = new FakeDownloader(dir);
    cache = new AudioCache({
      cacheDir: dir,
      maxFiles: 10,
      maxBytes: 1_000_000,
      downloadTimeoutMs: 1000,
      downloader,
      pool: new MediaWorkerPool('test', 2, 1000),
    });
    catalog = new FakeCatalog();
    resolver = new FakeResolver();
    sink = new FakeSink();
    link = new FakeVoiceLink();
    clock = 1_000_000;
    player = createPlayer();
  });

  afterEach(async () => {
    await player.disconnect();
    await settle();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('queue', () => {
    it('should keep tracks in insertion order and report positions', async () => {
      await expect(player.enqueue(makeTrack('a'))).resolves.toBe(1);
      await expect(player.enqueue(makeTrack('b'))).resolves.toBe(2);
      await expect(player.enqueueMany([makeTrack('c'), makeTrack('d')])).resolves.toBe(2);

      expect(queueIds()).toEqual(['a', 'b', 'c', 'd']);
    });

    it('should return a copy of the queue', async () => {
      await player.enqueue(makeTrack('a'));

      player.getQueue().length = 0;

      expect(queueIds()).toEqual(['a']);
    });

    it('should leave short queues alone when shuffling', async () => {
      await expect(player.shuffleQueue()).resolves.toBe(0);

      await player.enqueue(makeTrack('a'));
      await expect(player.shuffleQueue()).resolves.toBe(1);
      expect(queueIds()).toEqual(['a']);
    });

    it('should preserve the set of tracks when shuffling', async () => {
      const trackIds = ['a', 'b', 'c', 'd', 'e', 'f'];
      await player.enqueueMany(trackIds.map(id => makeTrack(id)));

      await expect(player.shuffleQueue()).resolves.toBe(6);

      expect([...queueIds()].sort()).toEqual(trackIds);
    });
  });

  describe('playNext', () => {
    it('should play queued tracks in order', async () => {
      await player.enqueue(makeTrack('A', { duration: 180 }));
      await player.enqueue(makeTrack('B', { duration: 200 }));
      await player.enqueue(makeTrack('C', { duration: 220 }));

      const played: string[] = [];
      const remaining: number[] = [];
      for (let i = 0; i < 3; i++) {
        const result = await player.playNext();
        if (result.status !== 'playing') throw new Error(`unexpected ${result.status}`);
        played.push(result.track.youtubeId);
        remaining.push(player.getQueue().length);
      }

      expect(played).toEqual(['A', 'B', 'C']);
      expect(remaining).toEqual([2, 1, 0]);
      expect(player.getCurrentTrack()?.youtubeId).toBe('C');
    });

    it('should play from the cache when the download succeeds', async () => {
      await player.enqueue(makeTrack('A'));

      const result = await player.playNext();

      expect(result).toMatchObject({ status: 'playing', source: 'cache' });
      expect(sink.plays).toEqual([{ kind: 'file', path: path.join(dir, 'A.webm') }]);
    });

    it('should stream directly when the download fails', async () => {
      downloader.failing.add('A');
      await player.enqueue(makeTrack('A'));

      const result = await player.playNext();

      expect(result).toMatchObject({ status: 'playing', source: 'stream' });
      expect(sink.plays).toEqual([{ kind: 'stream', url: 'https://media.example.com/A' }]);
    });

    it('should refuse to play without a voice connection', async () => {
      link.connected = false;
      await player.enqueue(makeTrack('A'));

      await expect(player.playNext()).resolves.toEqual({ status: 'disconnected' });

      expect(sink.plays).toEqual([]);
      expect(queueIds()).toEqual(['A']);
    });

    it('should report exhaustion and arm the disconnect timer', async () => {
      await expect(player.playNext()).resolves.toEqual({ status: 'exhausted' });

      expect(player.getCurrentTrack()).toBeNull();
      expect(player.hasDisconnectTimer()).toBe(true);
    });

    it('should cancel the disconnect timer when a track starts', async () => {
      await player.playNext();
      await player.enqueue(makeTrack('A'));

      await player.playNext();

      expect(player.hasDisconnectTimer()).toBe(false);
    });

    it('should disconnect after the idle timeout', async () => {
      player = createPlayer({ disconnectTimeoutMs: 20 });

      await player.playNext();

      await waitFor(() => link.destroyed);
      expect(player.isConnected()).toBe(false);
    });

    it('should fail acquisition when there is no cache file and no usable stream URL', async () => {
      downloader.failing.add('bad');
      const bad = makeTrack('bad', { streamUrl: 'not a url' });
      await player.enqueue(bad);

      const result = await player.playNext();

      expect(result).toEqual({ status: 'failed', reason: 'acquisition', track: bad });
      expect(player.getCurrentTrack()).toBeNull();
      expect(player.hasDisconnectTimer()).toBe(true);
    });

    it('should report a sink that fails to start', async () => {
      sink.failNextPlay = true;
      await player.enqueue(makeTrack('A'));

      const result = await player.playNext();

      expect(result).toMatchObject({ status: 'failed', reason: 'sink' });
      expect(player.getCurrentTrack()).toBeNull();
    });

    it('should keep the newest three tracks in the recent ring', async () => {
      await player.enqueueMany(['t1', 't2', 't3', 't4', 't5'].map(id => makeTrack(id)));

      for (let i = 0; i < 5; i++) {
        await player.playNext();
      }

      expect(player.getRecentHistory()).toEqual(['t3', 't4', 't5']);
    });

    it('should move a replayed track to the newest end of the ring', async () => {
      await player.enqueueMany([makeTrack('t1'), makeTrack('t2'), makeTrack('t1')]);

      for (let i = 0; i < 3; i++) {
        await player.playNext();
      }

      expect(player.getRecentHistory()).toEqual(['t2', 't1']);
    });

    it('should evict the replaced track from the cache', async () => {
      await player.enqueueMany([makeTrack('A'), makeTrack('B')]);
      await player.playNext();
      expect(cache.isReady('A')).toBe(true);

      await player.playNext();

      expect(cache.isReady('A')).toBe(false);
      expect(player.getCurrentTrack()?.youtubeId).toBe('B');
    });

    it('should prefetch upcoming queued tracks', async () => {
      await player.enqueueMany(['A', 'B', 'C', 'D'].map(id => makeTrack(id)));

      await player.playNext();

      await waitFor(() => cache.isReady('B') && cache.isReady('C'));
      expect(cache.isReady('D')).toBe(false);
    });
  });

  describe('completion', () => {
    it('should advance to the next track when the current one ends', async () => {
      await player.enqueueMany([makeTrack('A'), makeTrack('B')]);
      await player.playNext();

      sink.finish();

      await waitFor(() => sink.plays.length === 2);
      expect(player.getCurrentTrack()?.youtubeId).toBe('B');
      expect(cache.isReady('A')).toBe(false);
    });

    it('should advance the same way after a playback error', async () => {
      await player.enqueueMany([makeTrack('A'), makeTrack('B')]);
      await player.playNext();

      sink.finish(new Error('stream reset'));

      await waitFor(() => player.getCurrentTrack()?.youtubeId === 'B');
    });

    it('should skip past tracks that cannot be acquired', async () => {
      downloader.failing.add('bad');
      await player.enqueueMany([makeTrack('A'), makeTrack('bad', { streamUrl: 'nope' }), makeTrack('C')]);
      await player.playNext();

      sink.finish();

      await waitFor(() => player.getCurrentTrack()?.youtubeId === 'C');
      expect(queueIds()).toEqual([]);
    });

    it('should go idle once the queue runs dry', async () => {
      await player.enqueue(makeTrack('A'));
      await player.playNext();

      sink.finish();

      await waitFor(() => player.hasDisconnectTimer());
      expect(player.getCurrentTrack()).toBeNull();
      expect(player.elapsedSeconds()).toBeNull();
    });

    it('should let a finished track be cached again without this session purging it', async () => {
      await player.enqueueMany([makeTrack('A'), makeTrack('B')]);
      await player.playNext();
      sink.finish();
      await waitFor(() => player.getCurrentTrack()?.youtubeId === 'B');

      await cache.ensureDownloaded(makeTrack('A'));
      await player.disconnect();

      expect(cache.isReady('A')).toBe(true);
      expect(cache.isReady('B')).toBe(false);
    });
  });

  describe('advance', () => {
    it('should retry until a track starts', async () => {
      downloader.failing.add('bad');
      await player.enqueueMany([makeTrack('bad', { streamUrl: 'ftp://example.com/bad' }), makeTrack('B')]);

      const result = await player.advance();

      expect(result).toMatchObject({ status: 'playing', track: { youtubeId: 'B' } });
    });
  });

  describe('autoplay', () => {
    beforeEach(() => {
      catalog = new FakeCatalog({ X: ['R1', 'R2', 'R3', 'R4'].map(catalogTrack) });
      resolver = new FakeResolver(['R1', 'R2', 'R3', 'R4'].map(id => makeTrack(id)));
      player = createPlayer();
    });

    it('should toggle and leave the queues untouched', async () => {
      await player.enqueue(makeTrack('A'));

      expect(player.toggleAutoplay()).toBe(true);
      expect(player.toggleAutoplay()).toBe(false);

      expect(player.isAutoplayEnabled()).toBe(false);
      expect(queueIds()).toEqual(['A']);
      expect(player.getAutoplayQueue()).toEqual([]);
    });

    it('should refill the autoplay buffer in the background', async () => {
      player.toggleAutoplay();
      await player.enqueue(makeTrack('X'));

      await player.playNext();

      await waitFor(() => player.getAutoplayQueue().length === 3);
      expect(player.getAutoplayQueue().map(t => t.youtubeId)).toEqual(['R1', 'R2', 'R3']);
    });

    it('should play from the autoplay buffer when the queue is empty', async () => {
      player.toggleAutoplay();
      await player.enqueue(makeTrack('X'));
      await player.playNext();
      await waitFor(() => player.getAutoplayQueue().length === 3);

      const result = await player.playNext();

      expect(result).toMatchObject({ status: 'playing', track: { youtubeId: 'R1' } });
    });

    it('should fetch a fallback recommendation when the buffer is empty', async () => {
      await player.enqueue(makeTrack('X'));
      await player.playNext();
      player.toggleAutoplay();

      const result = await player.playNext();

      expect(result).toMatchObject({ status: 'playing', track: { youtubeId: 'R1' } });
      expect(player.getRecentHistory()).toEqual(['X', 'R1']);
    });

    it('should not autoplay while disabled', async () => {
      await player.enqueue(makeTrack('X'));
      await player.playNext();

      await expect(player.playNext()).resolves.toEqual({ status: 'exhausted' });
      expect(resolver.calls).toEqual([]);
    });

    it('should clear the recent ring and buffer on clearHistory', async () => {
      player.toggleAutoplay();
      await player.enqueue(makeTrack('X'));
      await player.playNext();
      await waitFor(() => player.getAutoplayQueue().length === 3);

      await player.clearHistory();

      expect(player.getRecentHistory()).toEqual([]);
      expect(player.getAutoplayQueue()).toEqual([]);
    });

    it('should stop a running refill from refilling the buffer after clearHistory', async () => {
      resolver.holding.add('R1');
      player.toggleAutoplay();
      await player.enqueue(makeTrack('X'));
      await player.playNext();
      await waitFor(() => resolver.calls.includes('R1'));

      await player.clearHistory();
      resolver.release('R1');
      await settle(50);

      expect(player.getRecentHistory()).toEqual([]);
      expect(player.getAutoplayQueue()).toEqual([]);
      expect(resolver.calls).toEqual(['R1']);
    });
  });

  describe('controls', () => {
    it('should skip only while something is playing', async () => {
      expect(player.skip()).toBe(false);

      await player.enqueueMany([makeTrack('A'), makeTrack('B')]);
      await player.playNext();

      expect(player.skip()).toBe(true);
      await waitFor(() => player.getCurrentTrack()?.youtubeId === 'B');
    });

    it('should pause and resume from matching states only', async () => {
      expect(player.pause()).toBe(false);

      await player.enqueue(makeTrack('A'));
      await player.playNext();

      expect(player.resume()).toBe(false);
      expect(player.pause()).toBe(true);
      expect(player.pause()).toBe(false);
      expect(player.isPaused()).toBe(true);
      expect(player.isPlaying()).toBe(true);
      expect(player.resume()).toBe(true);
      expect(player.isPaused()).toBe(false);
    });

    it('should not count paused time as elapsed', async () => {
      expect(player.elapsedSeconds()).toBeNull();

      await player.enqueue(makeTrack('A'));
      await player.playNext();

      clock += 5000;
      player.pause();
      clock += 10_000;
      expect(player.elapsedSeconds()).toBe(5);

      player.resume();
      clock += 3000;
      expect(player.elapsedSeconds()).toBe(8);
    });

    it('should reset elapsed time when nothing is left to play', async () => {
      await player.enqueue(makeTrack('A'));
      await player.playNext();
      clock += 60_000;
      expect(player.elapsedSeconds()).toBe(60);

      await expect(player.playNext()).resolves.toEqual({ status: 'exhausted' });
      clock += 3_600_000;

      expect(player.elapsedSeconds()).toBeNull();
      expect(player.progressBar()).toBeNull();
    });

    it('should reset elapsed time when the next track fails to start', async () => {
      await player.enqueueMany([makeTrack('A'), makeTrack('B')]);
      await player.playNext();
      clock += 10_000;
      sink.failNextPlay = true;

      await expect(player.playNext()).resolves.toMatchObject({ status: 'failed', reason: 'sink' });

      expect(player.elapsedSeconds()).toBeNull();
    });

    it('should render progress for the current track', async () => {
      await player.enqueue(makeTrack('A', { duration: 120 }));
      await player.playNext();
      clock += 30_000;

      expect(player.progressBar(10)).toBe('[==>       ] 0:30 / 2:00');
    });

    it('should clamp the volume and apply it to the sink', () => {
      expect(player.setVolume(1.5)).toBe(1);
      expect(player.setVolume(-1)).toBe(0);
      expect(player.setVolume(0.4)).toBe(0.4);

      expect(player.getVolume()).toBe(0.4);
      expect(sink.volume).toBe(0.4);
    });
  });

  describe('playAudioFile', () => {
    it('should pause music for the clip and resume it afterwards', async () => {
      await player.enqueue(makeTrack('A'));
      await player.playNext();
      const pauseSpy = jest.spyOn(sink, 'pause');

      await expect(player.playAudioFile('/tmp/reply.ogg')).resolves.toBe(true);

      expect(pauseSpy).toHaveBeenCalledTimes(1);
      expect(sink.injected).toEqual(['/tmp/reply.ogg']);
      expect(sink.isPlaying()).toBe(true);
    });

    it('should leave music paused when the user had paused it', async () => {
      await player.enqueue(makeTrack('A'));
      await player.playNext();
      player.pause();

      await player.playAudioFile('/tmp/reply.ogg');

      expect(sink.isPaused()).toBe(true);
    });

    it('should play clips one at a time in call order', async () => {
      const order: string[] = [];
      jest.spyOn(sink, 'playInjected').mockImplementation(async (filePath: string) => {
        order.push(`start ${filePath}`);
        await settle(10);
        order.push(`end ${filePath}`);
      });

      await Promise.all([player.playAudioFile('one.ogg'), player.playAudioFile('two.ogg')]);

      expect(order).toEqual(['start one.ogg', 'end one.ogg', 'start two.ogg', 'end two.ogg']);
    });

    it('should report failure without a voice connection', async () => {
      link.connected = false;

      await expect(player.playAudioFile('/tmp/reply.ogg')).resolves.toBe(false);
      expect(sink.injected).toEqual([]);
    });

    it('should report a clip that fails to play', async () => {
      jest.spyOn(sink, 'playInjected').mockRejectedValue(new Error('bad file'));

      await expect(player.playAudioFile('/tmp/reply.ogg')).resolves.toBe(false);
    });
  });

  describe('teardown', () => {
    it('should clear state, purge cached tracks and drop the link on disconnect', async () => {
      await player.enqueueMany([makeTrack('A'), makeTrack('B')]);
      await player.playNext();
      await waitFor(() => cache.isReady('B'));

      await player.disconnect();

      expect(link.destroyed).toBe(true);
      expect(player.getQueue()).toEqual([]);
      expect(player.getCurrentTrack()).toBeNull();
      expect(player.getRecentHistory()).toEqual([]);
      expect(player.hasDisconnectTimer()).toBe(false);
      expect(cache.entryCount).toBe(0);
      expect(sink.isPlaying()).toBe(false);
    });

    it('should not advance after the stopped track completes', async () => {
      await player.enqueueMany([makeTrack('A'), makeTrack('B')]);
      await player.playNext();
      const played = sink.plays.length;

      await player.disconnect();
      await settle();

      expect(sink.plays).toHaveLength(played);
    });

    it('should clear the session when removed from voice', async () => {
      await player.enqueueMany([makeTrack('A'), makeTrack('B')]);
      await player.playNext();
      await waitFor(() => cache.isReady('B'));

      await player.handleForcedRemoval();

      expect(player.isConnected()).toBe(false);
      expect(cache.entryCount).toBe(0);
      expect(sink.isPlaying()).toBe(true);
      expect(player.getQueue()).toEqual([]);
      expect(player.getCurrentTrack()).toBeNull();
      await expect(player.playNext()).resolves.toEqual({ status: 'disconnected' });
    });

    it('should keep an idle session usable after disconnect', async () => {
      await player.disconnect();
      player.setVoiceLink(new FakeVoiceLink());
      await player.enqueue(makeTrack('A'));

      const result = await player.playNext();

      expect(result.status).toBe('playing');
    });
  });

  it('should treat a played track as the newest recent entry', async () => {
    const track: Track = makeTrack('A');
    await player.enqueue(track);

    await player.playNext();

    const recent = player.getRecentHistory();
    expect(recent[recent.length - 1]).toBe('A');
  });
});
