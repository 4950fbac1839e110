/// <reference types="jest" />
import { AutoplayManager } from '../discord/player/autoplayManager';
import { SessionState } from '../discord/player/playerStateManager';
import { RecommendationService } from '../discord/player/recommendationService';
import { SessionMutex } from '../utils/sessionMutex';
import { catalogTrack, FakeCatalog, FakeRatingStore, FakeResolver, makeTrack } from './fakes';

describe('AutoplayManager', () => {
  let catalog: FakeCatalog;
  let resolver: FakeResolver;
  let session: SessionState;
  let manager: AutoplayManager;

  const bufferIds = () => session.autoplayQueue.map(t => t.youtubeId);

  beforeEach(() => {
    catalog = new FakeCatalog({ X: ['A', 'B', 'C', 'D', 'E'].map(catalogTrack) });
    resolver = new FakeResolver(['A', 'B', 'C', 'D', 'E'].map(id => makeTrack(id)));
    const recommendations = new RecommendationService('111', catalog, new FakeRatingStore(), {
      seedCacheLimit: 20,
      playedLimit: 200,
      fetchLimit: 25,
    });
    session = new SessionState('111', recommendations, 3);
    session.pushRecent('X');
    manager = new AutoplayManager(resolver, new SessionMutex());
  });

  describe('refillAutoplayBuffer', () => {
    it('should fill the buffer up to the target', async () => {
      await expect(manager.refillAutoplayBuffer(session, 3)).resolves.toBe(3);

      expect(bufferIds()).toEqual(['A', 'B', 'C']);
    });

    it('should keep a partial fill when candidates fail to resolve', async () => {
      resolver = new FakeResolver([makeTrack('B'), makeTrack('D')]);
      manager = new AutoplayManager(resolver, new SessionMutex());

      await expect(manager.refillAutoplayBuffer(session, 3)).resolves.toBe(2);

      expect(bufferIds()).toEqual(['B', 'D']);
    });

    it('should not resolve tracks that are already buffered', async () => {
      session.autoplayQueue.push(makeTrack('A'));

      await expect(manager.refillAutoplayBuffer(session, 3)).resolves.toBe(2);

      expect(bufferIds()).toEqual(['A', 'B', 'C']);
      expect(resolver.calls).toEqual(['B', 'C']);
    });

    it('should stop once the token is cancelled', async () => {
      await expect(manager.refillAutoplayBuffer(session, 3, { cancelled: true })).resolves.toBe(0);

      expect(bufferIds()).toEqual([]);
      expect(resolver.calls).toEqual([]);
    });

    it('should do nothing without history', async () => {
      session.clearRecent();

      await expect(manager.refillAutoplayBuffer(session, 3)).resolves.toBe(0);

      expect(catalog.similarCalls).toEqual([]);
    });

    it('should swallow resolver failures', async () => {
      jest.spyOn(resolver, 'resolve').mockRejectedValue(new Error('extractor crashed'));

      await expect(manager.refillAutoplayBuffer(session, 3)).resolves.toBe(0);

      expect(bufferIds()).toEqual([]);
    });
  });

  describe('fetchFallbackTrack', () => {
    it('should return the first candidate that resolves', async () => {
      catalog = new FakeCatalog({ X: ['U', 'R1', 'R2'].map(catalogTrack) });
      const recommendations = new RecommendationService('111', catalog, new FakeRatingStore(), {
        seedCacheLimit: 20,
        playedLimit: 200,
        fetchLimit: 25,
      });
      session = new SessionState('111', recommendations, 3);
      session.pushRecent('X');
      resolver = new FakeResolver([makeTrack('R1'), makeTrack('R2')]);
      manager = new AutoplayManager(resolver, new SessionMutex());

      const track = await manager.fetchFallbackTrack(session);

      expect(track?.youtubeId).toBe('R1');
      expect(resolver.calls).toEqual(['U', 'R1']);
    });

    it('should return null when nothing resolves', async () => {
      resolver = new FakeResolver();
      manager = new AutoplayManager(resolver, new SessionMutex());

      await expect(manager.fetchFallbackTrack(session)).resolves.toBeNull();
    });
  });
});
