import client from 'prom-client';

// Create a Registry
const register = new client.Registry();

// Add default metrics
client.collectDefaultMetrics({ register });

const tracksStartedCounter = new client.Counter({
  name: 'playback_tracks_started_total',
  help: 'Tracks handed to the audio sink',
  labelNames: ['source'], // 'cache', 'stream'
});

const playNextOutcomeCounter = new client.Counter({
  name: 'playback_play_next_total',
  help: 'playNext outcomes',
  labelNames: ['status'], // 'playing', 'exhausted', 'disconnected', 'failed'
});

const cacheEntriesGauge = new client.Gauge({
  name: 'playback_cache_entries',
  help: 'Files currently held in the audio cache',
});

const cacheBytesGauge = new client.Gauge({
  name: 'playback_cache_bytes',
  help: 'Bytes currently held in the audio cache',
});

const activeSessionsGauge = new client.Gauge({
  name: 'playback_sessions',
  help: 'Sessions known to the registry',
});

register.registerMetric(tracksStartedCounter);
register.registerMetric(playNextOutcomeCounter);
register.registerMetric(cacheEntriesGauge);
register.registerMetric(cacheBytesGauge);
register.registerMetric(activeSessionsGauge);

export {
  register,
  tracksStartedCounter,
  playNextOutcomeCounter,
  cacheEntriesGauge,
  cacheBytesGauge,
  activeSessionsGauge,
};
