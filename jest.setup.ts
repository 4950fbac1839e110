/// <reference types="jest" />
import os from 'os';
import path from 'path';

process.env.NODE_ENV = 'test';
process.env.CACHE_DIR = process.env.CACHE_DIR || path.join(os.tmpdir(), 'session-playback-engine-test');

// Mock Redis
jest.mock('ioredis', () => {
  const RedisMock = require('ioredis-mock');
  const Redis = RedisMock.default ?? RedisMock;
  return { __esModule: true, default: Redis, Redis };
});
