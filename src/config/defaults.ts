import type { Config } from './validator';

export const defaults: Config = {
  stage: {
    baseUrl: 'http://localhost:8001',
    requestTimeoutMs: 10000,
    moveSpeedUmPerS: 1000,
  },
  analyzer: {
    baseUrl: 'http://localhost:8002',
    requestTimeoutMs: 10000,
    calibrateOnStart: true,
  },
  timeouts: {
    moveMs: 30000,
    alignmentMs: 120000,
    sweepMs: 300000,
  },
  polling: {
    moveIntervalMs: 300,
    alignmentIntervalMs: 300,
    sweepIntervalMs: 500,
  },
  manager: {
    retentionMs: 10 * 60 * 1000,
    subscriberBufferSize: 256,
  },
  server: {
    host: '127.0.0.1',
    port: 8400,
  },
  logging: {
    level: 'info',
  },
};
