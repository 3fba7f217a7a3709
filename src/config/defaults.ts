import { AppConfig } from './types.js';

export const defaultConfig: AppConfig = {
  logging: {
    level: 'warn',
    file: {
      enabled: false,
      path: './logs',
      maxSize: '10',
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
  tools: {
    ffprobePath: 'ffprobe',
    fdPath: 'fd',
    useFd: true,
    probeTimeoutMs: 30000,
  },
  tagging: {
    workers: 0,
    progressIntervalMs: 50,
  },
  verify: {
    concurrency: 4,
  },
};
