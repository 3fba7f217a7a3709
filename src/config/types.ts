export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface ToolsConfig {
  ffprobePath: string;
  fdPath: string;
  useFd: boolean;
  probeTimeoutMs: number;
}

export interface TaggingConfig {
  workers: number; // 0 = pick by network/cpu policy
  progressIntervalMs: number;
}

export interface VerifyConfig {
  concurrency: number;
}

export interface AppConfig {
  logging: LoggingConfig;
  tools: ToolsConfig;
  tagging: TaggingConfig;
  verify: VerifyConfig;
}
