import dotenv from 'dotenv';
import { AppConfig, LoggingConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

/**
 * Process-wide configuration: defaults overlaid with environment variables
 * (a `.env` file in the working directory is read first).
 */
export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private readonly config: AppConfig;

  private constructor() {
    dotenv.config();
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    ConfigManager.instance ??= new ConfigManager();
    return ConfigManager.instance;
  }

  /**
   * Drop the cached instance so the next getInstance() re-reads the environment
   */
  static resetInstance(): void {
    ConfigManager.instance = undefined;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getLoggingConfig(): LoggingConfig {
    return this.config.logging;
  }

  /**
   * Range checks that parsing alone cannot express. Throws one error listing every problem.
   */
  validate(): void {
    const { tagging, tools, verify } = this.config;
    const problems: string[] = [];

    if (tagging.workers < 0) {
      problems.push('REELTAG_WORKERS must be 0 (automatic) or a positive number');
    }
    if (tagging.progressIntervalMs < 0) {
      problems.push('REELTAG_PROGRESS_INTERVAL_MS must not be negative');
    }
    if (tools.probeTimeoutMs <= 0) {
      problems.push('REELTAG_PROBE_TIMEOUT_MS must be positive');
    }
    if (verify.concurrency < 1) {
      problems.push('REELTAG_VERIFY_CONCURRENCY must be at least 1');
    }

    if (problems.length > 0) {
      throw new ConfigurationError('environment', `Configuration validation failed:\n${problems.join('\n')}`);
    }
  }

  private loadConfig(): AppConfig {
    const { logging, tools, tagging, verify } = defaultConfig;

    return {
      logging: {
        level: this.readEnum('LOG_LEVEL', logging.level, LOG_LEVELS),
        file: {
          ...logging.file,
          enabled: this.readBoolean('LOG_FILE_ENABLED', logging.file.enabled),
          path: this.readString('LOG_FILE_PATH', logging.file.path),
        },
        console: {
          ...logging.console,
          enabled: this.readBoolean('LOG_CONSOLE_ENABLED', logging.console.enabled),
        },
      },
      tools: {
        ffprobePath: this.readString('REELTAG_FFPROBE_PATH', tools.ffprobePath),
        fdPath: this.readString('REELTAG_FD_PATH', tools.fdPath),
        useFd: this.readBoolean('REELTAG_USE_FD', tools.useFd),
        probeTimeoutMs: this.readInteger('REELTAG_PROBE_TIMEOUT_MS', tools.probeTimeoutMs),
      },
      tagging: {
        workers: this.readInteger('REELTAG_WORKERS', tagging.workers),
        progressIntervalMs: this.readInteger('REELTAG_PROGRESS_INTERVAL_MS', tagging.progressIntervalMs),
      },
      verify: {
        concurrency: this.readInteger('REELTAG_VERIFY_CONCURRENCY', verify.concurrency),
      },
    };
  }

  private readString(key: string, fallback: string): string {
    return process.env[key] || fallback;
  }

  private readInteger(key: string, fallback: number): number {
    const raw = process.env[key];
    if (!raw) {
      return fallback;
    }
    const parsed = Number.parseInt(raw, 10);
    if (Number.isNaN(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  private readBoolean(key: string, fallback: boolean): boolean {
    const raw = process.env[key];
    if (!raw) {
      return fallback;
    }
    return raw.toLowerCase() === 'true' || raw === '1';
  }

  private readEnum<T extends string>(key: string, fallback: T, allowed: readonly T[]): T {
    const raw = process.env[key];
    if (!raw) {
      return fallback;
    }
    const match = allowed.find(value => value === raw);
    if (match === undefined) {
      throw new ConfigurationError(key, `Environment variable ${key} must be one of: ${allowed.join(', ')}`);
    }
    return match;
  }
}
