/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import YAML from 'js-yaml';
import { logger, isLogLevel, LogLevel } from './logger.js';

export interface DatabaseConfig {
  path: string;
}

export interface SchedulerConfig {
  enabled: boolean;
  pollingIntervalMs: number;
  maxConcurrentExecutions: number;
  dueBatchSize: number;
  executionTimeoutMs: number;
  abandonedGraceMs: number;
}

export interface RetryConfig {
  attempts: number;
  minTimeoutMs: number;
  maxTimeoutMs: number;
  factor: number;
}

export interface AdapterConfig {
  callTimeoutMs: number;
  maxResults: number;
}

export interface NotificationConfig {
  lifecycleEvents: boolean;
}

export interface CredentialConfig {
  envPrefix: string;
}

export interface AppConfig {
  database: DatabaseConfig;
  scheduler: SchedulerConfig;
  retry: RetryConfig;
  adapters: AdapterConfig;
  notifications: NotificationConfig;
  credentials: CredentialConfig;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: AppConfig = {
  database: {
    path: './db/retrieval.db'
  },
  scheduler: {
    enabled: true,
    pollingIntervalMs: 60000,
    maxConcurrentExecutions: 100,
    dueBatchSize: 100,
    executionTimeoutMs: 300000, // 5 minutes
    abandonedGraceMs: 60000
  },
  retry: {
    attempts: 3,
    minTimeoutMs: 1000,
    maxTimeoutMs: 10000,
    factor: 2
  },
  adapters: {
    callTimeoutMs: 30000,
    maxResults: 1000
  },
  notifications: {
    lifecycleEvents: true
  },
  credentials: {
    envPrefix: 'RETRIEVAL_SECRET_'
  },
  logLevel: 'info'
};

function cloneConfig(config: AppConfig): AppConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isRecord(value) ? value : {};
}

function readNumber(source: Record<string, unknown>, key: string, fallback: number): number {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function readBoolean(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = source[key];
  return typeof value === 'boolean' ? value : fallback;
}

function readString(source: Record<string, unknown>, key: string, fallback: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : fallback;
}

function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private configPath: string;
  private isDirty = false;

  constructor(configPath: string = './config.yaml') {
    this.configPath = configPath;
    this.config = this.applyEnvOverrides(this.loadConfig());
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): AppConfig {
    if (!existsSync(this.configPath)) {
      logger.info(
        `Config file not found: ${this.configPath}, using defaults`,
        { path: this.configPath },
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let parsed: unknown;

      if (this.configPath.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        parsed = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      logger.info(
        `Loaded configuration from ${this.configPath}`,
        undefined,
        'ConfigManager'
      );

      return this.mergeConfigs(cloneConfig(DEFAULT_CONFIG), isRecord(parsed) ? parsed : {});
    } catch (error) {
      logger.warn(
        `Failed to load config: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  /**
   * Merge user config with defaults (user config takes precedence)
   */
  private mergeConfigs(defaults: AppConfig, user: Record<string, unknown>): AppConfig {
    const database = section(user, 'database');
    const scheduler = section(user, 'scheduler');
    const retry = section(user, 'retry');
    const adapters = section(user, 'adapters');
    const notifications = section(user, 'notifications');
    const credentials = section(user, 'credentials');

    return {
      database: {
        path: readString(database, 'path', defaults.database.path)
      },
      scheduler: {
        enabled: readBoolean(scheduler, 'enabled', defaults.scheduler.enabled),
        pollingIntervalMs: readNumber(scheduler, 'pollingIntervalMs', defaults.scheduler.pollingIntervalMs),
        maxConcurrentExecutions: readNumber(
          scheduler,
          'maxConcurrentExecutions',
          defaults.scheduler.maxConcurrentExecutions
        ),
        dueBatchSize: readNumber(scheduler, 'dueBatchSize', defaults.scheduler.dueBatchSize),
        executionTimeoutMs: readNumber(scheduler, 'executionTimeoutMs', defaults.scheduler.executionTimeoutMs),
        abandonedGraceMs: readNumber(scheduler, 'abandonedGraceMs', defaults.scheduler.abandonedGraceMs)
      },
      retry: {
        attempts: readNumber(retry, 'attempts', defaults.retry.attempts),
        minTimeoutMs: readNumber(retry, 'minTimeoutMs', defaults.retry.minTimeoutMs),
        maxTimeoutMs: readNumber(retry, 'maxTimeoutMs', defaults.retry.maxTimeoutMs),
        factor: readNumber(retry, 'factor', defaults.retry.factor)
      },
      adapters: {
        callTimeoutMs: readNumber(adapters, 'callTimeoutMs', defaults.adapters.callTimeoutMs),
        maxResults: readNumber(adapters, 'maxResults', defaults.adapters.maxResults)
      },
      notifications: {
        lifecycleEvents: readBoolean(notifications, 'lifecycleEvents', defaults.notifications.lifecycleEvents)
      },
      credentials: {
        envPrefix: readString(credentials, 'envPrefix', defaults.credentials.envPrefix)
      },
      logLevel: isLogLevel(user.logLevel) ? user.logLevel : defaults.logLevel
    };
  }

  /**
   * Environment variables win over file values
   */
  private applyEnvOverrides(config: AppConfig): AppConfig {
    const dbPath = process.env.RETRIEVAL_DB_PATH;
    if (dbPath && dbPath.trim().length > 0) {
      config.database.path = dbPath.trim();
    }

    const pollingIntervalMs = envNumber('RETRIEVAL_POLL_INTERVAL_MS');
    if (pollingIntervalMs !== undefined) {
      config.scheduler.pollingIntervalMs = pollingIntervalMs;
    }

    const maxConcurrency = envNumber('RETRIEVAL_MAX_CONCURRENCY');
    if (maxConcurrency !== undefined) {
      config.scheduler.maxConcurrentExecutions = maxConcurrency;
    }

    const executionTimeoutMs = envNumber('RETRIEVAL_EXECUTION_TIMEOUT_MS');
    if (executionTimeoutMs !== undefined) {
      config.scheduler.executionTimeoutMs = executionTimeoutMs;
    }

    if (process.env.RETRIEVAL_SCHEDULER_ENABLED !== undefined) {
      config.scheduler.enabled = process.env.RETRIEVAL_SCHEDULER_ENABLED !== 'false';
    }

    if (isLogLevel(process.env.LOG_LEVEL)) {
      config.logLevel = process.env.LOG_LEVEL;
    }

    return config;
  }

  /**
   * Get complete configuration
   */
  getAll(): AppConfig {
    return cloneConfig(this.config);
  }

  /**
   * Get a configuration section
   */
  get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return structuredClone(this.config[key]);
  }

  /**
   * Replace a configuration section
   */
  set<K extends keyof AppConfig>(key: K, value: AppConfig[K]): void {
    this.config[key] = value;
    this.isDirty = true;

    logger.debug(`Config updated: ${key}`, { value }, 'ConfigManager');
  }

  /**
   * Save configuration to file
   */
  save(): void {
    if (!this.isDirty) return;

    try {
      mkdirSync(dirname(this.configPath), { recursive: true });
      const content = this.configPath.endsWith('.json') ? this.toJSON() : this.toYAML();

      writeFileSync(this.configPath, content);
      this.isDirty = false;

      logger.info(
        `Configuration saved to ${this.configPath}`,
        undefined,
        'ConfigManager'
      );
    } catch (error) {
      logger.error(
        `Failed to save config: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
        'ConfigManager'
      );
    }
  }

  /**
   * Reset to defaults
   */
  reset(): void {
    this.config = cloneConfig(DEFAULT_CONFIG);
    this.isDirty = true;
    logger.info('Configuration reset to defaults', undefined, 'ConfigManager');
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { scheduler, retry, adapters, database } = this.config;

    if (database.path.trim().length === 0) {
      errors.push('Database path is required');
    }

    if (scheduler.pollingIntervalMs < 1000 || scheduler.pollingIntervalMs > 3600000) {
      errors.push('Polling interval must be between 1 second and 1 hour');
    }

    if (
      !Number.isInteger(scheduler.maxConcurrentExecutions) ||
      scheduler.maxConcurrentExecutions < 1 ||
      scheduler.maxConcurrentExecutions > 1000
    ) {
      errors.push('Max concurrent executions must be an integer between 1 and 1000');
    }

    if (!Number.isInteger(scheduler.dueBatchSize) || scheduler.dueBatchSize < 1) {
      errors.push('Due batch size must be a positive integer');
    }

    if (scheduler.executionTimeoutMs < 1000) {
      errors.push('Execution timeout must be at least 1 second');
    }

    if (scheduler.abandonedGraceMs < 0) {
      errors.push('Abandoned grace period cannot be negative');
    }

    if (!Number.isInteger(retry.attempts) || retry.attempts < 1 || retry.attempts > 10) {
      errors.push('Retry attempts must be an integer between 1 and 10');
    }

    if (retry.minTimeoutMs < 0 || retry.maxTimeoutMs < retry.minTimeoutMs) {
      errors.push('Retry timeouts must satisfy 0 <= minTimeoutMs <= maxTimeoutMs');
    }

    if (retry.factor < 1) {
      errors.push('Retry backoff factor must be at least 1');
    }

    if (adapters.callTimeoutMs < 1) {
      errors.push('Adapter call timeout must be positive');
    }

    if (!Number.isInteger(adapters.maxResults) || adapters.maxResults < 1) {
      errors.push('Adapter max results must be a positive integer');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Export configuration as JSON
   */
  toJSON(): string {
    return JSON.stringify(this.config, null, 2);
  }

  /**
   * Export configuration as YAML
   */
  toYAML(): string {
    return YAML.dump(this.config, { indent: 2 });
  }

  /**
   * Get config file path
   */
  getPath(): string {
    return this.configPath;
  }
}

/**
 * Global config instance
 */
let globalConfig: ConfigManager | null = null;

/**
 * Get or create global config instance
 */
export function getConfig(path?: string): ConfigManager {
  if (!globalConfig) {
    globalConfig = new ConfigManager(path);
  }
  return globalConfig;
}

/**
 * Create example config file
 */
export function createExampleConfig(outputPath: string = './config.example.yaml'): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, YAML.dump(DEFAULT_CONFIG, { indent: 2 }));
  logger.info(`Example config written to ${outputPath}`, undefined, 'ConfigManager');
}
