/**
 * Server configuration read from the environment
 */

import { createLogger } from '../logging';

export interface ServerConfig {
  readonly port: number;
  readonly host: string;
  readonly logLevel: LogLevel;
  readonly httpLogger: boolean;
  readonly queueTrackLimit: number;
  /** The collection settings apply only to identifiers a collection importer recognises */
  readonly longLoadAnnounceThreshold: number;
  readonly collectionRateLimitItems: number;
  readonly collectionRateLimitWindowMs: number;
  readonly showUpstreamBlockWarning: boolean;
  readonly noticeHistorySize: number;
}

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_CONFIG: ServerConfig = {
  port: 3000,
  host: '0.0.0.0',
  logLevel: 'info',
  httpLogger: true,
  queueTrackLimit: 10000,
  longLoadAnnounceThreshold: 50,
  collectionRateLimitItems: 1000,
  collectionRateLimitWindowMs: 10 * 60 * 1000,
  showUpstreamBlockWarning: false,
  noticeHistorySize: 50
};

export class ConfigError extends Error {
  constructor(
    readonly variable: string,
    readonly value: string,
    reason: string
  ) {
    super(`Invalid ${variable}="${value}": ${reason}`);
    this.name = 'ConfigError';
  }
}

type Env = Readonly<Record<string, string | undefined>>;

function readInt(env: Env, variable: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[variable]?.trim();
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigError(variable, raw, 'expected an integer');
  }
  const value = Number(raw);
  if (value < min || value > max) {
    throw new ConfigError(variable, raw, `expected a value between ${min} and ${max}`);
  }
  return value;
}

function readBoolean(env: Env, variable: string, fallback: boolean): boolean {
  const raw = env[variable]?.trim().toLowerCase();
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (['true', '1', 'yes', 'on'].includes(raw)) {
    return true;
  }
  if (['false', '0', 'no', 'off'].includes(raw)) {
    return false;
  }
  throw new ConfigError(variable, raw, 'expected true or false');
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function readLogLevel(env: Env, variable: string, fallback: LogLevel): LogLevel {
  const raw = env[variable]?.trim().toLowerCase();
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (!isLogLevel(raw)) {
    throw new ConfigError(variable, raw, `expected one of ${LOG_LEVELS.join(', ')}`);
  }
  return raw;
}

/**
 * Build the server configuration, falling back to defaults for unset variables.
 * Throws ConfigError on the first malformed value.
 */
export function loadServerConfig(env: Env = process.env): ServerConfig {
  const host = env.HOST?.trim();

  const config: ServerConfig = {
    port: readInt(env, 'PORT', DEFAULT_CONFIG.port, 0, 65535),
    host: host ? host : DEFAULT_CONFIG.host,
    logLevel: readLogLevel(env, 'LOG_LEVEL', DEFAULT_CONFIG.logLevel),
    httpLogger: readBoolean(env, 'HTTP_LOGGER', DEFAULT_CONFIG.httpLogger),
    queueTrackLimit: readInt(env, 'QUEUE_TRACK_LIMIT', DEFAULT_CONFIG.queueTrackLimit, 1),
    longLoadAnnounceThreshold: readInt(
      env,
      'LONG_LOAD_ANNOUNCE_THRESHOLD',
      DEFAULT_CONFIG.longLoadAnnounceThreshold,
      0
    ),
    collectionRateLimitItems: readInt(
      env,
      'COLLECTION_RATE_LIMIT_ITEMS',
      DEFAULT_CONFIG.collectionRateLimitItems,
      1
    ),
    collectionRateLimitWindowMs: readInt(
      env,
      'COLLECTION_RATE_LIMIT_WINDOW_MS',
      DEFAULT_CONFIG.collectionRateLimitWindowMs,
      1
    ),
    showUpstreamBlockWarning: readBoolean(
      env,
      'SHOW_UPSTREAM_BLOCK_WARNING',
      DEFAULT_CONFIG.showUpstreamBlockWarning
    ),
    noticeHistorySize: readInt(env, 'NOTICE_HISTORY_SIZE', DEFAULT_CONFIG.noticeHistorySize, 1, 1000)
  };

  warnOnOddValues(config);
  return config;
}

function warnOnOddValues(config: ServerConfig): void {
  const log = createLogger('config');
  if (config.longLoadAnnounceThreshold >= config.queueTrackLimit) {
    log.warn(
      { threshold: config.longLoadAnnounceThreshold, limit: config.queueTrackLimit },
      'Collections are never announced: the announce threshold is not below the queue limit'
    );
  }
  if (config.collectionRateLimitItems > config.queueTrackLimit) {
    log.warn(
      { items: config.collectionRateLimitItems, limit: config.queueTrackLimit },
      'Collection rate limit allows more items than a queue can hold'
    );
  }
}
