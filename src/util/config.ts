import { config as loadDotenv } from 'dotenv';
import { isLogFormat, isLogLevel, type LogFormat, type LogLevel } from './logger.js';
import { ConversionError } from './errors.js';

// Load .env file if it exists
loadDotenv();

export const DEFAULT_SITE_ORIGIN = 'https://zestedesavoir.com';

export interface RawEnv {
  ZDS_BASE_URL?: string;
  ZDS_HTTP_TIMEOUT_MS?: string;
  LOG_LEVEL?: string;
  LOG_FORMAT?: string;
}

export interface CliFlags {
  logLevel?: string;
}

export interface AppConfig {
  /** Origin used to resolve root-relative URLs, without trailing slash. */
  siteOrigin: string;
  /** 0 disables the timeout. */
  httpTimeoutMs: number;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

export function loadEnvironment(): RawEnv {
  return {
    ZDS_BASE_URL: process.env.ZDS_BASE_URL,
    ZDS_HTTP_TIMEOUT_MS: process.env.ZDS_HTTP_TIMEOUT_MS,
    LOG_LEVEL: process.env.LOG_LEVEL,
    LOG_FORMAT: process.env.LOG_FORMAT,
  };
}

function validateSiteOrigin(value: string | undefined): string {
  if (!value) return DEFAULT_SITE_ORIGIN;

  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConversionError(`Invalid ZDS_BASE_URL: ${value}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConversionError(`ZDS_BASE_URL must be an http(s) URL: ${value}`);
  }
  return url.origin;
}

function validateTimeout(value: string | undefined): number {
  if (value === undefined || value === '') return 0;
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout < 0) {
    throw new ConversionError(`ZDS_HTTP_TIMEOUT_MS must be a non-negative integer: ${value}`);
  }
  return timeout;
}

function validateLogLevel(value: string | undefined): LogLevel {
  const level = value || 'info';
  if (!isLogLevel(level)) {
    throw new ConversionError(`Log level must be one of: debug, info, warn, error (got ${level})`);
  }
  return level;
}

function validateLogFormat(value: string | undefined): LogFormat {
  const format = value || 'human';
  if (!isLogFormat(format)) {
    throw new ConversionError(`LOG_FORMAT must be one of: human, json (got ${format})`);
  }
  return format;
}

export function buildConfig(env: RawEnv, flags: CliFlags = {}): AppConfig {
  return {
    siteOrigin: validateSiteOrigin(env.ZDS_BASE_URL),
    httpTimeoutMs: validateTimeout(env.ZDS_HTTP_TIMEOUT_MS),
    logLevel: validateLogLevel(flags.logLevel || env.LOG_LEVEL),
    logFormat: validateLogFormat(env.LOG_FORMAT),
  };
}
