import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { AppConfig, LogLevel } from './types';

const MB = 1024 * 1024;
const MAX_PORT = 65535;

export const DEFAULT_MAX_SIZE = 5 * MB;
export const DEFAULT_SUPPORTED_FORMATS = ['.jpg', '.png', '.gif'];
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_IMAGES_URL_PREFIX = '/images';

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

const required = (name: string) =>
  z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

const integer = (name: string) =>
  required(name)
    .regex(/^\d+$/, `${name} must be an integer`)
    .transform((value) => Number.parseInt(value, 10));

const EnvSchema = z.object({
  IMAGES_DIR: required('IMAGES_DIR'),
  WEB_SERVER_WORKERS: integer('WEB_SERVER_WORKERS').pipe(
    z.number().min(1, 'WEB_SERVER_WORKERS must be at least 1'),
  ),
  WEB_SERVER_START_PORT: integer('WEB_SERVER_START_PORT').pipe(
    z.number().max(MAX_PORT, `WEB_SERVER_START_PORT must not exceed ${MAX_PORT}`),
  ),
  WEB_SERVER_HOST: required('WEB_SERVER_HOST').optional(),
  LOG_DIR: required('LOG_DIR').optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS, {
    errorMap: () => ({ message: `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}` }),
  }).optional(),
  MAX_SIZE: integer('MAX_SIZE').pipe(z.number().min(1, 'MAX_SIZE must be at least 1')).optional(),
  SUPPORTED_FORMATS: z.string().optional(),
  IMAGES_URL_PREFIX: z.string().optional(),
});

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

// ".PNG, jpg ,," -> {".png", ".jpg"}
export const parseSupportedFormats = (raw: string | undefined): Set<string> => {
  if (raw === undefined) {
    return new Set(DEFAULT_SUPPORTED_FORMATS);
  }
  const formats = raw
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0)
    .map((entry) => (entry.startsWith('.') ? entry : `.${entry}`));
  if (formats.length === 0) {
    throw new ConfigError(['SUPPORTED_FORMATS must list at least one extension']);
  }
  return new Set(formats);
};

const normalizeUrlPrefix = (raw: string | undefined): string => {
  if (raw === undefined) {
    return DEFAULT_IMAGES_URL_PREFIX;
  }
  return raw.trim().replace(/\/+$/, '');
};

/**
 * Process-wide settings. Built once at startup and handed to whatever needs it;
 * nothing can change it afterwards.
 */
export class Config implements AppConfig {
  private readonly _imagesDir: string;
  private readonly _workers: number;
  private readonly _startPort: number;
  private readonly _host: string;
  private readonly _logDir: string;
  private readonly _logLevel: LogLevel;
  private readonly _maxSize: number;
  private readonly _supportedFormats: ReadonlySet<string>;
  private readonly _imagesUrlPrefix: string;

  private constructor(values: AppConfig) {
    this._imagesDir = values.imagesDir;
    this._workers = values.workers;
    this._startPort = values.startPort;
    this._host = values.host;
    this._logDir = values.logDir;
    this._logLevel = values.logLevel;
    this._maxSize = values.maxSize;
    this._supportedFormats = values.supportedFormats;
    this._imagesUrlPrefix = values.imagesUrlPrefix;
    Object.freeze(this);
  }

  public static fromEnv(env: NodeJS.ProcessEnv, cwd: string = process.cwd()): Config {
    const result = EnvSchema.safeParse(env);
    if (!result.success) {
      throw new ConfigError(result.error.issues.map((issue) => issue.message));
    }
    const parsed = result.data;
    if (parsed.WEB_SERVER_START_PORT + parsed.WEB_SERVER_WORKERS - 1 > MAX_PORT) {
      throw new ConfigError([`WEB_SERVER_START_PORT + WEB_SERVER_WORKERS - 1 must not exceed ${MAX_PORT}`]);
    }

    return new Config({
      imagesDir: path.resolve(cwd, parsed.IMAGES_DIR),
      workers: parsed.WEB_SERVER_WORKERS,
      startPort: parsed.WEB_SERVER_START_PORT,
      host: parsed.WEB_SERVER_HOST ?? DEFAULT_HOST,
      logDir: path.resolve(cwd, parsed.LOG_DIR ?? 'logs'),
      logLevel: parsed.LOG_LEVEL ?? 'info',
      maxSize: parsed.MAX_SIZE ?? DEFAULT_MAX_SIZE,
      supportedFormats: parseSupportedFormats(parsed.SUPPORTED_FORMATS),
      imagesUrlPrefix: normalizeUrlPrefix(parsed.IMAGES_URL_PREFIX),
    });
  }

  public static loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    // Load environment variables from .env file
    dotenv.config({ processEnv: env });
    return Config.fromEnv(env);
  }

  get imagesDir(): string { return this._imagesDir; }
  get workers(): number { return this._workers; }
  get startPort(): number { return this._startPort; }
  get host(): string { return this._host; }
  get logDir(): string { return this._logDir; }
  get logLevel(): LogLevel { return this._logLevel; }
  get maxSize(): number { return this._maxSize; }
  get supportedFormats(): ReadonlySet<string> { return this._supportedFormats; }
  get imagesUrlPrefix(): string { return this._imagesUrlPrefix; }
}

export type { AppConfig, LogLevel } from './types';
