import { AppConfig, ClientConfig, LogLevel, LoggingConfig, ServerConfig } from '../../shared/types/config';

type PlainObject = Record<string, unknown>;

const ALLOWED_LOG_LEVELS = new Set<LogLevel>([
  'error',
  'warn',
  'info',
  'http',
  'verbose',
  'debug',
  'silly',
]);

const MAX_PORT = 65535;
const MAX_CHUNK_SIZE = 8 * 1024 * 1024;
const MAX_CONCURRENT_TRANSFERS = 64;
const MAX_DECLARED_FILENAME_LENGTH = 4096;

// Stores hand back null-prototype objects, so both prototypes count as plain.
function isPlainObject(value: unknown): value is PlainObject {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function ensureString(
  value: unknown,
  field: string,
  options?: { allowEmpty?: boolean; maxLength?: number; trim?: boolean }
): string {
  if (typeof value !== 'string') {
    throw new Error(`Field "${field}" must be a string.`);
  }
  const result = options?.trim === false ? value : value.trim();
  if (!options?.allowEmpty && result.length === 0) {
    throw new Error(`Field "${field}" cannot be empty.`);
  }
  if (options?.maxLength && result.length > options.maxLength) {
    throw new Error(`Field "${field}" exceeds maximum length of ${options.maxLength}`);
  }
  return result;
}

function ensureNumber(
  value: unknown,
  field: string,
  options?: { min?: number; max?: number; integer?: boolean }
): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new Error(`Field "${field}" must be a number.`);
  }
  if (options?.integer && !Number.isSafeInteger(value)) {
    throw new Error(`Field "${field}" must be an integer.`);
  }
  if (options?.min !== undefined && value < options.min) {
    throw new Error(`Field "${field}" must be >= ${options.min}.`);
  }
  if (options?.max !== undefined && value > options.max) {
    throw new Error(`Field "${field}" must be <= ${options.max}.`);
  }
  return value;
}

function ensureLogLevel(value: unknown, field: string): LogLevel {
  const level = ensureString(value, field);
  for (const allowed of ALLOWED_LOG_LEVELS) {
    if (allowed === level) {
      return allowed;
    }
  }
  throw new Error(`Field "${field}" must be one of: ${Array.from(ALLOWED_LOG_LEVELS).join(', ')}`);
}

/** Validates the decoded JSON body of a FILE_INFO frame. */
export function sanitizeFileInfo(input: unknown): { filename: string; filesize: number } {
  if (!isPlainObject(input)) {
    throw new Error('File info must be a JSON object.');
  }
  return {
    filename: ensureString(input.filename, 'filename', {
      allowEmpty: true,
      trim: false,
      maxLength: MAX_DECLARED_FILENAME_LENGTH,
    }),
    filesize: ensureNumber(input.filesize, 'filesize', { integer: true, min: 0 }),
  };
}

export function ensurePort(value: unknown, field = 'port'): number {
  return ensureNumber(value, field, { integer: true, min: 0, max: MAX_PORT });
}

export function ensureChunkSize(value: unknown, field = 'chunkSize'): number {
  return ensureNumber(value, field, { integer: true, min: 1, max: MAX_CHUNK_SIZE });
}

function sanitizeServerConfig(value: unknown, defaults: ServerConfig): ServerConfig {
  if (value === undefined) {
    return { ...defaults };
  }
  if (!isPlainObject(value)) {
    throw new Error('server must be an object.');
  }
  return {
    host: value.host === undefined ? defaults.host : ensureString(value.host, 'server.host'),
    port: value.port === undefined ? defaults.port : ensurePort(value.port, 'server.port'),
    receiveDir:
      value.receiveDir === undefined
        ? defaults.receiveDir
        : ensureString(value.receiveDir, 'server.receiveDir'),
    pollIntervalMs:
      value.pollIntervalMs === undefined
        ? defaults.pollIntervalMs
        : ensureNumber(value.pollIntervalMs, 'server.pollIntervalMs', {
            integer: true,
            min: 1,
            max: 60000,
          }),
    lingerMs:
      value.lingerMs === undefined
        ? defaults.lingerMs
        : ensureNumber(value.lingerMs, 'server.lingerMs', { integer: true, min: 0, max: 60000 }),
  };
}

function sanitizeClientConfig(value: unknown, defaults: ClientConfig): ClientConfig {
  if (value === undefined) {
    return { ...defaults };
  }
  if (!isPlainObject(value)) {
    throw new Error('client must be an object.');
  }
  return {
    host: value.host === undefined ? defaults.host : ensureString(value.host, 'client.host'),
    port: value.port === undefined ? defaults.port : ensurePort(value.port, 'client.port'),
    chunkSize:
      value.chunkSize === undefined
        ? defaults.chunkSize
        : ensureChunkSize(value.chunkSize, 'client.chunkSize'),
    maxConcurrentTransfers:
      value.maxConcurrentTransfers === undefined
        ? defaults.maxConcurrentTransfers
        : ensureNumber(value.maxConcurrentTransfers, 'client.maxConcurrentTransfers', {
            integer: true,
            min: 1,
            max: MAX_CONCURRENT_TRANSFERS,
          }),
  };
}

function sanitizeLoggingConfig(value: unknown, defaults: LoggingConfig): LoggingConfig {
  if (value === undefined) {
    return { ...defaults };
  }
  if (!isPlainObject(value)) {
    throw new Error('logging must be an object.');
  }
  const logging: LoggingConfig = {
    level: value.level === undefined ? defaults.level : ensureLogLevel(value.level, 'logging.level'),
  };
  const directory =
    value.directory === undefined
      ? defaults.directory
      : ensureString(value.directory, 'logging.directory');
  if (directory !== undefined) {
    logging.directory = directory;
  }
  return logging;
}

/** Merges a parsed config document over the defaults; unknown keys are dropped. */
export function sanitizeFullConfig(input: unknown, defaults: AppConfig): AppConfig {
  if (!isPlainObject(input)) {
    throw new Error('Configuration must be an object.');
  }
  return {
    server: sanitizeServerConfig(input.server, defaults.server),
    client: sanitizeClientConfig(input.client, defaults.client),
    logging: sanitizeLoggingConfig(input.logging, defaults.logging),
  };
}
