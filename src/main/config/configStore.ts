import Conf from 'conf';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_HOST,
  DEFAULT_LINGER_MS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_PORT,
  DEFAULT_RECEIVE_DIR,
} from '../../shared/constants/protocol';
import { AppConfig } from '../../shared/types/config';
import { sanitizeFullConfig } from '../utils/validation';

export const defaultAppConfig: AppConfig = {
  server: {
    host: DEFAULT_HOST,
    port: DEFAULT_PORT,
    receiveDir: DEFAULT_RECEIVE_DIR,
    pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
    lingerMs: DEFAULT_LINGER_MS,
  },
  client: {
    host: DEFAULT_HOST,
    port: DEFAULT_PORT,
    chunkSize: DEFAULT_CHUNK_SIZE,
    maxConcurrentTransfers: 1,
  },
  logging: {
    level: 'info',
  },
};

export function resolveConfigPath(customPath?: string): string {
  if (customPath) {
    return path.resolve(customPath);
  }

  const dataDir = path.join(os.homedir(), '.filerelay');
  return path.join(dataDir, 'config.json');
}

function openStore(targetPath: string, defaults?: AppConfig): Conf<AppConfig> {
  const ext = path.extname(targetPath);
  return new Conf<AppConfig>({
    cwd: path.dirname(targetPath),
    configName: path.basename(targetPath, ext),
    fileExtension: ext.slice(1),
    defaults,
  });
}

/** Opens the store at `targetPath`, writing the defaults on first use. */
function loadStore(targetPath: string): Conf<AppConfig> {
  try {
    return openStore(targetPath, defaultAppConfig);
  } catch (error) {
    if (error instanceof Error && error.name === 'SyntaxError') {
      throw new Error(`Configuration file ${targetPath} is not valid JSON: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Applies FILERELAY_* environment variables on top of a validated config. Values
 * are passed through the same validation as the file.
 */
export function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const server: Record<string, unknown> = { ...config.server };
  const client: Record<string, unknown> = { ...config.client };
  const logging: Record<string, unknown> = { ...config.logging };

  if (env.FILERELAY_HOST) {
    server.host = env.FILERELAY_HOST;
    client.host = env.FILERELAY_HOST;
  }
  if (env.FILERELAY_PORT) {
    server.port = Number(env.FILERELAY_PORT);
    client.port = Number(env.FILERELAY_PORT);
  }
  if (env.FILERELAY_RECEIVE_DIR) {
    server.receiveDir = env.FILERELAY_RECEIVE_DIR;
  }
  if (env.FILERELAY_LOG_LEVEL) {
    logging.level = env.FILERELAY_LOG_LEVEL;
  }
  if (env.FILERELAY_LOG_DIR) {
    logging.directory = env.FILERELAY_LOG_DIR;
  }

  return sanitizeFullConfig({ server, client, logging }, config);
}

export async function loadConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<AppConfig> {
  const store = loadStore(configPath);
  return applyEnvOverrides(sanitizeFullConfig(store.store, defaultAppConfig), env);
}

export async function exportConfig(config: AppConfig, target: string): Promise<string> {
  const exportPath = path.resolve(target);
  openStore(exportPath).store = config;
  return exportPath;
}

/** Validates `source` and merges it into the config file at `configPath`. */
export async function importConfig(source: string, configPath: string): Promise<AppConfig> {
  const sourcePath = path.resolve(source);
  await fs.access(sourcePath);

  const store = loadStore(configPath);
  const current = sanitizeFullConfig(store.store, defaultAppConfig);
  const merged = sanitizeFullConfig(openStore(sourcePath).store, current);
  store.store = merged;
  return merged;
}
