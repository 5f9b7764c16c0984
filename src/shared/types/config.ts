export interface AppConfig {
  server: ServerConfig;
  client: ClientConfig;
  logging: LoggingConfig;
}

export interface ServerConfig {
  host: string;
  port: number;
  receiveDir: string;
  pollIntervalMs: number; // how often the accept loop checks the running flag
  lingerMs: number; // how long a finished session waits for the peer to close
}

export interface ClientConfig {
  host: string;
  port: number;
  chunkSize: number;
  maxConcurrentTransfers: number;
}

export interface LoggingConfig {
  level: LogLevel;
  directory?: string;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';
