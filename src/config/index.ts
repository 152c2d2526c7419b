import path from 'node:path';

export type ItemRepositoryProvider = 'file' | 'memory';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ServerConfig {
  host: string;
  port: number;
  publicUrl: string;
}

export interface PersistenceConfig {
  provider: ItemRepositoryProvider;
  dataFile: string;
}

export interface AppConfig {
  server: ServerConfig;
  logLevel: LogLevel;
  persistence: PersistenceConfig;
}

const DEFAULT_PORT = 8000;

function readIntFromEnv(envName: string): number | undefined {
  const raw = process.env[envName];
  if (!raw) {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function readProviderFromEnv(envName: string): ItemRepositoryProvider {
  const raw = (process.env[envName] ?? 'file').toLowerCase();
  if (raw === 'memory') return 'memory';
  return 'file';
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function readLogLevelFromEnv(envName: string): LogLevel {
  const raw = (process.env[envName] ?? '').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

export function loadConfig(): AppConfig {
  const port = readIntFromEnv('PORT') ?? DEFAULT_PORT;
  const host = process.env.HOST || '0.0.0.0';
  const publicUrl = process.env.API_PUBLIC_URL || `http://localhost:${port}`;
  const dataFile = path.resolve(process.cwd(), process.env.DATA_FILE || 'data.json');

  return {
    server: { host, port, publicUrl },
    logLevel: readLogLevelFromEnv('LOG_LEVEL'),
    persistence: {
      provider: readProviderFromEnv('DB_PROVIDER'),
      dataFile,
    },
  };
}
