import * as os from 'node:os';
import * as path from 'node:path';
import { DEFAULT_PORT, parseIntEnv, parseLogLevel, type Env, type LogLevel } from '@meshbridge/protocol';

export interface ServerConfig {
  host: string;
  port: number;
  logDir: string;
  logLevel: LogLevel;
  /** Debug level turns on full operation logging. */
  verbose: boolean;
  connectTimeoutMs: number;
  handshakeTimeoutMs: number;
  commandTimeoutMs: number;
  healthIntervalMs: number;
  healthTimeoutMs: number;
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const logLevel = parseLogLevel(env['MESHBRIDGE_LOG_LEVEL']);
  return {
    host: env['MESHBRIDGE_HOST']?.trim() || '127.0.0.1',
    port: parseIntEnv('MESHBRIDGE_PORT', DEFAULT_PORT, env),
    logDir: env['MESHBRIDGE_LOG_DIR']?.trim() || path.join(os.tmpdir(), 'meshbridge-debug'),
    logLevel,
    verbose: logLevel === 'debug',
    connectTimeoutMs: parseIntEnv('MESHBRIDGE_CONNECT_TIMEOUT_MS', 5_000, env),
    handshakeTimeoutMs: parseIntEnv('MESHBRIDGE_HANDSHAKE_TIMEOUT_MS', 5_000, env),
    commandTimeoutMs: parseIntEnv('MESHBRIDGE_COMMAND_TIMEOUT_MS', 30_000, env),
    healthIntervalMs: parseIntEnv('MESHBRIDGE_HEALTH_INTERVAL_MS', 30_000, env),
    healthTimeoutMs: parseIntEnv('MESHBRIDGE_HEALTH_TIMEOUT_MS', 5_000, env),
  };
}
