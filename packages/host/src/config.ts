import { DEFAULT_PORT, parseBoolEnv, parseIntEnv, parseLogLevel, type Env, type LogLevel } from '@meshbridge/protocol';

export interface HostConfig {
  port: number;
  autoStart: boolean;
  /** Added to each command's own timeout before the bridge gives up waiting. */
  graceMs: number;
  /** Main-loop poll interval for the bridge tick. */
  pollMs: number;
  logLevel: LogLevel;
}

export function loadHostConfig(env: Env = process.env): HostConfig {
  return {
    port: parseIntEnv('MESHBRIDGE_PORT', DEFAULT_PORT, env),
    autoStart: parseBoolEnv('MESHBRIDGE_AUTO_START', true, env),
    graceMs: parseIntEnv('MESHBRIDGE_GRACE_MS', 10_000, env),
    pollMs: parseIntEnv('MESHBRIDGE_POLL_MS', 50, env),
    logLevel: parseLogLevel(env['MESHBRIDGE_LOG_LEVEL']),
  };
}
