/** Environment parsing shared by the host and the MCP server. */

export type Env = Record<string, string | undefined>;

export const DEFAULT_PORT = 9876;

/** Positive integer from the environment; anything else falls back. */
export function parseIntEnv(name: string, fallback: number, env: Env = process.env): number {
  const raw = env[name];
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) return fallback;
  return value;
}

export function parseBoolEnv(name: string, fallback: boolean, env: Env = process.env): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  return fallback;
}
