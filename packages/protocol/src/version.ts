/**
 * Protocol versioning.
 *
 * Every message carries the sender's protocol version. Two sides can talk
 * when major and minor match; patch releases are wire-compatible.
 */

export const PROTOCOL_VERSION = '0.1.0';

/** Parse "1.2.3" into numeric parts. Returns null unless at least major.minor are integers. */
export function parseVersion(version: string): number[] | null {
  const parts = version.trim().split('.');
  if (parts.length < 2) return null;
  const nums: number[] = [];
  for (const part of parts) {
    if (!/^\d+$/.test(part)) return null;
    nums.push(Number.parseInt(part, 10));
  }
  return nums;
}

/** Major and minor must match; patch may differ. */
export function versionsCompatible(a: string, b: string): boolean {
  const va = parseVersion(a);
  const vb = parseVersion(b);
  if (!va || !vb) return false;
  return va[0] === vb[0] && va[1] === vb[1];
}

/**
 * Numeric ordering of two version strings (-1, 0, 1).
 * Unparseable versions sort before everything else.
 */
export function compareVersions(a: string, b: string): number {
  const va = parseVersion(a);
  const vb = parseVersion(b);
  if (!va || !vb) {
    if (va) return 1;
    if (vb) return -1;
    return 0;
  }
  const len = Math.max(va.length, vb.length);
  for (let i = 0; i < len; i++) {
    const x = va[i] ?? 0;
    const y = vb[i] ?? 0;
    if (x !== y) return x < y ? -1 : 1;
  }
  return 0;
}
