#!/usr/bin/env node
/**
 * meshbridge host
 *
 * Headless 3D host with the bridge listening on 127.0.0.1. Starts with a
 * single "Cube" in the scene; stop with Ctrl-C.
 */

import { createLogger } from '@meshbridge/protocol';
import { createHost } from './host.js';
import { loadHostConfig } from './config.js';
import { boxMesh } from './primitives.js';

const config = loadHostConfig();
const logger = createLogger('host', { level: config.logLevel });
const host = createHost({ port: config.port, graceMs: config.graceMs, pollMs: config.pollMs, logger });
host.scene.add('Cube', boxMesh(2, 2, 2));

if (config.autoStart) {
  await host.bridge.start();
} else {
  logger.info('MESHBRIDGE_AUTO_START is off; bridge not started');
}

let stopping = false;
async function shutdown(signal: string): Promise<void> {
  if (stopping) return;
  stopping = true;
  logger.info('%s received, shutting down', signal);
  await host.shutdown();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error('shutdown failed: %s', err instanceof Error ? err.message : String(err));
      process.exit(1);
    });
  });
}
