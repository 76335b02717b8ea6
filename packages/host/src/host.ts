/**
 * Host application — wires the scene, the main loop, the command table and
 * the bridge together.
 */

import { COMMANDS, createLogger, type Logger } from '@meshbridge/protocol';
import { Scene } from './scene.js';
import { MainLoop } from './main-loop.js';
import { CommandTable } from './dispatch.js';
import { defaultHandlers } from './handlers.js';
import { HostBridge, type BridgeOptions } from './bridge.js';

export interface HostOptions extends BridgeOptions {
  scene?: Scene;
}

export interface HostApp {
  scene: Scene;
  loop: MainLoop;
  table: CommandTable;
  bridge: HostBridge;
  logger: Logger;
  /** Stop the bridge and every main-loop timer. */
  shutdown(): Promise<void>;
}

export function createHost(options: HostOptions = {}): HostApp {
  const logger = options.logger ?? createLogger('host');
  const scene = options.scene ?? new Scene();
  const loop = new MainLoop(logger.child('loop'));
  const table = new CommandTable(scene, logger.child('dispatch'));
  for (const command of COMMANDS) table.register(command, defaultHandlers[command]);
  const bridge = new HostBridge(table, loop, { ...options, logger: logger.child('bridge') });

  return {
    scene,
    loop,
    table,
    bridge,
    logger,
    async shutdown() {
      await bridge.stop();
      loop.clear();
      await loop.idle();
    },
  };
}
