/**
 * Script execution — runs caller-supplied JavaScript against the scene.
 *
 * The script sees a small scene API and a console whose output is captured
 * instead of printed. The completion value of the script is reported as
 * `return_value`.
 *
 *   addBox('Base', 2, 1, 0.2); translate('Base', [0, 0, 0.1]); scene.size
 */

import vm from 'node:vm';
import { format, inspect } from 'node:util';
import type { Vec3 } from './vec3.js';
import type { Scene } from './scene.js';
import { boxMesh, sphereMesh, cylinderMesh } from './primitives.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  return_value: string;
  execution_time: number;
}

function toVec3(value: Vec3 | number): Vec3 {
  return typeof value === 'number' ? [value, value, value] : value;
}

/** Globals exposed to scripts. */
export function createScriptGlobals(scene: Scene, out: string[], err: string[]): Record<string, unknown> {
  return {
    scene,
    console: {
      log: (...args: unknown[]) => out.push(format(...args) + '\n'),
      info: (...args: unknown[]) => out.push(format(...args) + '\n'),
      warn: (...args: unknown[]) => err.push(format(...args) + '\n'),
      error: (...args: unknown[]) => err.push(format(...args) + '\n'),
    },
    addBox: (name: string, width: number, depth: number, height: number, location?: Vec3) =>
      scene.add(name, boxMesh(width, depth, height), { location }).name,
    addSphere: (name: string, radius: number, location?: Vec3) =>
      scene.add(name, sphereMesh(radius), { location }).name,
    addCylinder: (name: string, radius: number, height: number, location?: Vec3) =>
      scene.add(name, cylinderMesh(radius, height), { location }).name,
    removeObject: (name: string) => scene.remove(name),
    select: (names: string[], extend = false) => scene.select(names, extend),
    translate: (name: string, offset: Vec3) => {
      const obj = scene.get(name);
      obj.location = [obj.location[0] + offset[0], obj.location[1] + offset[1], obj.location[2] + offset[2]];
      return obj.location;
    },
    scaleObject: (name: string, factor: Vec3 | number) => {
      const obj = scene.get(name);
      obj.scale = toVec3(factor);
      return obj.scale;
    },
  };
}

/** Run `code`; throws whatever the script throws, or on timeout. */
export function runScript(scene: Scene, code: string, timeoutMs: number): ExecResult {
  const out: string[] = [];
  const err: string[] = [];
  const context = vm.createContext(createScriptGlobals(scene, out, err));
  const script = new vm.Script(code, { filename: 'execute_code.js' });

  const t0 = performance.now();
  const value: unknown = script.runInContext(context, { timeout: timeoutMs });
  const elapsed = (performance.now() - t0) / 1000;

  return {
    stdout: out.join(''),
    stderr: err.join(''),
    return_value: inspect(value, { depth: 4 }),
    execution_time: Number(elapsed.toFixed(4)),
  };
}
