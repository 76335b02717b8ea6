/**
 * Scene — in-memory named object store of the host application.
 *
 * Names are unique; adding a taken name gets a numeric suffix
 * ("Cube", "Cube.001", ...). Lookups of unknown names raise not_found
 * listing what exists, so a caller can correct itself.
 */

import type { Vec3, BoundingBox } from './vec3.js';
import { add, mergeBounds } from './vec3.js';
import { computeBounds, mapVertices, type TriangleMesh } from './mesh.js';
import { notFound } from './errors.js';

export type ObjectType = 'MESH' | 'EMPTY';

export interface SceneObject {
  name: string;
  type: ObjectType;
  /** Object-space geometry; null for empties. */
  mesh: TriangleMesh | null;
  location: Vec3;
  scale: Vec3;
  visible: boolean;
  modifiers: string[];
  materials: string[];
}

export interface AddObjectOptions {
  location?: Vec3;
  scale?: Vec3;
  visible?: boolean;
  modifiers?: string[];
  materials?: string[];
  /** Make the new object the only selected one (default true). */
  select?: boolean;
}

export class Scene {
  name: string;
  unitSystem = 'METRIC';
  unitScale = 1.0;
  frameCurrent = 1;

  private readonly objects = new Map<string, SceneObject>();
  private readonly selection = new Set<string>();
  private active: string | null = null;

  constructor(name = 'Scene') {
    this.name = name;
  }

  // ─── Objects ─────────────────────────────────────────────────

  add(name: string, mesh: TriangleMesh | null, options: AddObjectOptions = {}): SceneObject {
    const obj: SceneObject = {
      name: this.uniqueName(name),
      type: mesh ? 'MESH' : 'EMPTY',
      mesh,
      location: options.location ?? [0, 0, 0],
      scale: options.scale ?? [1, 1, 1],
      visible: options.visible ?? true,
      modifiers: options.modifiers ?? [],
      materials: options.materials ?? [],
    };
    this.objects.set(obj.name, obj);
    if (options.select ?? true) this.select([obj.name]);
    return obj;
  }

  get(name: string): SceneObject {
    const obj = this.objects.get(name);
    if (!obj) {
      throw notFound(`Object '${name}' not found. Available: [${this.names().join(', ')}]`);
    }
    return obj;
  }

  has(name: string): boolean {
    return this.objects.has(name);
  }

  remove(name: string): void {
    this.get(name);
    this.objects.delete(name);
    this.selection.delete(name);
    if (this.active === name) this.active = null;
  }

  list(): SceneObject[] {
    return [...this.objects.values()];
  }

  names(): string[] {
    return [...this.objects.keys()];
  }

  get size(): number {
    return this.objects.size;
  }

  clear(): void {
    this.objects.clear();
    this.selection.clear();
    this.active = null;
  }

  // ─── Selection ───────────────────────────────────────────────

  select(names: string[], extend = false): void {
    for (const name of names) this.get(name);
    if (!extend) this.selection.clear();
    for (const name of names) this.selection.add(name);
    if (names.length > 0) this.active = names[names.length - 1];
  }

  selected(): SceneObject[] {
    return [...this.selection].map((name) => this.get(name));
  }

  activeObject(): SceneObject | null {
    return this.active ? this.get(this.active) : null;
  }

  // ─── Geometry ────────────────────────────────────────────────

  /** Mesh with the object's scale and location applied. */
  worldMesh(obj: SceneObject): TriangleMesh | null {
    if (!obj.mesh) return null;
    const { location, scale } = obj;
    return mapVertices(obj.mesh, (v) => add([v[0] * scale[0], v[1] * scale[1], v[2] * scale[2]], location));
  }

  worldBounds(obj: SceneObject): BoundingBox | null {
    const mesh = this.worldMesh(obj);
    return mesh && mesh.vertices.length > 0 ? computeBounds(mesh) : null;
  }

  /** Bounds over all visible meshes. */
  visibleBounds(): BoundingBox | null {
    const boxes: BoundingBox[] = [];
    for (const obj of this.objects.values()) {
      if (!obj.visible) continue;
      const b = this.worldBounds(obj);
      if (b) boxes.push(b);
    }
    return mergeBounds(boxes);
  }

  private uniqueName(base: string): string {
    if (!this.objects.has(base)) return base;
    for (let i = 1; ; i++) {
      const candidate = `${base}.${String(i).padStart(3, '0')}`;
      if (!this.objects.has(candidate)) return candidate;
    }
  }
}
