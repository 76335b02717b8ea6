/**
 * Headless viewport — orthographic, flat-shaded z-buffer render of every
 * visible mesh in the scene, framed to fit, viewed from the front-right-top.
 */

import type { Vec3 } from './vec3.js';
import { sub, cross, dot, normalize, length, boundsSize, scale, add } from './vec3.js';
import { triangle, triangleCount } from './mesh.js';
import type { Scene } from './scene.js';
import { encodePNG } from './png.js';

const BACKGROUND: Vec3 = [48, 48, 54];
const BASE_COLOR: Vec3 = [186, 190, 198];
const VIEW_DIR = normalize([-1, 1, -0.8]);
const LIGHT_DIR = normalize([-0.4, 0.6, -1]);

export interface RenderOptions {
  width: number;
  height: number;
}

/** Render to raw RGB bytes. */
export function renderRGB(scene: Scene, { width, height }: RenderOptions): Uint8Array {
  const rgb = new Uint8Array(width * height * 3);
  for (let i = 0; i < width * height; i++) rgb.set(BACKGROUND, i * 3);

  const bounds = scene.visibleBounds();
  if (!bounds) return rgb;

  const center = scale(add(bounds.min, bounds.max), 0.5);
  const extent = Math.max(length(boundsSize(bounds)), 1e-6);
  const pxPerUnit = (Math.min(width, height) * 0.9) / extent;

  const right = normalize(cross(VIEW_DIR, [0, 0, 1]));
  const up = cross(right, VIEW_DIR);
  const project = (p: Vec3): Vec3 => {
    const d = sub(p, center);
    return [width / 2 + dot(d, right) * pxPerUnit, height / 2 - dot(d, up) * pxPerUnit, dot(d, VIEW_DIR)];
  };

  const depth = new Float64Array(width * height).fill(Infinity);

  for (const obj of scene.list()) {
    if (!obj.visible) continue;
    const mesh = scene.worldMesh(obj);
    if (!mesh) continue;
    for (let t = 0; t < triangleCount(mesh); t++) {
      const [a, b, c] = triangle(mesh, t);
      const n = normalize(cross(sub(b, a), sub(c, a)));
      const shade = 0.3 + 0.7 * Math.abs(dot(n, LIGHT_DIR));
      const color = BASE_COLOR.map((ch) => Math.round(ch * shade));
      rasterize(project(a), project(b), project(c), width, height, depth, (i) => rgb.set(color, i * 3));
    }
  }
  return rgb;
}

function rasterize(
  a: Vec3, b: Vec3, c: Vec3,
  width: number, height: number,
  depth: Float64Array,
  plot: (pixel: number) => void,
): void {
  const area = (b[0] - a[0]) * (c[1] - a[1]) - (b[1] - a[1]) * (c[0] - a[0]);
  if (Math.abs(area) < 1e-12) return;
  const x0 = Math.max(0, Math.floor(Math.min(a[0], b[0], c[0])));
  const x1 = Math.min(width - 1, Math.ceil(Math.max(a[0], b[0], c[0])));
  const y0 = Math.max(0, Math.floor(Math.min(a[1], b[1], c[1])));
  const y1 = Math.min(height - 1, Math.ceil(Math.max(a[1], b[1], c[1])));

  for (let y = y0; y <= y1; y++) {
    for (let x = x0; x <= x1; x++) {
      const px = x + 0.5, py = y + 0.5;
      const w0 = ((b[0] - px) * (c[1] - py) - (b[1] - py) * (c[0] - px)) / area;
      const w1 = ((c[0] - px) * (a[1] - py) - (c[1] - py) * (a[0] - px)) / area;
      const w2 = 1 - w0 - w1;
      if (w0 < 0 || w1 < 0 || w2 < 0) continue;
      const z = w0 * a[2] + w1 * b[2] + w2 * c[2];
      const i = y * width + x;
      if (z < depth[i]) {
        depth[i] = z;
        plot(i);
      }
    }
  }
}

export function renderPNG(scene: Scene, options: RenderOptions): Buffer {
  return encodePNG(options.width, options.height, renderRGB(scene, options));
}
