import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { Vec3 } from '@hustle/shared';

const __dirname = dirname(fileURLToPath(import.meta.url));

/** The one spatial primitive the detection engine needs from the world. */
export interface LineOfSight {
  /** True when geometry between the two points hides `to` from `from` */
  raycastBlocked(from: Vec3, to: Vec3): boolean;
}

/** Nothing ever blocks sight */
export const OPEN_SIGHTLINES: LineOfSight = {
  raycastBlocked: () => false,
};

export interface OcclusionMapData {
  /** World units per cell on the ground (x/z) plane */
  cellSize: number;
  width: number;
  height: number;
  /** Row-major, `height` rows of `width` cells; non-zero = wall */
  walls: number[][];
}

/**
 * Walls on a ground-plane grid. Height (y) is ignored: a wall blocks sight
 * at every elevation.
 */
export class OcclusionGrid implements LineOfSight {
  readonly data: OcclusionMapData;
  private blocked: boolean[][];

  constructor(data: OcclusionMapData) {
    this.data = data;
    this.blocked = Array.from({ length: data.height }, (_, z) =>
      Array.from({ length: data.width }, (_, x) => (data.walls[z]?.[x] ?? 0) !== 0)
    );
  }

  isCellBlocked(cellX: number, cellZ: number): boolean {
    if (cellX < 0 || cellX >= this.data.width || cellZ < 0 || cellZ >= this.data.height) {
      return false; // open ground beyond the mapped area
    }
    return this.blocked[cellZ][cellX];
  }

  isPointBlocked(x: number, z: number): boolean {
    return this.isCellBlocked(Math.floor(x / this.data.cellSize), Math.floor(z / this.data.cellSize));
  }

  raycastBlocked(from: Vec3, to: Vec3): boolean {
    const dx = to.x - from.x;
    const dz = to.z - from.z;
    const dist = Math.sqrt(dx * dx + dz * dz);
    if (dist === 0) return false;

    // Half-cell steps; the endpoints themselves are never tested so the
    // observer's and actor's own cells do not count as obstructions
    const steps = Math.ceil(dist / (this.data.cellSize / 2));
    const stepX = dx / steps;
    const stepZ = dz / steps;

    for (let i = 1; i < steps; i++) {
      if (this.isPointBlocked(from.x + stepX * i, from.z + stepZ * i)) return true;
    }
    return false;
  }

  static loadFromFile(path?: string): OcclusionGrid {
    const filePath = path || process.env.OCCLUSION_MAP || join(__dirname, '..', '..', 'data', 'occlusion.json');
    const raw = readFileSync(filePath, 'utf-8');
    const data: OcclusionMapData = JSON.parse(raw);
    return new OcclusionGrid(data);
  }
}
