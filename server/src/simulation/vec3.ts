import type { Vec3 } from '@hustle/shared';

export function sub(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function dot(a: Vec3, b: Vec3): number {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}

export function length(v: Vec3): number {
  return Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);
}

export function distance(a: Vec3, b: Vec3): number {
  return length(sub(a, b));
}

/** Unit vector, or null for a zero-length input */
export function normalize(v: Vec3): Vec3 | null {
  const len = length(v);
  if (len === 0 || !Number.isFinite(len)) return null;
  return { x: v.x / len, y: v.y / len, z: v.z / len };
}

/** Angle between two vectors in degrees; 0 when either is zero-length */
export function angleBetweenDeg(a: Vec3, b: Vec3): number {
  const la = length(a);
  const lb = length(b);
  if (la === 0 || lb === 0) return 0;
  // Clamp for float error before acos
  const cos = Math.max(-1, Math.min(1, dot(a, b) / (la * lb)));
  return (Math.acos(cos) * 180) / Math.PI;
}

export function isFiniteVec(v: Vec3): boolean {
  return Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}
