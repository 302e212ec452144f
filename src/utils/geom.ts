/**
 * Geometry utilities
 * Vector helpers for the transform code
 * All functions are pure and return new objects
 */

import type { Vec2, Vec3 } from '../geometry/types.js';

export const WORLD_Y: Vec3 = Object.freeze({ x: 0, y: 1, z: 0 });
export const WORLD_Z: Vec3 = Object.freeze({ x: 0, y: 0, z: 1 });

/**
 * Lift a 2D point onto the z = 0 plane
 */
export function lift(point: Vec2): Vec3 {
  return { x: point.x, y: point.y, z: 0 };
}

export function subtract(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function dot(a: Vec3, b: Vec3): number {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return {
    x: a.y * b.z - a.z * b.y,
    y: a.z * b.x - a.x * b.z,
    z: a.x * b.y - a.y * b.x
  };
}

export function length(v: Vec3): number {
  return Math.sqrt(dot(v, v));
}

/**
 * Scale a vector to unit length
 * @returns null for a zero-length vector
 */
export function normalize(v: Vec3): Vec3 | null {
  const len = length(v);
  if (len < 1e-12) {
    return null;
  }
  return { x: v.x / len, y: v.y / len, z: v.z / len };
}

export function distance(a: Vec3, b: Vec3): number {
  return length(subtract(a, b));
}

export function isFiniteVec(v: Vec2 | Vec3): boolean {
  return Number.isFinite(v.x) && Number.isFinite(v.y) && ('z' in v ? Number.isFinite(v.z) : true);
}

/**
 * Fixed-point text for a number; values that round to zero print without a sign
 */
export function formatNumber(value: number, digits: number): string {
  return (Math.abs(value) < 0.5 * 10 ** -digits ? 0 : value).toFixed(digits);
}

export function formatPoint(p: Vec3, digits: number = 4): string {
  return `(${formatNumber(p.x, digits)}, ${formatNumber(p.y, digits)}, ${formatNumber(p.z, digits)})`;
}
