/**
 * Matrix transformation utilities
 * 4x4 affine matrices in row-vector form: [x', y', z', 1] = [x, y, z, 1] * M
 *
 * Layout (row-major):
 *   m0  m1  m2  0     <- image of the X axis
 *   m4  m5  m6  0     <- image of the Y axis
 *   m8  m9  m10 0     <- image of the Z axis
 *   m12 m13 m14 1     <- translation
 */

import type { Vec3 } from '../geometry/types.js';
import { cross, formatNumber, normalize, WORLD_Y, WORLD_Z } from './geom.js';

export type Matrix4x4 = [
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
  number, number, number, number
];

/** Arbitrary-axis threshold for choosing a plane's X axis */
const ARBITRARY_AXIS_LIMIT = 1 / 64;

export function createIdentityMatrix(): Matrix4x4 {
  return [
    1, 0, 0, 0,
    0, 1, 0, 0,
    0, 0, 1, 0,
    0, 0, 0, 1
  ];
}

export function createTranslationMatrix(offset: Vec3): Matrix4x4 {
  return [
    1, 0, 0, 0,
    0, 1, 0, 0,
    0, 0, 1, 0,
    offset.x, offset.y, offset.z, 1
  ];
}

/**
 * Uniform scale about a pivot: p' = pivot + factor * (p - pivot)
 */
export function createScaleMatrix(factor: number, pivot: Vec3): Matrix4x4 {
  const k = 1 - factor;
  return [
    factor, 0, 0, 0,
    0, factor, 0, 0,
    0, 0, factor, 0,
    pivot.x * k, pivot.y * k, pivot.z * k, 1
  ];
}

/**
 * Right-handed rotation by `angle` about `axis` through `pivot`
 *
 * @param axis - Rotation axis (need not be unit length)
 * @returns null when the axis has zero length
 */
export function createRotationMatrix(angle: number, axis: Vec3, pivot: Vec3): Matrix4x4 | null {
  const n = normalize(axis);
  if (!n) return null;

  const cos = Math.cos(angle);
  const sin = Math.sin(angle);
  const t = 1 - cos;
  const { x, y, z } = n;

  // Rows are the images of the basis vectors (transpose of the column form)
  const m0 = t * x * x + cos;
  const m1 = t * x * y + sin * z;
  const m2 = t * x * z - sin * y;
  const m4 = t * x * y - sin * z;
  const m5 = t * y * y + cos;
  const m6 = t * y * z + sin * x;
  const m8 = t * x * z + sin * y;
  const m9 = t * y * z - sin * x;
  const m10 = t * z * z + cos;

  // Translation keeps the pivot fixed: pivot - pivot * R
  const tx = pivot.x - (pivot.x * m0 + pivot.y * m4 + pivot.z * m8);
  const ty = pivot.y - (pivot.x * m1 + pivot.y * m5 + pivot.z * m9);
  const tz = pivot.z - (pivot.x * m2 + pivot.y * m6 + pivot.z * m10);

  return [
    m0, m1, m2, 0,
    m4, m5, m6, 0,
    m8, m9, m10, 0,
    tx, ty, tz, 1
  ];
}

/**
 * Change of basis from a plane's local coordinates to world coordinates
 *
 * The plane's Z axis is `normal`. Its X axis follows the arbitrary-axis rule:
 * WorldY x N when N is within 1/64 of the world Z axis, WorldZ x N otherwise.
 * Y = N x X completes a right-handed frame.
 *
 * @returns null when the normal has zero length
 */
export function createPlaneToWorldMatrix(normal: Vec3): Matrix4x4 | null {
  const n = normalize(normal);
  if (!n) return null;

  const nearWorldZ = Math.abs(n.x) < ARBITRARY_AXIS_LIMIT && Math.abs(n.y) < ARBITRARY_AXIS_LIMIT;
  const xAxis = normalize(cross(nearWorldZ ? WORLD_Y : WORLD_Z, n));
  if (!xAxis) return null;
  const yAxis = cross(n, xAxis);

  return [
    xAxis.x, xAxis.y, xAxis.z, 0,
    yAxis.x, yAxis.y, yAxis.z, 0,
    n.x, n.y, n.z, 0,
    0, 0, 0, 1
  ];
}

/**
 * Multiply two 4x4 matrices (a * b)
 * In row-vector form the result applies `a` first, then `b`.
 */
export function multiplyMatrix(a: Matrix4x4, b: Matrix4x4): Matrix4x4 {
  const out = new Array<number>(16).fill(0);
  for (let row = 0; row < 4; row++) {
    for (let col = 0; col < 4; col++) {
      let sum = 0;
      for (let k = 0; k < 4; k++) {
        sum += a[row * 4 + k] * b[k * 4 + col];
      }
      out[row * 4 + col] = sum;
    }
  }
  return [
    out[0], out[1], out[2], out[3],
    out[4], out[5], out[6], out[7],
    out[8], out[9], out[10], out[11],
    out[12], out[13], out[14], out[15]
  ];
}

/**
 * Transform a 3D point using an affine transformation matrix
 */
export function transformPoint(point: Vec3, matrix: Matrix4x4): Vec3 {
  const { x, y, z } = point;
  return {
    x: x * matrix[0] + y * matrix[4] + z * matrix[8] + matrix[12],
    y: x * matrix[1] + y * matrix[5] + z * matrix[9] + matrix[13],
    z: x * matrix[2] + y * matrix[6] + z * matrix[10] + matrix[14]
  };
}

/**
 * Format a matrix as four bracketed rows, e.g. [1.000,0.000,0.000,0.000]...
 */
export function formatMatrix(matrix: Matrix4x4, digits: number = 3): string {
  const rows: string[] = [];
  for (let row = 0; row < 4; row++) {
    const cells = matrix.slice(row * 4, row * 4 + 4).map(v => formatNumber(v, digits));
    rows.push(`[${cells.join(',')}]`);
  }
  return rows.join('');
}
