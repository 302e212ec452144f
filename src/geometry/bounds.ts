/**
 * Bounding Box
 */

import { InvalidArgumentError } from '../errors.js';
import type { BoundingBox, Vec3 } from './types.js';

/**
 * Axis-aligned bounds of a polygon
 *
 * @returns null for an empty polygon
 */
export function computeBounds(polygon: readonly Vec3[] | null | undefined): BoundingBox | null {
  if (polygon == null) {
    throw new InvalidArgumentError('polygon', 'Polygon cannot be null');
  }
  if (polygon.length === 0) {
    return null;
  }

  const [first] = polygon;
  const min = { x: first.x, y: first.y, z: first.z };
  const max = { x: first.x, y: first.y, z: first.z };

  for (let i = 1; i < polygon.length; i++) {
    const p = polygon[i];
    min.x = Math.min(min.x, p.x);
    min.y = Math.min(min.y, p.y);
    min.z = Math.min(min.z, p.z);
    max.x = Math.max(max.x, p.x);
    max.y = Math.max(max.y, p.y);
    max.z = Math.max(max.z, p.z);
  }

  return { min, max };
}
