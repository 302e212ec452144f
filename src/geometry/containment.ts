/**
 * Point-in-Polygon Tests
 *
 * Ray casting is the primary test. The winding number is an independent
 * algorithm with the same contract; on simple polygons the two agree.
 * Only X and Y take part; Z is ignored.
 */

import { getConfig } from '../config.js';
import { InvalidArgumentError } from '../errors.js';
import type { Vec2 } from './types.js';

/** Below this, tolerant tests fall back to the exact test */
const MIN_PROBE_TOLERANCE = 1e-12;

function assertPolygon(polygon: readonly Vec2[] | null | undefined): asserts polygon is readonly Vec2[] {
  if (polygon == null) {
    throw new InvalidArgumentError('polygon', 'Polygon cannot be null');
  }
  if (polygon.length < 3) {
    throw new InvalidArgumentError('polygon', 'Polygon must have at least 3 vertices');
  }
}

function assertPoint(point: Vec2 | null | undefined): asserts point is Vec2 {
  if (point == null) {
    throw new InvalidArgumentError('point', 'Test point cannot be null');
  }
}

/**
 * Ray casting toward +X
 *
 * An edge counts when testY lies in its half-open span (lower, upper] and the
 * edge crosses that height strictly right of testX. The half-open span keeps a
 * ray through a shared vertex from being counted twice.
 */
function rayCast(testX: number, testY: number, polygon: readonly Vec2[]): boolean {
  const n = polygon.length;
  let inside = false;

  for (let i = 0; i < n; i++) {
    const { x: x1, y: y1 } = polygon[i];
    const { x: x2, y: y2 } = polygon[(i + 1) % n];

    if (
      ((y1 < testY && testY <= y2) || (y2 < testY && testY <= y1)) &&
      testX < x1 + ((testY - y1) / (y2 - y1)) * (x2 - x1)
    ) {
      inside = !inside;
    }
  }

  return inside;
}

/**
 * Positive if (px, py) is left of the directed edge, negative if right, zero on the line
 */
function isLeft(x1: number, y1: number, x2: number, y2: number, px: number, py: number): number {
  return (x2 - x1) * (py - y1) - (px - x1) * (y2 - y1);
}

/**
 * Whether a point is inside a polygon (ray casting)
 *
 * @throws InvalidArgumentError when the polygon has fewer than 3 vertices
 */
export function isInside(point: Vec2, polygon: readonly Vec2[]): boolean {
  assertPoint(point);
  assertPolygon(polygon);
  return rayCast(point.x, point.y, polygon);
}

/**
 * Signed number of times the polygon winds around a point
 * 0 = outside; CCW polygons give +1 inside, CW polygons -1.
 * Edges span [lower, upper) here but (lower, upper] in rayCast; keep both as they are.
 *
 * @throws InvalidArgumentError when the polygon has fewer than 3 vertices
 */
export function windingNumber(point: Vec2, polygon: readonly Vec2[]): number {
  assertPoint(point);
  assertPolygon(polygon);

  const n = polygon.length;
  const { x: px, y: py } = point;
  let winding = 0;

  for (let i = 0; i < n; i++) {
    const { x: x1, y: y1 } = polygon[i];
    const { x: x2, y: y2 } = polygon[(i + 1) % n];

    if (y1 <= py) {
      if (y2 > py && isLeft(x1, y1, x2, y2, px, py) > 0) {
        winding++;
      }
    } else if (y2 <= py && isLeft(x1, y1, x2, y2, px, py) < 0) {
      winding--;
    }
  }

  return winding;
}

/**
 * Whether a point is inside a polygon (nonzero winding rule)
 */
export function isInsideByWinding(point: Vec2, polygon: readonly Vec2[]): boolean {
  return windingNumber(point, polygon) !== 0;
}

/**
 * Containment with slack for drift from the transform chain
 *
 * Probes the point itself and the four points offset by ±tolerance along X and
 * Y; inside if any probe is inside by the exact test.
 *
 * @param tolerance - Probe offset, defaults to VIEWPORT_CONTAINMENT_TOLERANCE (1e-9)
 * @throws InvalidArgumentError for a short polygon or a negative tolerance
 */
export function isInsideWithTolerance(
  point: Vec2,
  polygon: readonly Vec2[],
  tolerance: number = getConfig().containmentTolerance
): boolean {
  assertPoint(point);
  assertPolygon(polygon);

  if (!(tolerance >= 0)) {
    throw new InvalidArgumentError('tolerance', 'Tolerance must be non-negative');
  }

  if (tolerance < MIN_PROBE_TOLERANCE) {
    return rayCast(point.x, point.y, polygon);
  }

  const { x, y } = point;
  const probes: Array<[number, number]> = [
    [x, y],
    [x + tolerance, y],
    [x - tolerance, y],
    [x, y + tolerance],
    [x, y - tolerance]
  ];

  return probes.some(([px, py]) => rayCast(px, py, polygon));
}
