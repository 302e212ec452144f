/**
 * Viewport Footprint
 *
 * The world-space polygon a viewport exposes. Rectangular windows give their
 * four corners; clipped windows give their clip boundary vertices.
 */

import { TransformFailureError, UnsupportedGeometryError, InvalidArgumentError, describeError } from '../errors.js';
import type { Polygon, Vec3 } from '../geometry/types.js';
import { withReadSession, type SceneAccess } from '../scene/session.js';
import { debug } from '../utils/debug.js';
import { resolveClipBoundary } from './clipBoundary.js';
import { applyTransform, buildSheetToWorld, type Transform } from './transformBuilder.js';
import { assertViewport, hasClipBoundary, type ViewportDescriptor } from './types.js';

/**
 * Window corners in sheet space: bottom-left, top-left, top-right, bottom-right
 */
export function getSheetCorners(viewport: ViewportDescriptor): Vec3[] {
  const { x, y } = viewport.centerPoint;
  const halfW = viewport.width / 2;
  const halfH = viewport.height / 2;

  return [
    { x: x - halfW, y: y - halfH, z: 0 },
    { x: x - halfW, y: y + halfH, z: 0 },
    { x: x + halfW, y: y + halfH, z: 0 },
    { x: x + halfW, y: y - halfH, z: 0 }
  ];
}

function mapAll(points: readonly Vec3[], transform: Transform): Polygon {
  return points.map(p => applyTransform(transform, p));
}

/**
 * Compute the world-space footprint of a viewport
 *
 * @param viewport - Viewport snapshot
 * @param access - Scene store and/or borrowed read session, needed only for clipped viewports
 * @returns Ordered footprint vertices (new array on every call)
 * @throws InvalidArgumentError for a missing or malformed viewport
 * @throws UnsupportedGeometryError when the clip entity is not a supported polyline
 * @throws TransformFailureError for any other failure while reading clip data
 */
export function extractFootprint(
  viewport: ViewportDescriptor | null | undefined,
  access: SceneAccess = {}
): Polygon {
  assertViewport(viewport);

  try {
    const sheetToWorld = buildSheetToWorld(viewport);

    if (hasClipBoundary(viewport)) {
      const clipRef = viewport.clipBoundaryRef;
      const sheetPoints = withReadSession(access, session => resolveClipBoundary(session, clipRef));
      debug(`Viewport ${viewport.id ?? '(no id)'} clipped by ${clipRef}: ${sheetPoints.length} vertices`);
      return mapAll(sheetPoints, sheetToWorld);
    }

    return mapAll(getSheetCorners(viewport), sheetToWorld);
  } catch (err) {
    if (
      err instanceof InvalidArgumentError ||
      err instanceof UnsupportedGeometryError ||
      err instanceof TransformFailureError
    ) {
      throw err;
    }
    throw new TransformFailureError(`Failed to calculate viewport footprint: ${describeError(err)}`, err);
  }
}
