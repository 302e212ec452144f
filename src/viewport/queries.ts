/**
 * Viewport Queries
 *
 * Convenience wiring of footprint extraction, containment and bounds for
 * callers that start from a viewport rather than a polygon.
 */

import { getConfig } from '../config.js';
import { computeBounds } from '../geometry/bounds.js';
import { isInside, isInsideWithTolerance } from '../geometry/containment.js';
import type { BoundingBox, Vec2, Vec3 } from '../geometry/types.js';
import type { SceneAccess } from '../scene/session.js';
import { getLogger, type Logger } from '../utils/debug.js';
import { extractFootprint } from './footprint.js';
import type { ViewportDescriptor } from './types.js';

export interface PointInViewportOptions extends SceneAccess {
  /** Probe offset for the tolerant test (defaults to the configured tolerance) */
  tolerance?: number;
}

/**
 * Whether a world-space point falls inside the region a viewport exposes
 */
export function isPointInViewport(
  viewport: ViewportDescriptor | null | undefined,
  point: Vec2,
  options: PointInViewportOptions = {}
): boolean {
  const footprint = extractFootprint(viewport, options);
  if (footprint.length < 3) {
    return false;
  }
  return isInsideWithTolerance(point, footprint, options.tolerance ?? getConfig().containmentTolerance);
}

/**
 * Bounding box of a viewport's footprint
 * @returns null when the footprint is empty
 */
export function getViewportBounds(
  viewport: ViewportDescriptor | null | undefined,
  access: SceneAccess = {}
): BoundingBox | null {
  return computeBounds(extractFootprint(viewport, access));
}

/**
 * Keep the items whose location lies inside a footprint, in input order
 *
 * @param locate - Returns the world-space location of an item
 */
export function filterItemsInViewport<T>(
  items: readonly T[],
  footprint: readonly Vec3[],
  locate: (item: T) => Vec2,
  logger: Logger = getLogger()
): T[] {
  if (footprint.length < 3) {
    logger.warn('Invalid viewport boundary for filtering items', { vertices: footprint.length });
    return [];
  }

  const inside = items.filter(item => isInside(locate(item), footprint));
  logger.info(`Filtered ${inside.length} of ${items.length} items within viewport boundary`);
  return inside;
}
