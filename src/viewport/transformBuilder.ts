/**
 * Viewport Transform Builder
 *
 * Rebuilds the sheet → camera → world mapping of a viewport from its stored
 * parameters, so any viewport can be evaluated without activating it.
 *
 * world = cameraToWorld ∘ sheetToCamera (sheetToCamera acts first)
 */

import { InvalidArgumentError, TransformFailureError } from '../errors.js';
import type { Vec3 } from '../geometry/types.js';
import { lift } from '../utils/geom.js';
import {
  createPlaneToWorldMatrix,
  createRotationMatrix,
  createScaleMatrix,
  createTranslationMatrix,
  multiplyMatrix,
  transformPoint,
  type Matrix4x4
} from '../utils/matrix.js';
import { assertViewport, type ViewportDescriptor } from './types.js';

/** Affine map between two coordinate spaces */
export type Transform = Matrix4x4;

/**
 * Compose two transforms, right to left: the result applies `b` first, then `a`
 */
export function compose(a: Transform, b: Transform): Transform {
  return multiplyMatrix(b, a);
}

/**
 * Sheet space → camera space
 *
 * Scale by 1 / customScale about the window center, then shift the window
 * center onto the view center.
 */
export function buildSheetToCamera(viewport: ViewportDescriptor | null | undefined): Transform {
  assertViewport(viewport);

  const center = lift(viewport.centerPoint);
  const scale = createScaleMatrix(1 / viewport.customScale, center);
  const shift = createTranslationMatrix({
    x: viewport.viewCenter.x - viewport.centerPoint.x,
    y: viewport.viewCenter.y - viewport.centerPoint.y,
    z: 0
  });

  return compose(shift, scale);
}

/**
 * Camera space → world space
 *
 * Change basis from the view plane (normal = view direction) to world axes,
 * move onto the view target, then undo the twist about the view direction
 * through the target.
 */
export function buildCameraToWorld(viewport: ViewportDescriptor | null | undefined): Transform {
  assertViewport(viewport);

  const planeToWorld = createPlaneToWorldMatrix(viewport.viewDirection);
  const rotation = createRotationMatrix(-viewport.twistAngle, viewport.viewDirection, viewport.viewTarget);
  if (!planeToWorld || !rotation) {
    throw new InvalidArgumentError('viewport.viewDirection', 'View direction must be a non-zero vector');
  }
  const translation = createTranslationMatrix(viewport.viewTarget);

  return compose(rotation, compose(translation, planeToWorld));
}

/**
 * Sheet space → world space
 */
export function buildSheetToWorld(viewport: ViewportDescriptor | null | undefined): Transform {
  return compose(buildCameraToWorld(viewport), buildSheetToCamera(viewport));
}

/**
 * Map a point through a transform
 * @throws TransformFailureError when the result is not finite
 */
export function applyTransform(transform: Transform, point: Vec3): Vec3 {
  const mapped = transformPoint(point, transform);
  if (!Number.isFinite(mapped.x) || !Number.isFinite(mapped.y) || !Number.isFinite(mapped.z)) {
    throw new TransformFailureError(
      `Transform produced a non-finite point for (${point.x}, ${point.y}, ${point.z})`
    );
  }
  return mapped;
}
