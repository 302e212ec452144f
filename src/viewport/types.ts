/**
 * Viewport Descriptor
 *
 * Snapshot of the stored parameters of a sheet viewport. Everything the
 * engine computes is a pure function of one of these.
 */

import { InvalidArgumentError } from '../errors.js';
import type { Vec2, Vec3 } from '../geometry/types.js';
import type { ObjectRef } from '../scene/types.js';
import { isFiniteVec, length } from '../utils/geom.js';

export interface ViewportDescriptor {
  /** Stable handle of the viewport, used for caching and logs */
  readonly id?: string;
  /** Center of the viewport window on the sheet */
  readonly centerPoint: Vec2;
  /** Window width in sheet units */
  readonly width: number;
  /** Window height in sheet units */
  readonly height: number;
  /** Center of the view in camera coordinates */
  readonly viewCenter: Vec2;
  /** Point the camera looks at, in world coordinates */
  readonly viewTarget: Vec3;
  /** Viewing direction, in world coordinates */
  readonly viewDirection: Vec3;
  /** Twist of the view about the viewing direction, radians */
  readonly twistAngle: number;
  /** Sheet units per camera unit */
  readonly customScale: number;
  /** Height of the view in camera units (diagnostics only) */
  readonly viewHeight?: number;
  /** Whether the window is clipped to a non-rectangular boundary */
  readonly nonRectClipOn: boolean;
  /** Clip boundary entity, when clipping is on */
  readonly clipBoundaryRef?: ObjectRef | null;
}

/**
 * Throw InvalidArgumentError unless `viewport` is a usable descriptor
 */
export function assertViewport(
  viewport: ViewportDescriptor | null | undefined
): asserts viewport is ViewportDescriptor {
  if (viewport == null) {
    throw new InvalidArgumentError('viewport', 'Viewport cannot be null');
  }

  if (!isFiniteVec(viewport.centerPoint)) {
    throw new InvalidArgumentError('viewport.centerPoint', 'Center point must be finite');
  }
  if (!isFiniteVec(viewport.viewCenter)) {
    throw new InvalidArgumentError('viewport.viewCenter', 'View center must be finite');
  }
  if (!isFiniteVec(viewport.viewTarget)) {
    throw new InvalidArgumentError('viewport.viewTarget', 'View target must be finite');
  }
  if (!isFiniteVec(viewport.viewDirection) || length(viewport.viewDirection) < 1e-12) {
    throw new InvalidArgumentError('viewport.viewDirection', 'View direction must be a finite, non-zero vector');
  }
  if (!Number.isFinite(viewport.width) || viewport.width < 0) {
    throw new InvalidArgumentError('viewport.width', 'Width must be a finite, non-negative number');
  }
  if (!Number.isFinite(viewport.height) || viewport.height < 0) {
    throw new InvalidArgumentError('viewport.height', 'Height must be a finite, non-negative number');
  }
  if (!Number.isFinite(viewport.twistAngle)) {
    throw new InvalidArgumentError('viewport.twistAngle', 'Twist angle must be finite');
  }
  if (viewport.customScale === 0) {
    throw new InvalidArgumentError('viewport.customScale', 'Custom scale cannot be zero');
  }
  if (!Number.isFinite(viewport.customScale) || viewport.customScale < 0) {
    throw new InvalidArgumentError('viewport.customScale', 'Custom scale must be a finite, positive number');
  }
}

/**
 * Whether the viewport should be traced along its clip boundary
 */
export function hasClipBoundary(
  viewport: ViewportDescriptor
): viewport is ViewportDescriptor & { readonly clipBoundaryRef: ObjectRef } {
  return viewport.nonRectClipOn && typeof viewport.clipBoundaryRef === 'string' && viewport.clipBoundaryRef.length > 0;
}
