/**
 * Transform Diagnostics
 * Plain-text dump of a viewport's transform chain for debugging
 */

import { describeError } from '../errors.js';
import { distance, formatPoint } from '../utils/geom.js';
import { formatMatrix } from '../utils/matrix.js';
import { getSheetCorners } from './footprint.js';
import { applyTransform, buildCameraToWorld, buildSheetToCamera, compose } from './transformBuilder.js';
import { assertViewport, hasClipBoundary, type ViewportDescriptor } from './types.js';

const RAD_TO_DEG = 180 / Math.PI;

/**
 * Describe how a viewport maps sheet space to world space
 * Never throws; failures are reported in the returned text.
 */
export function getTransformationDiagnostics(viewport: ViewportDescriptor | null | undefined): string {
  if (viewport == null) {
    return 'Viewport is null';
  }

  try {
    assertViewport(viewport);

    const sheetToCamera = buildSheetToCamera(viewport);
    const cameraToWorld = buildCameraToWorld(viewport);
    const sheetToWorld = compose(cameraToWorld, sheetToCamera);

    // Top-right corner of the window
    const [, , sampleSheet] = getSheetCorners(viewport);
    const sampleWorld = applyTransform(sheetToWorld, sampleSheet);
    const { viewTarget } = viewport;

    const lines = [
      'Viewport Transformation Diagnostics:',
      `  Viewport: ${viewport.id ?? '(no id)'}`,
      `  Center Point (Sheet): (${viewport.centerPoint.x.toFixed(4)}, ${viewport.centerPoint.y.toFixed(4)})`,
      `  Dimensions (Sheet): ${viewport.width.toFixed(3)} x ${viewport.height.toFixed(3)}`,
      `  View Center: (${viewport.viewCenter.x.toFixed(4)}, ${viewport.viewCenter.y.toFixed(4)})`,
      `  View Target: ${formatPoint(viewTarget)}`,
      `  View Direction: ${formatPoint(viewport.viewDirection)}`,
      `  View Height: ${viewport.viewHeight === undefined ? 'n/a' : viewport.viewHeight.toFixed(3)}`,
      `  Custom Scale: ${viewport.customScale.toFixed(6)} (Scale Factor: ${(1 / viewport.customScale).toFixed(1)})`,
      `  Twist Angle: ${viewport.twistAngle.toFixed(6)} rad (${(viewport.twistAngle * RAD_TO_DEG).toFixed(2)}°)`,
      `  Non-Rect Clip: ${viewport.nonRectClipOn}`,
      `  Clip Boundary: ${hasClipBoundary(viewport) ? viewport.clipBoundaryRef : 'none'}`,
      '',
      `  Sheet → Camera: ${formatMatrix(sheetToCamera)}`,
      `  Camera → World: ${formatMatrix(cameraToWorld)}`,
      '',
      `  View Target Offset: ${distance(viewTarget, { x: 0, y: 0, z: 0 }).toFixed(2)} units from origin`,
      '',
      '  Sample Corner Transformation (top-right):',
      `  Sheet: ${formatPoint(sampleSheet)}`,
      `  → World: ${formatPoint(sampleWorld)}`
    ];

    return lines.join('\n');
  } catch (err) {
    return `Error getting diagnostics: ${describeError(err)}`;
  }
}
