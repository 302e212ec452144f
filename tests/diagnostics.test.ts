/**
 * Unit tests for the transform diagnostics report
 */

import { describe, it, expect } from '@jest/globals';
import { createSquareViewport } from '../src/test/viewports.js';
import { getTransformationDiagnostics } from '../src/viewport/diagnostics.js';

describe('getTransformationDiagnostics', () => {
  it('should describe the viewport, both matrices and a sample corner', () => {
    const lines = getTransformationDiagnostics(createSquareViewport()).split('\n');

    expect(lines[0]).toBe('Viewport Transformation Diagnostics:');
    expect(lines).toContain('  Viewport: vp-1');
    expect(lines).toContain('  Center Point (Sheet): (0.0000, 0.0000)');
    expect(lines).toContain('  Dimensions (Sheet): 10.000 x 10.000');
    expect(lines).toContain('  View Height: n/a');
    expect(lines).toContain('  Custom Scale: 1.000000 (Scale Factor: 1.0)');
    expect(lines).toContain('  Twist Angle: 0.000000 rad (0.00°)');
    expect(lines).toContain('  Clip Boundary: none');
    expect(lines).toContain(
      '  Sheet → Camera: [1.000,0.000,0.000,0.000][0.000,1.000,0.000,0.000][0.000,0.000,1.000,0.000][0.000,0.000,0.000,1.000]'
    );
    expect(lines).toContain('  View Target Offset: 0.00 units from origin');
    expect(lines).toContain('  Sheet: (5.0000, 5.0000, 0.0000)');
    expect(lines).toContain('  → World: (5.0000, 5.0000, 0.0000)');
  });

  it('should report twist, scale and target of a placed viewport', () => {
    const report = getTransformationDiagnostics(
      createSquareViewport({
        twistAngle: Math.PI / 2,
        customScale: 0.5,
        viewTarget: { x: 3, y: 4, z: 0 },
        viewHeight: 20,
        nonRectClipOn: true,
        clipBoundaryRef: 'clip-lw'
      })
    );
    const lines = report.split('\n');

    expect(lines).toContain('  Twist Angle: 1.570796 rad (90.00°)');
    expect(lines).toContain('  Custom Scale: 0.500000 (Scale Factor: 2.0)');
    expect(lines).toContain('  View Height: 20.000');
    expect(lines).toContain('  View Target Offset: 5.00 units from origin');
    expect(lines).toContain('  Clip Boundary: clip-lw');
    // Top-right (5, 5) -> camera (10, 10) -> +target (13, 14) -> -90° about target -> (13, -6)
    expect(lines).toContain('  → World: (13.0000, -6.0000, 0.0000)');
  });

  it('should report a null viewport', () => {
    expect(getTransformationDiagnostics(null)).toBe('Viewport is null');
  });

  it('should report errors instead of throwing', () => {
    expect(getTransformationDiagnostics(createSquareViewport({ customScale: 0 }))).toBe(
      'Error getting diagnostics: Custom scale cannot be zero (parameter: viewport.customScale)'
    );
  });
});
