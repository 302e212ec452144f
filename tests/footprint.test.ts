/**
 * Unit tests for viewport footprint extraction
 */

import { afterEach, describe, it, expect } from '@jest/globals';
import { InvalidArgumentError, TransformFailureError, UnsupportedGeometryError } from '../src/errors.js';
import type { Vec3 } from '../src/geometry/types.js';
import { MemorySceneStore } from '../src/test/memoryScene.js';
import { createRecordingLogger } from '../src/test/recordingLogger.js';
import { setLogger } from '../src/utils/debug.js';
import {
  createLShapePolyline,
  createSiteViewport,
  createSquareViewport,
  createVertexPolyline,
  L_SHAPE_SHEET
} from '../src/test/viewports.js';
import { extractFootprint, getSheetCorners } from '../src/viewport/footprint.js';
import type { ViewportDescriptor } from '../src/viewport/types.js';

function expectPolygonClose(actual: Vec3[], expected: Vec3[], digits: number = 9): void {
  expect(actual).toHaveLength(expected.length);
  expected.forEach((p, i) => {
    expect(actual[i].x).toBeCloseTo(p.x, digits);
    expect(actual[i].y).toBeCloseTo(p.y, digits);
    expect(actual[i].z).toBeCloseTo(p.z, digits);
  });
}

/** Rotate about a pivot in the XY plane */
function rotateAbout(p: Vec3, pivot: Vec3, angle: number): Vec3 {
  const dx = p.x - pivot.x;
  const dy = p.y - pivot.y;
  return {
    x: pivot.x + dx * Math.cos(angle) - dy * Math.sin(angle),
    y: pivot.y + dx * Math.sin(angle) + dy * Math.cos(angle),
    z: p.z
  };
}

describe('extractFootprint (rectangular)', () => {
  it('should return the four corners BL, TL, TR, BR of a 10 x 10 window', () => {
    const footprint = extractFootprint(createSquareViewport());

    expectPolygonClose(footprint, [
      { x: -5, y: -5, z: 0 },
      { x: -5, y: 5, z: 0 },
      { x: 5, y: 5, z: 0 },
      { x: 5, y: -5, z: 0 }
    ]);
  });

  it('should scale and offset a site viewport into world units', () => {
    const footprint = extractFootprint(createSiteViewport());

    expectPolygonClose(
      footprint,
      [
        { x: 0, y: 0, z: 0 },
        { x: 0, y: 1000, z: 0 },
        { x: 2000, y: 1000, z: 0 },
        { x: 2000, y: 0, z: 0 }
      ],
      6
    );
  });

  it('should rotate every corner by the applied twist about the view target', () => {
    const target = { x: 100, y: 50, z: 0 };
    const flat = extractFootprint(createSquareViewport({ viewTarget: target }));
    const twisted = extractFootprint(createSquareViewport({ viewTarget: target, twistAngle: Math.PI / 2 }));

    expectPolygonClose(
      twisted,
      flat.map(p => rotateAbout(p, target, -Math.PI / 2))
    );
    // BL corner (95, 45) ends up at (95, 55)
    expect(twisted[0].x).toBeCloseTo(95, 9);
    expect(twisted[0].y).toBeCloseTo(55, 9);
  });

  it('should place a side view in the world YZ plane', () => {
    const footprint = extractFootprint(createSquareViewport({ viewDirection: { x: 1, y: 0, z: 0 } }));

    expectPolygonClose(footprint, [
      { x: 0, y: -5, z: -5 },
      { x: 0, y: -5, z: 5 },
      { x: 0, y: 5, z: 5 },
      { x: 0, y: 5, z: -5 }
    ]);
  });

  it('should be bit-for-bit repeatable', () => {
    const viewport = createSiteViewport({ twistAngle: 0.7345, viewTarget: { x: 12.5, y: -3.25, z: 1 } });
    const first = extractFootprint(viewport);
    const second = extractFootprint(viewport);

    expect(second).toEqual(first);
    expect(second).not.toBe(first);
  });

  it('should use the rectangle when clipping is on but no boundary is referenced', () => {
    const footprint = extractFootprint(createSquareViewport({ nonRectClipOn: true, clipBoundaryRef: null }));
    expect(footprint).toHaveLength(4);
  });

  it('should ignore a clip reference while clipping is off', () => {
    const store = new MemorySceneStore().add(createLShapePolyline('clip-lw'));
    const footprint = extractFootprint(createSquareViewport({ clipBoundaryRef: 'clip-lw' }), { store });

    expect(footprint).toHaveLength(4);
    expect(store.sessions).toHaveLength(0);
  });

  it('should list corners in sheet space in the fixed order', () => {
    expect(getSheetCorners(createSiteViewport())).toEqual([
      { x: 180, y: 140, z: 0 },
      { x: 180, y: 160, z: 0 },
      { x: 220, y: 160, z: 0 },
      { x: 220, y: 140, z: 0 }
    ]);
  });
});

afterEach(() => {
  setLogger(null);
});

describe('extractFootprint (clipped)', () => {
  const clipped = (ref: string, overrides: Partial<ViewportDescriptor> = {}) =>
    createSquareViewport({ nonRectClipOn: true, clipBoundaryRef: ref, ...overrides });

  it('should trace a lightweight polyline in stored order', () => {
    const store = new MemorySceneStore().add(createLShapePolyline('clip-lw'));
    const footprint = extractFootprint(clipped('clip-lw', { viewTarget: { x: 100, y: 200, z: 0 } }), { store });

    expectPolygonClose(
      footprint,
      L_SHAPE_SHEET.map(p => ({ x: p.x + 100, y: p.y + 200, z: 0 }))
    );
  });

  it('should read 2D polyline vertex records and drop their elevation', () => {
    const points = [
      { x: -4, y: -4, z: 3 },
      { x: 4, y: -4, z: 3 },
      { x: 0, y: 4, z: 3 }
    ];
    const store = new MemorySceneStore().add(...createVertexPolyline('polyline2d', 'clip-2d', points));
    const footprint = extractFootprint(clipped('clip-2d'), { store });

    expectPolygonClose(footprint, [
      { x: -4, y: -4, z: 0 },
      { x: 4, y: -4, z: 0 },
      { x: 0, y: 4, z: 0 }
    ]);
  });

  it('should read 3D polyline vertex records without reordering or deduplicating', () => {
    const points = [
      { x: 1, y: 1, z: 0 },
      { x: 1, y: 1, z: 0 },
      { x: -2, y: 3, z: 0 },
      { x: -2, y: -3, z: 0 }
    ];
    const store = new MemorySceneStore().add(...createVertexPolyline('polyline3d', 'clip-3d', points));
    const footprint = extractFootprint(clipped('clip-3d', { customScale: 0.5 }), { store });

    // Scale 0.5 doubles distances from the window center
    expectPolygonClose(footprint, [
      { x: 2, y: 2, z: 0 },
      { x: 2, y: 2, z: 0 },
      { x: -4, y: 6, z: 0 },
      { x: -4, y: -6, z: 0 }
    ]);
  });

  it('should open and close its own session when none is supplied', () => {
    const store = new MemorySceneStore().add(createLShapePolyline('clip-lw'));
    extractFootprint(clipped('clip-lw'), { store });

    expect(store.sessions).toHaveLength(1);
    expect(store.sessions[0].closed).toBe(true);
  });

  it('should borrow a supplied session without closing it', () => {
    const store = new MemorySceneStore().add(...createVertexPolyline('polyline2d', 'clip-2d', L_SHAPE_SHEET));
    const session = store.openReadSession();

    const footprint = extractFootprint(clipped('clip-2d'), { store, session });

    expect(footprint).toHaveLength(6);
    expect(session.closed).toBe(false);
    expect(store.sessions).toHaveLength(1);
    expect(session.reads[0]).toBe('clip-2d');
  });

  it('should raise UnsupportedGeometry for other entity types', () => {
    const store = new MemorySceneStore().add({ ref: 'clip-circle', typeName: 'Circle', kind: 'other' });

    let caught: unknown;
    try {
      extractFootprint(clipped('clip-circle'), { store });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(UnsupportedGeometryError);
    expect(caught instanceof UnsupportedGeometryError && caught.shape).toBe('Circle');
    expect(store.sessions[0].closed).toBe(true);
  });

  it('should keep the UnsupportedGeometry error when closing the session also fails', () => {
    const { logger, records } = createRecordingLogger();
    setLogger(logger);
    const store = new MemorySceneStore()
      .add({ ref: 'clip-circle', typeName: 'Circle', kind: 'other' })
      .failCloses();

    let caught: unknown;
    try {
      extractFootprint(clipped('clip-circle'), { store });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(UnsupportedGeometryError);
    expect(store.sessions[0].closed).toBe(true);
    expect(records).toEqual([{ level: 'warn', message: 'Failed to close read session after a read error' }]);
  });

  it('should report a close failure after a successful read', () => {
    const store = new MemorySceneStore().add(createLShapePolyline('clip-lw')).failCloses();

    expect(() => extractFootprint(clipped('clip-lw'), { store })).toThrow(
      'Failed to calculate viewport footprint: Simulated close failure'
    );
  });

  it('should treat a bare vertex record as unsupported', () => {
    const store = new MemorySceneStore().add({
      ref: 'v',
      typeName: 'Vertex2d',
      kind: 'vertex2d',
      position: { x: 0, y: 0, z: 0 }
    });
    expect(() => extractFootprint(clipped('v'), { store })).toThrow(
      'Unsupported clip entity type: Vertex2d. Only polyline, polyline2d and polyline3d are supported.'
    );
  });

  it('should wrap store failures in TransformFailure and still release the session', () => {
    const store = new MemorySceneStore()
      .add(...createVertexPolyline('polyline2d', 'clip-2d', L_SHAPE_SHEET))
      .failReadsOf('clip-2d/v1');

    let caught: unknown;
    try {
      extractFootprint(clipped('clip-2d'), { store });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(TransformFailureError);
    expect(caught instanceof Error && caught.message).toBe(
      'Failed to calculate viewport footprint: Simulated read failure for clip-2d/v1'
    );
    expect(caught instanceof Error && caught.cause instanceof Error && caught.cause.message).toBe(
      'Simulated read failure for clip-2d/v1'
    );
    expect(store.sessions[0].closed).toBe(true);
  });

  it('should wrap a missing clip entity in TransformFailure', () => {
    const store = new MemorySceneStore();
    expect(() => extractFootprint(clipped('nowhere'), { store })).toThrow(TransformFailureError);
  });

  it('should reject a vertex record of the wrong kind', () => {
    const store = new MemorySceneStore().add(
      { ref: 'clip-mixed', typeName: 'Polyline2d', kind: 'polyline2d', vertexRefs: ['v3'] },
      { ref: 'v3', typeName: 'PolylineVertex3d', kind: 'vertex3d', position: { x: 0, y: 0, z: 0 } }
    );

    expect(() => extractFootprint(clipped('clip-mixed'), { store })).toThrow(
      'Clip boundary clip-mixed references PolylineVertex3d (v3) where a vertex2d record was expected'
    );
  });

  it('should fail without a store or session for a clipped viewport', () => {
    expect(() => extractFootprint(clipped('clip-lw'))).toThrow(TransformFailureError);
  });

  it('should propagate argument errors unwrapped', () => {
    const store = new MemorySceneStore().add(createLShapePolyline('clip-lw'));
    expect(() => extractFootprint(clipped('clip-lw', { customScale: 0 }), { store })).toThrow(InvalidArgumentError);
    expect(() => extractFootprint(null, { store })).toThrow(InvalidArgumentError);
    expect(store.sessions).toHaveLength(0);
  });
});
