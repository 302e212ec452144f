/**
 * Clip Boundary Sources
 *
 * A viewport's non-rectangular clip entity must be one of three polyline
 * shapes. Anything else is reported as unsupported, never read as empty.
 */

import { TransformFailureError, UnsupportedGeometryError } from '../errors.js';
import type { Vec3 } from '../geometry/types.js';
import type { ObjectRef, ReadSession, SceneObject } from '../scene/types.js';

export type ClipBoundarySource =
  | { kind: 'polyline'; ref: ObjectRef; vertices: readonly Vec3[] }
  | { kind: 'polyline2d'; ref: ObjectRef; vertexRefs: readonly ObjectRef[] }
  | { kind: 'polyline3d'; ref: ObjectRef; vertexRefs: readonly ObjectRef[] };

export type ClipClassification = ClipBoundarySource | { kind: 'unsupported'; shape: string };

function assertNever(value: never): never {
  throw new TransformFailureError(`Unhandled clip boundary variant: ${JSON.stringify(value)}`);
}

/**
 * Sort a resolved scene object into a clip boundary variant
 */
export function classifyClipEntity(entity: SceneObject): ClipClassification {
  switch (entity.kind) {
    case 'polyline':
      return { kind: 'polyline', ref: entity.ref, vertices: entity.vertices };
    case 'polyline2d':
      return { kind: 'polyline2d', ref: entity.ref, vertexRefs: entity.vertexRefs };
    case 'polyline3d':
      return { kind: 'polyline3d', ref: entity.ref, vertexRefs: entity.vertexRefs };
    case 'vertex2d':
    case 'vertex3d':
    case 'other':
      return { kind: 'unsupported', shape: entity.typeName };
    default:
      return assertNever(entity);
  }
}

function readVertexRecord(
  session: ReadSession,
  owner: ObjectRef,
  ref: ObjectRef,
  expected: 'vertex2d' | 'vertex3d'
): Vec3 {
  const record = session.getObject(ref);
  if ((record.kind === 'vertex2d' || record.kind === 'vertex3d') && record.kind === expected) {
    return record.position;
  }
  throw new TransformFailureError(
    `Clip boundary ${owner} references ${record.typeName} (${ref}) where a ${expected} record was expected`
  );
}

/**
 * Read clip vertices in stored order
 * Sheet-space positions are projected onto the sheet plane (z = 0).
 */
export function readClipVertices(source: ClipBoundarySource, session: ReadSession): Vec3[] {
  let positions: readonly Vec3[];

  switch (source.kind) {
    case 'polyline':
      positions = source.vertices;
      break;
    case 'polyline2d':
      positions = source.vertexRefs.map(ref => readVertexRecord(session, source.ref, ref, 'vertex2d'));
      break;
    case 'polyline3d':
      positions = source.vertexRefs.map(ref => readVertexRecord(session, source.ref, ref, 'vertex3d'));
      break;
    default:
      return assertNever(source);
  }

  return positions.map(p => ({ x: p.x, y: p.y, z: 0 }));
}

/**
 * Resolve a clip reference and read its vertices
 * @throws UnsupportedGeometryError when the entity is not a supported polyline
 */
export function resolveClipBoundary(session: ReadSession, ref: ObjectRef): Vec3[] {
  const classified = classifyClipEntity(session.getObject(ref));
  if (classified.kind === 'unsupported') {
    throw new UnsupportedGeometryError(classified.shape);
  }
  return readClipVertices(classified, session);
}
