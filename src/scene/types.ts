/**
 * Scene Store Contract
 *
 * The engine never owns scene data. It reads clip entities and their vertex
 * sub-records through a read session on a store supplied by the host.
 */

import type { Vec3 } from '../geometry/types.js';

/** Opaque reference to an object in the scene store */
export type ObjectRef = string;

interface SceneObjectBase {
  ref: ObjectRef;
  /** Host type name, reported when the object cannot be used */
  typeName: string;
}

/** Lightweight polyline carrying its vertices inline */
export interface PolylineObject extends SceneObjectBase {
  kind: 'polyline';
  vertices: readonly Vec3[];
}

/** Legacy 2D polyline; vertices are separate vertex2d records */
export interface Polyline2dObject extends SceneObjectBase {
  kind: 'polyline2d';
  vertexRefs: readonly ObjectRef[];
}

/** 3D polyline; vertices are separate vertex3d records */
export interface Polyline3dObject extends SceneObjectBase {
  kind: 'polyline3d';
  vertexRefs: readonly ObjectRef[];
}

export interface Vertex2dObject extends SceneObjectBase {
  kind: 'vertex2d';
  position: Vec3;
}

export interface Vertex3dObject extends SceneObjectBase {
  kind: 'vertex3d';
  position: Vec3;
}

/** Any other entity (circle, spline, text...) */
export interface OtherObject extends SceneObjectBase {
  kind: 'other';
}

export type SceneObject =
  | PolylineObject
  | Polyline2dObject
  | Polyline3dObject
  | Vertex2dObject
  | Vertex3dObject
  | OtherObject;

/**
 * Read-only view of the store
 * Lookups throw when the reference cannot be resolved.
 */
export interface ReadSession {
  getObject(ref: ObjectRef): SceneObject;
  close(): void;
}

export interface SceneStore {
  openReadSession(): ReadSession;
}
