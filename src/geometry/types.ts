/**
 * Canonical Geometry Types
 *
 * Plain value types shared by the transform, footprint and containment code.
 * No scene or renderer imports.
 */

/**
 * 2D vector (x, y)
 */
export interface Vec2 {
  x: number;
  y: number;
}

/**
 * 3D vector (x, y, z)
 */
export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/**
 * Ordered boundary polygon
 * Vertex i connects to vertex (i + 1) % length; the closing edge is implicit.
 */
export type Polygon = Vec3[];

/**
 * Axis-aligned bounding box
 */
export interface BoundingBox {
  min: Vec3;
  max: Vec3;
}
