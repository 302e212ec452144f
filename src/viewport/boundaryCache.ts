/**
 * Viewport Boundary Cache
 *
 * Memoizes footprints per layout and viewport. An entry is reused only while
 * the viewport's geometric parameters still match the ones it was built from.
 */

import type { Polygon, Vec2, Vec3 } from '../geometry/types.js';
import type { SceneAccess } from '../scene/session.js';
import { getLogger, type Logger } from '../utils/debug.js';
import { Timer } from '../utils/timing.js';
import { extractFootprint } from './footprint.js';
import type { ViewportDescriptor } from './types.js';

const POINT_TOLERANCE = 1e-10;
const SCALE_TOLERANCE = 1e-6;

/**
 * Parameters an entry depends on
 */
export interface ViewportProperties {
  centerPoint: Vec2;
  width: number;
  height: number;
  viewCenter: Vec2;
  viewTarget: Vec3;
  viewDirection: Vec3;
  twistAngle: number;
  customScale: number;
  nonRectClipOn: boolean;
  clipBoundaryRef: string | null;
}

export interface CacheEntry {
  /** Display key, `layout:id` */
  key: string;
  layoutName: string;
  viewportId: string;
  boundary: Polygon;
  createdAt: Date;
  properties: ViewportProperties;
}

export interface CacheStatistics {
  totalEntries: number;
  averagePointsPerBoundary: number;
  oldestEntryTime: Date | null;
  newestEntryTime: Date | null;
  /** Entry count per layout name */
  layoutBreakdown: Record<string, number>;
}

export interface ViewportBoundaryCacheOptions {
  logger?: Logger;
  /** Clock used for entry timestamps */
  now?: () => Date;
}

export function snapshotProperties(viewport: ViewportDescriptor): ViewportProperties {
  return {
    centerPoint: { x: viewport.centerPoint.x, y: viewport.centerPoint.y },
    width: viewport.width,
    height: viewport.height,
    viewCenter: { x: viewport.viewCenter.x, y: viewport.viewCenter.y },
    viewTarget: { ...viewport.viewTarget },
    viewDirection: { ...viewport.viewDirection },
    twistAngle: viewport.twistAngle,
    customScale: viewport.customScale,
    nonRectClipOn: viewport.nonRectClipOn,
    clipBoundaryRef: viewport.clipBoundaryRef ?? null
  };
}

function near(a: number, b: number, tolerance: number = POINT_TOLERANCE): boolean {
  return Math.abs(a - b) < tolerance;
}

function nearVec(a: Vec2 | Vec3, b: Vec2 | Vec3): boolean {
  const az = 'z' in a ? a.z : 0;
  const bz = 'z' in b ? b.z : 0;
  return near(a.x, b.x) && near(a.y, b.y) && near(az, bz);
}

export function propertiesMatch(a: ViewportProperties, b: ViewportProperties): boolean {
  return (
    nearVec(a.centerPoint, b.centerPoint) &&
    near(a.width, b.width) &&
    near(a.height, b.height) &&
    nearVec(a.viewCenter, b.viewCenter) &&
    nearVec(a.viewTarget, b.viewTarget) &&
    nearVec(a.viewDirection, b.viewDirection) &&
    near(a.twistAngle, b.twistAngle) &&
    near(a.customScale, b.customScale, SCALE_TOLERANCE) &&
    a.nonRectClipOn === b.nonRectClipOn &&
    a.clipBoundaryRef === b.clipBoundaryRef
  );
}

function formatProperties(p: ViewportProperties): string {
  return `VP[${p.width.toFixed(1)}x${p.height.toFixed(1)}, Scale=${p.customScale.toFixed(3)}, Clip=${p.nonRectClipOn}]`;
}

function formatEntry(entry: CacheEntry): string {
  return `ViewportCache[Key=${entry.key}, Points=${entry.boundary.length}, Scale=${entry.properties.customScale.toFixed(3)}]`;
}

function clonePolygon(polygon: readonly Vec3[]): Polygon {
  return polygon.map(p => ({ x: p.x, y: p.y, z: p.z }));
}

export function formatCacheStatistics(stats: CacheStatistics): string {
  const layouts = Object.entries(stats.layoutBreakdown);
  const layoutInfo = layouts.length > 0
    ? `, Layouts: ${layouts.map(([name, count]) => `${name}(${count})`).join(', ')}`
    : '';
  return `Viewport Cache Stats: ${stats.totalEntries} entries, ${stats.averagePointsPerBoundary.toFixed(1)} avg points${layoutInfo}`;
}

export class ViewportBoundaryCache {
  /** Entries by layout name, then viewport id */
  private readonly layouts = new Map<string, Map<string, CacheEntry>>();
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: ViewportBoundaryCacheOptions = {}) {
    this.logger = options.logger ?? getLogger();
    this.now = options.now ?? (() => new Date());
  }

  static keyFor(layoutName: string, viewportId: string): string {
    return `${layoutName}:${viewportId}`;
  }

  get size(): number {
    let count = 0;
    for (const entries of this.layouts.values()) {
      count += entries.size;
    }
    return count;
  }

  /**
   * Cached footprint for a viewport, computed on a miss or after its parameters changed
   *
   * Viewports without an id are computed every time. The returned polygon is
   * always a copy.
   */
  getOrCompute(viewport: ViewportDescriptor, layoutName: string, access: SceneAccess = {}): Polygon {
    if (!viewport.id) {
      this.logger.debug('Viewport has no id, computing boundary without caching');
      return extractFootprint(viewport, access);
    }

    const viewportId = viewport.id;
    const key = ViewportBoundaryCache.keyFor(layoutName, viewportId);
    const properties = snapshotProperties(viewport);
    const existing = this.layouts.get(layoutName)?.get(viewportId);

    if (existing && propertiesMatch(existing.properties, properties)) {
      this.logger.debug(`Viewport boundary cache HIT: ${formatEntry(existing)}`);
      return clonePolygon(existing.boundary);
    }

    if (existing) {
      this.logger.debug(`Viewport boundary cache INVALIDATED: ${formatEntry(existing)}`);
      this.remove(existing);
    } else {
      this.logger.debug(`Viewport boundary cache MISS: ${formatProperties(properties)}`);
    }

    const timer = new Timer('footprint');
    const boundary = extractFootprint(viewport, access);

    if (boundary.length === 0) {
      this.logger.warn(`Empty boundary for viewport ${viewportId}, not caching`);
      return boundary;
    }

    const entry: CacheEntry = {
      key,
      layoutName,
      viewportId,
      boundary: clonePolygon(boundary),
      createdAt: this.now(),
      properties
    };
    const layoutEntries = this.layouts.get(layoutName) ?? new Map<string, CacheEntry>();
    layoutEntries.set(viewportId, entry);
    this.layouts.set(layoutName, layoutEntries);
    this.logger.info(`Viewport boundary cache STORED (${timer.format()}): ${formatEntry(entry)}`);

    return boundary;
  }

  /**
   * Drop every entry of a layout (layout names compare case-insensitively)
   * @returns Number of entries removed
   */
  invalidateLayout(layoutName: string): number {
    if (!layoutName) return 0;
    const layout = layoutName.toLowerCase();
    return this.removeWhere(entry => entry.layoutName.toLowerCase() === layout);
  }

  /**
   * Drop the entry of one viewport
   * @returns Number of entries removed
   */
  invalidateViewport(layoutName: string, viewportId: string): number {
    if (!layoutName) return 0;
    const layout = layoutName.toLowerCase();
    const id = viewportId.toLowerCase();
    return this.removeWhere(
      entry => entry.layoutName.toLowerCase() === layout && entry.viewportId.toLowerCase() === id
    );
  }

  clear(): void {
    const count = this.size;
    this.layouts.clear();
    this.logger.info(`Cleared ${count} viewport boundary cache entries`);
  }

  getStatistics(): CacheStatistics {
    const entries = this.allEntries();
    const layoutBreakdown: Record<string, number> = {};
    for (const entry of entries) {
      layoutBreakdown[entry.layoutName] = (layoutBreakdown[entry.layoutName] ?? 0) + 1;
    }

    const times = entries.map(e => e.createdAt.getTime());
    const totalPoints = entries.reduce((sum, e) => sum + e.boundary.length, 0);

    return {
      totalEntries: entries.length,
      averagePointsPerBoundary: entries.length > 0 ? totalPoints / entries.length : 0,
      oldestEntryTime: times.length > 0 ? new Date(Math.min(...times)) : null,
      newestEntryTime: times.length > 0 ? new Date(Math.max(...times)) : null,
      layoutBreakdown
    };
  }

  private allEntries(): CacheEntry[] {
    return [...this.layouts.values()].flatMap(entries => [...entries.values()]);
  }

  private remove(entry: CacheEntry): void {
    const layoutEntries = this.layouts.get(entry.layoutName);
    if (!layoutEntries) return;
    layoutEntries.delete(entry.viewportId);
    if (layoutEntries.size === 0) {
      this.layouts.delete(entry.layoutName);
    }
  }

  private removeWhere(predicate: (entry: CacheEntry) => boolean): number {
    let removed = 0;
    for (const entry of this.allEntries()) {
      if (predicate(entry)) {
        this.remove(entry);
        removed++;
        this.logger.debug(`Viewport boundary cache entry invalidated: ${formatEntry(entry)}`);
      }
    }
    if (removed > 0) {
      this.logger.debug(`Invalidated ${removed} viewport boundary cache entries`);
    }
    return removed;
  }
}
