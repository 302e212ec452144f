/**
 * Viewport footprint engine
 */

export * from './geometry/index.js';
export * from './errors.js';
export { loadConfig, getConfig, resetConfig, DEFAULT_CONTAINMENT_TOLERANCE } from './config.js';
export type { LogLevel, ViewportEngineConfig } from './config.js';
export { createConsoleLogger, silentLogger, getLogger, setLogger } from './utils/debug.js';
export type { Logger } from './utils/debug.js';
export type { Matrix4x4 } from './utils/matrix.js';
export * from './scene/types.js';
export { withReadSession } from './scene/session.js';
export type { SceneAccess } from './scene/session.js';
export * from './viewport/types.js';
export * from './viewport/transformBuilder.js';
export * from './viewport/clipBoundary.js';
export * from './viewport/footprint.js';
export * from './viewport/queries.js';
export * from './viewport/boundaryCache.js';
export * from './viewport/diagnostics.js';
export * from './render/footprintSvg.js';
