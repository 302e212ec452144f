/**
 * Engine configuration
 *
 * Resolved from environment variables once per process:
 * - VIEWPORT_LOG_LEVEL: debug | info | warn | error | silent
 * - VIEWPORT_CONTAINMENT_TOLERANCE: probe offset used by tolerant containment tests
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface ViewportEngineConfig {
  readonly logLevel: LogLevel;
  /** Default tolerance for isInsideWithTolerance and isPointInViewport */
  readonly containmentTolerance: number;
}

export const DEFAULT_CONTAINMENT_TOLERANCE = 1e-9;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function resolveLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const fallback: LogLevel = env.NODE_ENV === 'production' ? 'info' : env.NODE_ENV === 'test' ? 'warn' : 'debug';
  const raw = env.VIEWPORT_LOG_LEVEL?.trim().toLowerCase();
  if (!raw) return fallback;

  if (!isLogLevel(raw)) {
    console.warn(`[WARN] Ignoring VIEWPORT_LOG_LEVEL="${raw}", using "${fallback}"`);
    return fallback;
  }
  return raw;
}

function resolveTolerance(env: NodeJS.ProcessEnv): number {
  const raw = env.VIEWPORT_CONTAINMENT_TOLERANCE?.trim();
  if (!raw) return DEFAULT_CONTAINMENT_TOLERANCE;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    console.warn(
      `[WARN] Ignoring VIEWPORT_CONTAINMENT_TOLERANCE="${raw}", using ${DEFAULT_CONTAINMENT_TOLERANCE}`
    );
    return DEFAULT_CONTAINMENT_TOLERANCE;
  }
  return value;
}

/**
 * Build a configuration from an environment map
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ViewportEngineConfig {
  return Object.freeze({
    logLevel: resolveLogLevel(env),
    containmentTolerance: resolveTolerance(env)
  });
}

let cachedConfig: ViewportEngineConfig | null = null;

export function getConfig(): ViewportEngineConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Drop the memoized configuration so the next getConfig() re-reads the environment
 */
export function resetConfig(): void {
  cachedConfig = null;
}
