/**
 * Error types
 *
 * Every failure surfaced by the engine is one of three kinds:
 * - InvalidArgumentError: caller passed something unusable (fail fast)
 * - UnsupportedGeometryError: clip entity shape we cannot read (log and skip)
 * - TransformFailureError: anything else while reading clip data or mapping points
 */

export type ViewportErrorCode = 'INVALID_ARGUMENT' | 'UNSUPPORTED_GEOMETRY' | 'TRANSFORM_FAILURE';

export abstract class ViewportGeometryError extends Error {
  abstract readonly code: ViewportErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends ViewportGeometryError {
  readonly code = 'INVALID_ARGUMENT' as const;

  /**
   * @param parameter - Name of the offending parameter
   */
  constructor(readonly parameter: string, message: string) {
    super(`${message} (parameter: ${parameter})`);
  }
}

export class UnsupportedGeometryError extends ViewportGeometryError {
  readonly code = 'UNSUPPORTED_GEOMETRY' as const;

  /**
   * @param shape - Type name of the clip entity that was encountered
   */
  constructor(readonly shape: string) {
    super(
      `Unsupported clip entity type: ${shape}. Only polyline, polyline2d and polyline3d are supported.`
    );
  }
}

export class TransformFailureError extends ViewportGeometryError {
  readonly code = 'TRANSFORM_FAILURE' as const;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

/**
 * Describe an unknown thrown value for log and error messages
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
