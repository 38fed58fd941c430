/**
 * Gateway error utilities.
 *
 * Provides a consistent error type for every public surface and helpers to
 * convert lower-level failures (predictor exceptions, Zod issues) into
 * GatewayError instances that the transport can map to HTTP statuses.
 */

import type { ZodError } from 'zod';

/**
 * Gateway error codes surfaced to API consumers.
 *
 * Request-shape codes are detected before any predictor call and map to 400.
 * `ChatProcessorNotFound` is raised at deployment construction and aborts
 * startup. `BackendGenerationFailure` wraps anything the predictor reports.
 */
export type GatewayErrorCode =
  | 'InvalidJson'
  | 'EmptyPrompt'
  | 'InvalidPromptFormat'
  | 'StreamingWithMultiplePromptsUnsupported'
  | 'ValidationError'
  | 'ChatProcessorNotFound'
  | 'BackendGenerationFailure';

const HTTP_STATUS: Readonly<Record<GatewayErrorCode, number>> = {
  InvalidJson: 400,
  EmptyPrompt: 400,
  InvalidPromptFormat: 400,
  StreamingWithMultiplePromptsUnsupported: 400,
  ValidationError: 400,
  ChatProcessorNotFound: 500,
  BackendGenerationFailure: 500,
};

/**
 * Plain-object form of a gateway error (for JSON responses and events).
 */
export interface GatewayErrorShape {
  code: GatewayErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Error implementation returned by the gateway.
 */
export class GatewayError extends Error implements GatewayErrorShape {
  public readonly code: GatewayErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: GatewayErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GatewayError';
    this.code = code;
    this.details = details;
  }

  /**
   * HTTP status the transport should answer with.
   */
  public get httpStatus(): number {
    return HTTP_STATUS[this.code];
  }

  /**
   * True for errors caused by the shape of the caller's request.
   */
  public get isRequestError(): boolean {
    return this.httpStatus === 400;
  }

  /**
   * Serialize error into plain shape (for JSON responses/telemetry).
   */
  public toObject(): GatewayErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Map unknown errors into GatewayError instances.
 *
 * @param error - Error thrown by a predictor or helper
 * @param fallbackCode - Code to use when the error is not already a GatewayError
 */
export function toGatewayError(
  error: unknown,
  fallbackCode: GatewayErrorCode = 'BackendGenerationFailure'
): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }

  if (error instanceof Error) {
    return new GatewayError(fallbackCode, error.message, { cause: error.name });
  }

  return new GatewayError(fallbackCode, `Unknown error: ${String(error)}`);
}

/**
 * Convert a Zod validation error to a GatewayError
 *
 * @example
 * ```typescript
 * const result = GatewayRequestSchema.safeParse({ stream: 'yes' });
 * if (!result.success) {
 *   throw zodErrorToGatewayError(result.error);
 * }
 * // Throws: "Validation error on field 'stream': stream must be a boolean"
 * ```
 */
export function zodErrorToGatewayError(error: ZodError): GatewayError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'Invalid value'}`;

  return new GatewayError('ValidationError', message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
