/**
 * Zod schema exports for predictor-gateway
 *
 * @example
 * ```typescript
 * import { GatewayRequestSchema } from 'predictor-gateway';
 *
 * const result = GatewayRequestSchema.safeParse({ text: 'Hello' });
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Request schemas
export * from './request.js';

// Config schemas
export * from './config.js';
