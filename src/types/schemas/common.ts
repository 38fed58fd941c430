/**
 * Common Zod schema primitives for predictor-gateway
 */

import { z } from 'zod';

/**
 * Non-empty string validator
 */
export const NonEmptyString = z.string().min(1, 'Cannot be empty');

/**
 * Positive integer validator
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer');

/**
 * Predictor kind enum
 * Mirrors: src/types/predictor.ts:PredictorKind
 */
export const PredictorKindSchema = z.enum(['sharded', 'continuous', 'single', 'multimodal'], {
  errorMap: () => ({
    message: 'Predictor kind must be one of: sharded, continuous, single, multimodal',
  }),
});

/**
 * Log level enum (pino levels)
 */
export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'], {
  errorMap: () => ({
    message: 'Log level must be one of: trace, debug, info, warn, error, fatal, silent',
  }),
});
