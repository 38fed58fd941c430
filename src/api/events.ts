/**
 * Deployment Event System
 *
 * Defines event types and payloads for the PredictorDeployment class.
 */

import type { DynamicBatchDispatchEvent } from '../core/dynamic-batch-accumulator.js';
import type { GatewayErrorShape } from './errors.js';

/**
 * Event payload when a dynamic batch window has been generated
 */
export interface BatchDispatchedEvent extends DynamicBatchDispatchEvent {
  deployment: string;
  timestamp: number;
}

/**
 * Event payload when a streaming response ended because the backend failed
 */
export interface StreamTruncatedEvent {
  deployment: string;
  tokensSent: number;
  error: GatewayErrorShape;
  timestamp: number;
}

/**
 * Event payload when a request is answered with an error
 */
export interface RequestRejectedEvent {
  deployment: string;
  status: number;
  error: GatewayErrorShape;
  timestamp: number;
}

/**
 * PredictorDeployment event map
 */
export interface DeploymentEvents {
  'batch:dispatched': (event: BatchDispatchedEvent) => void;
  'stream:truncated': (event: StreamTruncatedEvent) => void;
  'request:rejected': (event: RequestRejectedEvent) => void;
}
