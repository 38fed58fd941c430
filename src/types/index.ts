/**
 * Main type exports for predictor-gateway
 */

export * from './predictor.js';
export * from './responses.js';
export type {
  ChatMessage,
  ContentPart,
  RequestText,
  GatewayRequestBody,
  OpenAiRequestBody,
  DeploymentConfig,
  DeploymentConfigInput,
  PromptConfig,
} from './schemas/index.js';
