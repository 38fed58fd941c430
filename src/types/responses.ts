/**
 * Externally visible response units
 */

/**
 * Uniform response unit shared by the plain and OpenAI-compatible call
 * paths. Streaming emits one of these per token.
 */
export interface ModelResponse {
  generated_text: string;
  num_input_tokens: number;
  num_input_tokens_batch: number;
  num_generated_tokens: number;
  /** Always 0: preprocessing time is tracked but not computed. */
  preprocessing_time: number;
}

/**
 * Transport-neutral result of handling one plain-protocol request.
 */
export type DeploymentResponse =
  | {
      type: 'json';
      status: number;
      body: unknown;
    }
  | {
      type: 'stream';
      status: 200;
      contentType: 'text/plain';
      body: AsyncIterable<string>;
    };

/**
 * Shape of every error body returned to clients.
 */
export interface ErrorBody {
  error: string;
  message: string;
}
