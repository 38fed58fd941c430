/**
 * End-to-end dispatch scenarios through PredictorDeployment, with an
 * in-process recording predictor standing in for the backend.
 */

import { describe, it, expect } from 'vitest';
import { echoResult } from '../../src/adapters/echo-predictor.js';
import { PredictorDeployment } from '../../src/api/predictor-deployment.js';
import { DynamicBatchAccumulator } from '../../src/core/dynamic-batch-accumulator.js';
import { preprocessPrompts } from '../../src/core/prompt-normalizer.js';
import { pollTokens } from '../../src/core/stream-multiplexer.js';
import type { DeploymentResponse, GenerationConfig, ModelResponse } from '../../src/types/index.js';
import { RecordingPredictor, ScriptedTokenSource, collect } from '../helpers/fake-predictors.js';

function deploy(predictor: RecordingPredictor): PredictorDeployment {
  return new PredictorDeployment({
    predictor,
    name: 'scenarios',
    dynamicBatching: { maxBatchSize: 4, batchWaitTimeoutMs: 5 },
  });
}

function envelopes(response: DeploymentResponse): ModelResponse[] {
  if (response.type !== 'json' || !Array.isArray(response.body)) {
    throw new Error('expected a JSON array body');
  }
  return response.body.filter(
    (item): item is ModelResponse => typeof item === 'object' && item !== null && 'generated_text' in item
  );
}

function sleep(ms: number): Promise<void> {
  return new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
}

describe('dispatch scenarios', () => {
  it('answers a single prompt with one non-empty envelope', async () => {
    const response = await deploy(new RecordingPredictor()).call(
      JSON.stringify({ text: 'Hello', stream: false })
    );

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ generated_text: 'Hello', num_input_tokens: 1 });
  });

  it('answers a static pair with two envelopes in input order', async () => {
    const predictor = new RecordingPredictor();

    const response = await deploy(predictor).call(JSON.stringify({ text: ['p1', 'p2'], stream: false }));

    expect(envelopes(response).map((envelope) => envelope.generated_text)).toEqual(['p1', 'p2']);
    expect(predictor.generateCalls).toHaveLength(1);
  });

  it('rejects streaming with several prompts before any backend work', async () => {
    const predictor = new RecordingPredictor();

    const response = await deploy(predictor).call(JSON.stringify({ text: ['p1', 'p2'], stream: true }));

    expect(response).toEqual({
      type: 'json',
      status: 400,
      body: {
        error: 'StreamingWithMultiplePromptsUnsupported',
        message: 'Streaming response is not supported when multiple prompts are provided.',
      },
    });
    expect(predictor.streamCalls).toHaveLength(0);
  });

  it('combines two concurrent single prompts with one config into one backend call', async () => {
    const predictor = new RecordingPredictor();
    const deployment = deploy(predictor);
    const config = { temperature: 0.2, top_p: 0.9 };

    const [first, second] = await Promise.all([
      deployment.call(JSON.stringify({ text: 'left prompt', config })),
      deployment.call(JSON.stringify({ text: 'right', config: { top_p: 0.9, temperature: 0.2 } })),
    ]);

    expect(predictor.generateCalls).toEqual([{ prompts: ['left prompt', 'right'], config }]);
    expect(first.body).toMatchObject({ generated_text: 'left prompt', num_input_tokens: 2 });
    expect(second.body).toMatchObject({ generated_text: 'right', num_input_tokens: 1 });
  });

  it('emits a token exactly once after three "not ready" polls', async () => {
    const source = new ScriptedTokenSource(['token'], 3);

    await expect(collect(pollTokens(source))).resolves.toEqual(['token']);
    expect(source.polls).toBe(5);
  });
});

describe('dispatch properties', () => {
  it('static output has one result per prompt, each derived from its own prompt', async () => {
    const lists = [['a'], ['a b', 'c'], ['one', 'two two', 'three three three', 'four', 'five']];

    for (const prompts of lists) {
      const response = await deploy(new RecordingPredictor()).call(JSON.stringify({ text: prompts }));
      const output = envelopes(response);

      expect(output).toHaveLength(prompts.length);
      output.forEach((envelope, index) => {
        expect(envelope.generated_text).toBe(echoResult(prompts[index] ?? '', {}).text);
      });
    }
  });

  it('scatters results back by position whatever order the groups finish in', async () => {
    const delayOf = (config: GenerationConfig): number =>
      typeof config.delay === 'number' ? config.delay : 0;
    const accumulator = new DynamicBatchAccumulator(
      {
        generateAsync: async (prompts, config) => {
          await sleep(delayOf(config));
          return prompts.map((prompt) => echoResult(prompt, config));
        },
      },
      { maxBatchSize: 4, batchWaitTimeoutMs: 5 }
    );

    const results = await Promise.all([
      accumulator.submit('slow one', { delay: 20 }),
      accumulator.submit('fast', { delay: 1 }),
      accumulator.submit('slow two words', { delay: 20 }),
      accumulator.submit('fast again', { delay: 1 }),
    ]);

    expect(results.map((result) => result.text)).toEqual([
      'slow one',
      'fast',
      'slow two words',
      'fast again',
    ]);
  });

  it('streamed tokens concatenate to the non-streamed text for the same config', async () => {
    const deployment = deploy(new RecordingPredictor());
    const text = 'streams must match whole responses';
    const config = { temperature: 0.5 };

    const whole = await deployment.call(JSON.stringify({ text: [text], config }));
    const streamed = await deployment.call(JSON.stringify({ text, config, stream: true }));
    if (streamed.type !== 'stream') {
      throw new Error('expected a stream');
    }

    const chunks = await collect(streamed.body);
    expect(chunks.join('')).toBe(envelopes(whole)[0]?.generated_text);
  });

  it('normalizing a flat prompt list twice returns the same list', () => {
    const prompts = ['User: hi\nBot:', 'plain'];

    const once = preprocessPrompts(prompts, { returnList: false });
    const twice = once.ok ? preprocessPrompts(once.val, { returnList: false }) : once;

    expect(twice.ok && twice.val).toEqual(prompts);
  });
});
