import { describe, it, expect, afterEach } from 'vitest';
import { fileURLToPath } from 'node:url';
import {
  deepMerge,
  getConfig,
  initializeConfig,
  loadConfig,
  parseConfig,
  resetConfig,
  validateConfig,
} from '../../../src/config/loader.js';

const runtimeYaml = fileURLToPath(new URL('../../../config/runtime.yaml', import.meta.url));

const baseYaml = `
name: demo
predictor:
  kind: sharded
  model_id: demo-model
server:
  host: 127.0.0.1
  port: 9000
environments:
  production:
    server:
      host: 0.0.0.0
`;

describe('deepMerge', () => {
  it('merges nested objects and replaces arrays and scalars', () => {
    expect(
      deepMerge(
        { a: { b: 1, c: [1, 2] }, d: 'x' },
        { a: { c: [3] }, d: 'y', e: true }
      )
    ).toEqual({ a: { b: 1, c: [3] }, d: 'y', e: true });
  });
});

describe('parseConfig', () => {
  it('applies the override block of the selected environment', () => {
    expect(parseConfig(baseYaml, 'production')).toEqual({
      name: 'demo',
      predictor: { kind: 'sharded', model_id: 'demo-model' },
      server: { host: '0.0.0.0', port: 9000 },
    });
  });

  it('ignores override blocks of other environments', () => {
    expect(parseConfig(baseYaml, 'development')).toEqual({
      name: 'demo',
      predictor: { kind: 'sharded', model_id: 'demo-model' },
      server: { host: '127.0.0.1', port: 9000 },
    });
  });

  it('rejects YAML that is not a mapping', () => {
    expect(() => parseConfig('- a\n- b\n')).toThrow('Configuration must be a YAML mapping');
  });
});

describe('validateConfig', () => {
  it('fills in defaults', () => {
    expect(validateConfig(parseConfig(baseYaml, 'development'))).toEqual({
      name: 'demo',
      predictor: { kind: 'sharded', model_id: 'demo-model' },
      chat_processor: null,
      prompt: { intro: '', human_id: '', bot_id: '' },
      dynamic_batching: { enabled: true, max_batch_size: 4, batch_wait_timeout_ms: 10 },
      streaming: { poll_interval_ms: 1 },
      server: {
        host: '127.0.0.1',
        port: 9000,
        route_prefix: '/',
        cors_origin: '*',
        body_limit: '1mb',
      },
      logging: { level: 'info' },
    });
  });

  it('names the offending field', () => {
    expect(() =>
      validateConfig({ name: 'demo', predictor: { kind: 'gpu', model_id: 'm' } })
    ).toThrow(
      "Validation error on field 'predictor.kind': Predictor kind must be one of: sharded, continuous, single, multimodal"
    );
  });
});

describe('loadConfig', () => {
  it('reports a missing file', () => {
    expect(() => loadConfig('/nonexistent/runtime.yaml')).toThrow(
      'Configuration file not found: /nonexistent/runtime.yaml'
    );
  });
});

describe('initializeConfig', () => {
  afterEach(() => {
    resetConfig();
  });

  it('loads the shipped runtime.yaml with the test overrides', () => {
    const config = initializeConfig(runtimeYaml, 'test');

    expect(config.name).toBe('echo-gateway');
    expect(config.predictor).toEqual({ kind: 'single', model_id: 'echo' });
    expect(config.chat_processor).toBe('ChatModelGptJ');
    expect(config.prompt.intro).toBe('Below is a conversation between a user and an assistant.\n');
    expect(config.server.port).toBe(0);
    expect(config.server.host).toBe('127.0.0.1');
    expect(config.logging.level).toBe('silent');
    expect(getConfig()).toBe(config);
  });
});
