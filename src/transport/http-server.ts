/**
 * HTTP Server
 *
 * Express app in front of one PredictorDeployment:
 * - POST <routePrefix>         plain protocol, JSON or chunked text/plain
 * - POST <routePrefix>/openai  OpenAI-compatible path, JSON or NDJSON
 * - GET  /health
 *
 * Route handlers are created against the small RequestSource/ResponseSink
 * surface so they can be driven without sockets.
 */

import express, { type Application, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Logger } from 'pino';
import { GatewayError, toGatewayError, zodErrorToGatewayError } from '../api/errors.js';
import type { PredictorDeployment } from '../api/predictor-deployment.js';
import { OpenAiRequestSchema } from '../types/schemas/request.js';
import type { DeploymentConfig, ErrorBody, ModelResponse } from '../types/index.js';

/**
 * The part of an incoming request the handlers read.
 */
export interface RequestSource {
  body: unknown;
}

/**
 * The part of an outgoing response the handlers write.
 */
export interface ResponseSink {
  readonly writableEnded: boolean;
  status(code: number): ResponseSink;
  json(body: unknown): unknown;
  setHeader(name: string, value: string): unknown;
  write(chunk: string): boolean;
  end(): unknown;
  on(event: 'close', listener: () => void): unknown;
  once(event: 'drain' | 'close', listener: () => void): unknown;
  off(event: 'drain' | 'close', listener: () => void): unknown;
}

export type RouteHandler = (req: RequestSource, res: ResponseSink) => Promise<void>;

export interface HttpServerOptions {
  host?: string;
  port?: number;
  routePrefix?: string;
  corsOrigin?: string;
  bodyLimit?: string;
  logger?: Logger;
}

/**
 * Join the route prefix and a sub-path without doubling slashes.
 */
export function joinRoute(prefix: string, path = ''): string {
  const base = prefix.endsWith('/') ? prefix.slice(0, -1) : prefix;
  if (path.length === 0) {
    return base.length === 0 ? '/' : base;
  }
  return `${base}/${path.replace(/^\/+/, '')}`;
}

function sendError(res: ResponseSink, error: GatewayError): void {
  const body: ErrorBody = { error: error.code, message: error.message };
  res.status(error.httpStatus).json(body);
}

/**
 * Abort controller tied to the client connection: closing the response
 * before it ended aborts.
 */
function connectionSignal(res: ResponseSink): AbortController {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller;
}

/**
 * Resolves on `drain`, or on `close` when the client is gone.
 */
function waitForDrain(res: ResponseSink): Promise<void> {
  return new Promise<void>((resolve) => {
    const onDone = (): void => {
      res.off('drain', onDone);
      res.off('close', onDone);
      resolve();
    };
    res.once('drain', onDone);
    res.once('close', onDone);
  });
}

/**
 * Write one chunk; when the socket buffer is full, wait for it to drain
 * before the next token is pulled.
 */
async function writeChunk(res: ResponseSink, chunk: string, logger?: Logger): Promise<void> {
  if (res.write(chunk)) {
    return;
  }
  logger?.debug('Backpressure detected, waiting for drain');
  await waitForDrain(res);
}

/**
 * Plain protocol: the raw body goes to the deployment untouched so JSON
 * errors are reported by the deployment itself.
 */
export function createGenerateHandler(deployment: PredictorDeployment, logger?: Logger): RouteHandler {
  return async (req, res) => {
    const rawBody = typeof req.body === 'string' ? req.body : '';
    const controller = connectionSignal(res);
    const response = await deployment.call(rawBody, { signal: controller.signal });

    if (response.type === 'json') {
      res.status(response.status).json(response.body);
      return;
    }

    res.status(response.status);
    res.setHeader('Content-Type', `${response.contentType}; charset=utf-8`);

    let chunks = 0;
    try {
      for await (const chunk of response.body) {
        if (controller.signal.aborted) {
          break;
        }
        await writeChunk(res, chunk, logger);
        chunks += 1;
      }
    } finally {
      if (controller.signal.aborted) {
        logger?.info({ chunks }, 'Client disconnected from stream');
      }
      if (!res.writableEnded) {
        res.end();
      }
    }
  };
}

/**
 * OpenAI-compatible path. Errors raised before the first envelope become a
 * JSON error; once streaming started the NDJSON stream simply ends.
 */
export function createOpenAiHandler(deployment: PredictorDeployment, logger?: Logger): RouteHandler {
  return async (req, res) => {
    const parsed = OpenAiRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      sendError(res, zodErrorToGatewayError(parsed.error));
      return;
    }

    const { messages, prompt, stream = false, config = {} } = parsed.data;
    const input = messages ?? prompt;
    if (input === undefined) {
      sendError(res, new GatewayError('EmptyPrompt', 'Empty prompt is not supported.'));
      return;
    }

    const controller = connectionSignal(res);
    const envelopes = deployment.openaiCall(input, config, stream, { signal: controller.signal });

    let first: IteratorResult<ModelResponse, void>;
    try {
      first = await envelopes.next();
    } catch (error) {
      sendError(res, toGatewayError(error, 'BackendGenerationFailure'));
      return;
    }

    if (first.done) {
      sendError(res, new GatewayError('BackendGenerationFailure', 'Predictor returned no result'));
      return;
    }

    if (!stream) {
      res.status(200).json(first.value);
      return;
    }

    res.status(200);
    res.setHeader('Content-Type', 'application/x-ndjson');
    try {
      await writeChunk(res, `${JSON.stringify(first.value)}\n`, logger);
      for (;;) {
        if (controller.signal.aborted) {
          await envelopes.return(undefined);
          logger?.info('Client disconnected from stream');
          break;
        }
        const step = await envelopes.next();
        if (step.done) {
          break;
        }
        await writeChunk(res, `${JSON.stringify(step.value)}\n`, logger);
      }
    } finally {
      if (!res.writableEnded) {
        res.end();
      }
    }
  };
}

export function createHealthHandler(deployment: PredictorDeployment): RouteHandler {
  return async (_req, res) => {
    res.status(200).json({
      status: 'ok',
      deployment: deployment.name,
      kind: deployment.kind,
      timestamp: Date.now(),
    });
  };
}

function isBodyParseError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

/**
 * HTTP server
 *
 * @example
 * ```typescript
 * const server = GatewayHttpServer.fromConfig(config, deployment, logger);
 * const address = await server.start();
 * ```
 */
export class GatewayHttpServer {
  public readonly app: Application;
  private server?: Server;
  private readonly deployment: PredictorDeployment;
  private readonly options: Required<Omit<HttpServerOptions, 'logger'>>;
  private readonly logger?: Logger;

  constructor(deployment: PredictorDeployment, options: HttpServerOptions = {}) {
    this.deployment = deployment;
    this.logger = options.logger?.child({ component: 'GatewayHttpServer' });
    this.options = {
      host: options.host ?? '127.0.0.1',
      port: options.port ?? 8000,
      routePrefix: options.routePrefix ?? '/',
      corsOrigin: options.corsOrigin ?? '*',
      bodyLimit: options.bodyLimit ?? '1mb',
    };

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  public static fromConfig(
    config: DeploymentConfig,
    deployment: PredictorDeployment,
    logger?: Logger
  ): GatewayHttpServer {
    return new GatewayHttpServer(deployment, {
      host: config.server.host,
      port: config.server.port,
      routePrefix: config.server.route_prefix,
      corsOrigin: config.server.cors_origin,
      bodyLimit: config.server.body_limit,
      logger,
    });
  }

  private setupMiddleware(): void {
    this.app.use(
      cors({
        origin: this.options.corsOrigin,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization'],
      })
    );

    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.logger?.debug({ method: req.method, path: req.path }, 'HTTP request');
      next();
    });
  }

  private setupRoutes(): void {
    const { routePrefix, bodyLimit } = this.options;
    const logger = this.logger;

    this.app.get('/health', this.wrap(createHealthHandler(this.deployment)));

    this.app.post(
      joinRoute(routePrefix, 'openai'),
      express.json({ limit: bodyLimit }),
      this.wrap(createOpenAiHandler(this.deployment, logger))
    );

    // Any content type: the deployment reports malformed JSON itself.
    this.app.post(
      joinRoute(routePrefix),
      express.text({ type: '*/*', limit: bodyLimit }),
      this.wrap(createGenerateHandler(this.deployment, logger))
    );
  }

  private setupErrorHandling(): void {
    this.app.use((req: Request, res: Response) => {
      res.status(404).json({
        error: 'NotFound',
        message: `Route ${req.method} ${req.path} not found`,
      });
    });

    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      const error = isBodyParseError(err)
        ? new GatewayError('InvalidJson', 'Invalid JSON format from http request.')
        : toGatewayError(err, 'BackendGenerationFailure');

      this.logger?.error({ method: req.method, path: req.path, code: error.code }, error.message);

      if (res.headersSent) {
        res.end();
        return;
      }
      sendError(res, error);
    });
  }

  private wrap(handler: RouteHandler) {
    return (req: Request, res: Response, next: NextFunction): void => {
      handler(req, res).catch(next);
    };
  }

  /**
   * Start listening; resolves with the bound address.
   */
  public async start(): Promise<AddressInfo> {
    const { host, port, routePrefix } = this.options;

    return new Promise<AddressInfo>((resolve, reject) => {
      const server = this.app.listen(port, host, () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('HTTP server did not bind to a TCP address'));
          return;
        }
        this.logger?.info(
          {
            host: address.address,
            port: address.port,
            endpoints: [joinRoute(routePrefix), joinRoute(routePrefix, 'openai'), '/health'],
          },
          'HTTP server listening'
        );
        resolve(address);
      });

      server.on('error', (error) => {
        this.logger?.error({ error: error.message }, 'HTTP server error');
        reject(error);
      });

      this.server = server;
    });
  }

  public async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = undefined;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
    this.logger?.info('HTTP server stopped');
  }
}
