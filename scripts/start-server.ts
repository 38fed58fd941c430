#!/usr/bin/env tsx
/**
 * Gateway Server Startup Script
 *
 * Starts the HTTP gateway in front of an in-process echo predictor of the
 * configured kind.
 *
 * Usage:
 *   tsx scripts/start-server.ts [--config path/to/runtime.yaml] [--port <port>]
 */

import * as path from 'node:path';
import { createEchoPredictor } from '../src/adapters/echo-predictor.js';
import { PredictorDeployment } from '../src/api/predictor-deployment.js';
import { initializeConfig } from '../src/config/loader.js';
import { GatewayHttpServer } from '../src/transport/http-server.js';
import { createLogger } from '../src/utils/logger.js';

interface StartServerOptions {
  configPath?: string;
  port?: number;
}

/**
 * Parse command-line arguments
 */
function parseArgs(): StartServerOptions {
  const args = process.argv.slice(2);
  const options: StartServerOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--help':
      case '-h':
        printHelp();
        process.exit(0);
        break;

      case '--config':
      case '-c': {
        const value = args[++i];
        if (value === undefined) {
          console.error('Error: --config requires a path argument');
          process.exit(1);
        }
        options.configPath = path.resolve(value);
        break;
      }

      case '--port':
      case '-p': {
        const port = Number(args[++i]);
        if (!Number.isInteger(port) || port < 0 || port > 65535) {
          console.error('Error: --port requires a port number');
          process.exit(1);
        }
        options.port = port;
        break;
      }

      default:
        console.error(`Error: Unknown option: ${arg}`);
        printHelp();
        process.exit(1);
    }
  }

  return options;
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
Gateway Server Startup Script

Usage:
  tsx scripts/start-server.ts [options]

Options:
  --config, -c <path>   Path to runtime configuration (default: config/runtime.yaml)
  --port, -p <port>     Override server.port
  --help, -h            Show this help message

Environment Variables:
  NODE_ENV                      Selects the environments.<env> override block
  PREDICTOR_GATEWAY_LOG_LEVEL   Log level when the config does not set one
`);
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const options = parseArgs();
  const config = initializeConfig(options.configPath);
  if (options.port !== undefined) {
    config.server.port = options.port;
  }

  const logger = createLogger({ level: config.logging.level, bindings: { deployment: config.name } });
  const predictor = createEchoPredictor(config.predictor.kind);
  const deployment = PredictorDeployment.fromConfig(config, predictor, logger);
  const server = GatewayHttpServer.fromConfig(config, deployment, logger);

  await server.start();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    try {
      await deployment.flush();
      deployment.close();
      await server.stop();
      process.exit(0);
    } catch (error) {
      logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}

main().catch((error: unknown) => {
  console.error('Startup failed:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
