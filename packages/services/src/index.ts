import { assertNever, describeFault, isRouteFault } from '@isoroute/core';
import type { RouteFault } from '@isoroute/core';
import { describeIssues } from '@isoroute/data';
import Fastify from 'fastify';
import type { FastifyError, FastifyInstance } from 'fastify';
import { ZodError } from 'zod';

import { loadServiceConfig } from './config.js';
import type { ServiceConfig } from './config.js';
import { registerRoutes } from './routes.js';

export { loadServiceConfig } from './config.js';
export type { ReadTextFile, ServiceConfig } from './config.js';
export type { RouteQuery } from './routes.js';

export interface ServerOptions {
  config?: ServiceConfig;
  // Defaults to a pino logger at the configured level
  logger?: boolean;
}

function faultStatus(fault: RouteFault): number {
  switch (fault.kind) {
    case 'configuration':
      return 400;
    case 'boundary':
      return 422;
    default:
      return assertNever(fault);
  }
}

function handleErrors(app: FastifyInstance): void {
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send({ error: 'Invalid request', detail: describeIssues(error) });
    }
    if (isRouteFault(error)) {
      return reply.status(faultStatus(error.fault)).send({ error: describeFault(error.fault), fault: error.fault });
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: error.message });
    }
    request.log.error({ err: error }, 'unhandled error');
    return reply.status(500).send({ error: 'Internal Server Error' });
  });
}

export function createServer(options: ServerOptions = {}) {
  const config = options.config ?? loadServiceConfig();
  const app = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel }
  });

  handleErrors(app);
  registerRoutes(app, config);
  return app;
}

export async function startServer(env: Record<string, string | undefined> = process.env) {
  let config: ServiceConfig;
  try {
    config = loadServiceConfig(env);
  } catch (error) {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
  }

  const app = createServer({ config });
  try {
    await app.listen({ port: config.port, host: config.host });
    return app;
  } catch (error) {
    app.log.error(error);
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  void startServer();
}
