import { serve } from '@hono/node-server';
import { WebStandardStreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/webStandardStreamableHttp.js';
import { Hono } from 'hono';
import type { AppConfig } from '../config.js';
import { describeError, Logger } from '../core/logger.js';
import type { HarvestService } from '../harvest-service.js';
import { createHarvestMcpServer } from '../mcp/create-harvest-mcp-server.js';
import { checkAccess, withCors } from './access.js';

const INTERNAL_ERROR = {
  jsonrpc: '2.0',
  error: { code: -32603, message: 'Internal server error' },
  id: null
};

/**
 * Stateless streamable-HTTP endpoint: each request gets its own MCP server and transport, both
 * closed once the response is produced. Tool calls still share the service's single-slot queue.
 */
export const createHttpApp = (config: AppConfig, service: HarvestService, logger: Logger): Hono => {
  const app = new Hono();

  app.onError((error, c) => {
    logger.error('Unhandled HTTP runtime error', { error: describeError(error) });
    return c.json(INTERNAL_ERROR, 500);
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.get('/', (c) =>
    c.json({
      name: config.serverName,
      version: config.serverVersion,
      transport: 'streamable-http',
      endpoint: config.endpointPath,
      health: config.healthPath
    })
  );

  app.get(config.healthPath, (c) =>
    c.json({
      status: 'ok',
      uptimeSeconds: Math.round(process.uptime()),
      serverName: config.serverName,
      serverVersion: config.serverVersion,
      transport: 'http',
      sources: service.sourceNames,
      timestamp: new Date().toISOString()
    })
  );

  app.use(config.endpointPath, async (c, next) => {
    const origin = c.req.header('origin');
    const denial = checkAccess(
      {
        host: c.req.header('host'),
        origin,
        authorization: c.req.header('authorization'),
        preflight: c.req.method === 'OPTIONS'
      },
      config
    );

    if (denial) {
      logger.debug('HTTP request refused', { status: denial.status, reason: denial.error });
      return withCors(c.json({ error: denial.error }, denial.status), origin);
    }
    await next();
  });

  app.options(config.endpointPath, (c) => withCors(new Response(null, { status: 204 }), c.req.header('origin')));

  app.all(config.endpointPath, async (c) => {
    const origin = c.req.header('origin');
    const transport = new WebStandardStreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true
    });
    const server = createHarvestMcpServer(config, service, logger);

    try {
      await server.connect(transport);
      return withCors(await transport.handleRequest(c.req.raw), origin);
    } catch (error) {
      logger.error('MCP HTTP request handling failed', { error: describeError(error) });
      return withCors(Response.json(INTERNAL_ERROR, { status: 500 }), origin);
    } finally {
      await server.close().catch((error: unknown) => {
        logger.debug('MCP server close failed', { error: describeError(error) });
      });
    }
  });

  return app;
};

export const startHttpServer = (config: AppConfig, service: HarvestService, logger: Logger) => {
  const server = serve(
    {
      fetch: createHttpApp(config, service, logger).fetch,
      port: config.port,
      hostname: config.host
    },
    (info) => {
      logger.info('paper-harvest HTTP transport listening', {
        host: config.host,
        port: info.port,
        endpoint: config.endpointPath,
        health: config.healthPath
      });
    }
  );

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info('Shutting down HTTP transport', { signal });
      server.close();
    });
  }

  return server;
};
