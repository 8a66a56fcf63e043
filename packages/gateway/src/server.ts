/**
 * @fileoverview HTTP surface of the operator: resource API, SSE streams and health
 */

import type { IncomingMessage, Server as HttpServer, ServerResponse } from 'http';
import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyError, FastifyInstance, FastifyReply } from 'fastify';
import {
  CreatePoolRequestSchema,
  CreateServerRequestSchema,
  UpdatePoolRequestSchema,
  UpdateServerRequestSchema,
  isFleetError,
  parseOrThrow
} from '@mcpfleet/core';
import type { BridgeEvent } from '@mcpfleet/core';
import type { ServerController } from '@mcpfleet/controller';
import { Environment, HealthMonitor, HealthStatus, Logger } from '@mcpfleet/shared';
import type { GatewayConfigType } from '@mcpfleet/shared';
import { encodeComment, encodeEvent } from './bridge/sse';
import type { SessionSink, TransportBridge } from './bridge/transport-bridge';

type App = FastifyInstance<HttpServer, IncomingMessage, ServerResponse, FastifyBaseLogger>;

interface NameParams {
  name: string;
}

const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no'
} as const;

/**
 * Writes session events to a hijacked reply. Headers go out with the first
 * event so that failures before it still get a JSON error response.
 */
class ReplySink implements SessionSink {
  private started = false;

  constructor(private readonly reply: FastifyReply) {}

  send(event: BridgeEvent): void {
    this.write(encodeEvent(event));
  }

  comment(text: string): void {
    this.write(encodeComment(text));
  }

  close(): void {
    this.start();
    if (!this.reply.raw.writableEnded) {
      this.reply.raw.end();
    }
  }

  private start(): void {
    if (this.started) return;
    this.started = true;
    this.reply.hijack();
    this.reply.raw.writeHead(200, SSE_HEADERS);
  }

  private write(chunk: string): void {
    this.start();
    if (!this.reply.raw.writableEnded) {
      this.reply.raw.write(chunk);
    }
  }
}

export interface GatewayServerOptions {
  readonly controller: ServerController;
  readonly bridge: TransportBridge;
  readonly config: GatewayConfigType;
  readonly logger: Logger;
}

export class GatewayServer {
  private readonly app: App;
  private readonly controller: ServerController;
  private readonly bridge: TransportBridge;
  private readonly config: GatewayConfigType;
  private readonly logger: Logger;
  private readonly health: HealthMonitor;

  constructor(options: GatewayServerOptions) {
    this.controller = options.controller;
    this.bridge = options.bridge;
    this.config = options.config;
    this.logger = options.logger.child({ component: 'gateway' });
    this.health = new HealthMonitor('mcpfleet-gateway', this.logger);

    this.app = Fastify<HttpServer, IncomingMessage, ServerResponse, FastifyBaseLogger>({
      logger: options.logger.pino(),
      disableRequestLogging: options.config.environment === Environment.TEST
    });

    this.registerHealthChecks();
    this.setupRoutes();
    this.setupErrorHandlers();
  }

  private registerHealthChecks(): void {
    this.health.registerCheck({ name: 'store', timeout: 5000, critical: true }, async () => {
      const pools = await this.controller.listPools();
      return { status: HealthStatus.HEALTHY, details: { pools: pools.length } };
    });
    this.health.registerCheck({ name: 'sessions', timeout: 1000, critical: false }, async () => ({
      status: HealthStatus.HEALTHY,
      details: { sessions: this.bridge.sessionCount }
    }));
  }

  private setupRoutes(): void {
    this.app.get('/health', async (_request, reply) => {
      const report = await this.health.report();
      reply.status(report.status === HealthStatus.UNHEALTHY ? 503 : 200);
      return {
        status: report.status,
        uptime: report.uptime,
        sessions: this.bridge.sessionCount,
        checks: report.checks
      };
    });

    // Pools
    this.app.get('/api/v1/pools', async () => ({ pools: await this.controller.listPools() }));

    this.app.post('/api/v1/pools', async (request, reply) => {
      const body = parseOrThrow(CreatePoolRequestSchema, request.body, 'pool request');
      const pool = await this.controller.createPool(body.name, body.spec);
      reply.status(201);
      return pool;
    });

    this.app.get<{ Params: NameParams }>('/api/v1/pools/:name', async request =>
      this.controller.getPool(request.params.name)
    );

    this.app.put<{ Params: NameParams }>('/api/v1/pools/:name', async request => {
      const body = parseOrThrow(UpdatePoolRequestSchema, request.body, 'pool request');
      return this.controller.updatePool(request.params.name, body.spec);
    });

    this.app.delete<{ Params: NameParams }>('/api/v1/pools/:name', async (request, reply) => {
      await this.controller.deletePool(request.params.name);
      reply.status(204);
    });

    // Servers
    this.app.get<{ Querystring: { pool?: string } }>('/api/v1/servers', async request => ({
      servers: await this.controller.listServers(request.query.pool)
    }));

    this.app.post('/api/v1/servers', async (request, reply) => {
      const body = parseOrThrow(CreateServerRequestSchema, request.body, 'server request');
      const server = await this.controller.createServer(body.name, body.spec);
      reply.status(201);
      return server;
    });

    this.app.get<{ Params: NameParams }>('/api/v1/servers/:name', async request =>
      this.controller.getServer(request.params.name)
    );

    this.app.put<{ Params: NameParams }>('/api/v1/servers/:name', async request => {
      const body = parseOrThrow(UpdateServerRequestSchema, request.body, 'server request');
      return this.controller.updateServer(request.params.name, body.spec);
    });

    this.app.delete<{ Params: NameParams }>('/api/v1/servers/:name', async (request, reply) => {
      await this.controller.deleteServer(request.params.name);
      reply.status(204);
    });

    this.app.post<{ Params: NameParams }>('/api/v1/servers/:name/start', async (request, reply) => {
      const server = await this.controller.startServer(request.params.name);
      reply.status(202);
      return server;
    });

    this.app.post<{ Params: NameParams }>('/api/v1/servers/:name/stop', async (request, reply) => {
      const server = await this.controller.stopServer(request.params.name);
      reply.status(202);
      return server;
    });

    // Transport
    this.app.get<{ Params: NameParams }>('/api/v1/servers/:name/sse', async (request, reply) => {
      const { name } = request.params;
      const sink = new ReplySink(reply);

      try {
        const session = await this.bridge.openSession(name, sink);
        request.raw.on('close', () => session.close());
      } catch (error) {
        // Once the stream has started the error has already been sent as an event
        if (!reply.sent) throw error;
        this.logger.debug('Session ended during setup', {
          server: name,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    });

    this.app.post<{ Params: NameParams; Querystring: { sessionId?: string } }>(
      '/api/v1/servers/:name/message',
      async (request, reply) => {
        const { name } = request.params;
        const { sessionId } = request.query;

        if (sessionId) {
          await this.bridge.submit(name, sessionId, request.body);
          reply.status(202);
          return { accepted: true };
        }

        const response = await this.bridge.request(name, request.body);
        if (response === null) {
          reply.status(202);
          return { accepted: true };
        }
        return response;
      }
    );
  }

  private setupErrorHandlers(): void {
    this.app.setErrorHandler((error: FastifyError, request, reply) => {
      if (isFleetError(error)) {
        if (error.statusCode >= 500) {
          this.logger.error(error, 'Request failed', { method: request.method, url: request.url });
        }
        reply.status(error.statusCode).send({
          error: error.code,
          message: error.message,
          timestamp: new Date().toISOString()
        });
        return;
      }

      // Fastify's own client errors, such as a malformed JSON body
      if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
        reply.status(error.statusCode).send({
          error: error.code ?? 'BAD_REQUEST',
          message: error.message,
          timestamp: new Date().toISOString()
        });
        return;
      }

      this.logger.error(error, 'Unhandled error', { method: request.method, url: request.url });
      reply.status(500).send({
        error: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
        timestamp: new Date().toISOString()
      });
    });

    this.app.setNotFoundHandler((request, reply) => {
      reply.status(404).send({
        error: 'NOT_FOUND',
        message: `Route ${request.method} ${request.url} not found`,
        timestamp: new Date().toISOString()
      });
    });
  }

  async start(): Promise<string> {
    const address = await this.app.listen({ port: this.config.port, host: this.config.host });
    this.logger.info('Gateway listening', { address });
    return address;
  }

  async stop(): Promise<void> {
    await this.bridge.cleanup();
    await this.app.close();
    this.logger.info('Gateway stopped');
  }

  getApp(): App {
    return this.app;
  }
}
