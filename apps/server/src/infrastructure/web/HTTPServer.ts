/**
 * HTTP Server Infrastructure
 *
 * Fastify-based HTTP server exposing the session REST API.
 */

import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { registerAPIRoutes } from './api';
import { SessionRegistry } from '../../application/SessionRegistry';
import { IRateLimiter } from '../../domain/loading';
import { NoticeBoard } from './NoticeBoard';
import { createLogger, Logger } from '../logging';

export interface ServerInfo {
  port: number;
  host: string;
  uptime: number;
}

export interface HTTPServerConfig {
  port: number;
  host: string;
  logger?: boolean;
  logLevel?: string;
}

export interface HTTPServerDependencies {
  registry: SessionRegistry;
  notices: NoticeBoard;
  rateLimiter: IRateLimiter;
}

export class HTTPServer {
  private readonly fastify: FastifyInstance;
  private readonly config: HTTPServerConfig;
  private readonly log: Logger;
  private startTime: Date | null = null;

  constructor(config: HTTPServerConfig) {
    this.config = config;
    this.log = createLogger('http');
    this.fastify = Fastify({
      logger: config.logger === false ? false : { name: 'trackline-http', level: config.logLevel ?? 'info' },
      trustProxy: false
    });
  }

  /**
   * Register plugins and routes
   */
  async initialize(dependencies: HTTPServerDependencies): Promise<void> {
    await this.fastify.register(cors, {
      origin: true,
      credentials: false
    });

    await registerAPIRoutes(this.fastify, dependencies);

    this.fastify.get('/health', async () => ({
      status: 'healthy',
      server: this.getServerInfo(),
      timestamp: new Date().toISOString()
    }));

    this.fastify.setNotFoundHandler(async (request, reply) => {
      void reply.code(404);
      return {
        success: false,
        error: { code: 'NOT_FOUND', message: `Route ${request.method} ${request.url} not found` },
        timestamp: new Date().toISOString()
      };
    });

    this.log.info('HTTP server initialized');
  }

  async start(): Promise<void> {
    await this.fastify.listen({
      port: this.config.port,
      host: this.config.host
    });
    this.startTime = new Date();
    this.log.info({ port: this.config.port, host: this.config.host }, 'HTTP server started');
  }

  /**
   * Stop accepting connections and wait for in-flight requests
   */
  async stop(): Promise<void> {
    await this.fastify.close();
    this.log.info('HTTP server stopped');
  }

  getServerInfo(): ServerInfo {
    return {
      port: this.config.port,
      host: this.config.host,
      uptime: this.startTime ? Date.now() - this.startTime.getTime() : 0
    };
  }

  getFastifyInstance(): FastifyInstance {
    return this.fastify;
  }
}
