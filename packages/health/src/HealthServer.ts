import Fastify, { type FastifyInstance } from 'fastify';
import type { ILogger } from '@chainfeed/core';
import type { HealthChecker } from './types.ts';

/**
 * Health server options
 */
export interface HealthServerOptions {
  checker: HealthChecker;
  logger: ILogger;
  host?: string;
  port?: number;
}

/**
 * HTTP server answering GET /health with the checker's reports
 */
export class HealthServer {
  private readonly checker: HealthChecker;
  private readonly logger: ILogger;
  private readonly host: string;
  private readonly port: number;
  private server: FastifyInstance | null = null;

  constructor(options: HealthServerOptions) {
    this.checker = options.checker;
    this.logger = options.logger.child({ module: 'HealthServer' });
    this.host = options.host ?? '0.0.0.0';
    this.port = options.port ?? 8090;
  }

  /**
   * Build the Fastify instance without listening
   */
  build(): FastifyInstance {
    if (this.server) return this.server;

    const server = Fastify({
      logger: false,
    });

    server.get('/health', async () => this.checker());

    this.server = server;
    return server;
  }

  /**
   * Start listening
   */
  async start(): Promise<void> {
    const server = this.build();
    await server.listen({ host: this.host, port: this.port });

    this.logger.info(`Health server started on http://${this.host}:${this.port}/health`);
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    if (this.server) {
      await this.server.close();
      this.server = null;
      this.logger.info('Health server stopped');
    }
  }

  /**
   * Get the Fastify instance
   */
  getInstance(): FastifyInstance | null {
    return this.server;
  }
}
