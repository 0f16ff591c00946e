/**
 * Hearth Server
 * JSON CRUD API under /api/v1 over one ObjectStore
 */

import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import {
  ConstraintViolationError,
  EntityNotFoundError,
  EntityValidationError,
  ObjectStore
} from 'hearth-storage';
import { HearthServerConfig } from './config';
import { REQUEST_ID_HEADER, generateRequestId, registerRequestId } from './middleware/request-id';
import { registerAmenityRoutes } from './routes/amenities';
import { registerCityRoutes } from './routes/cities';
import { registerIndexRoutes } from './routes/index';
import { registerPlaceAmenityRoutes } from './routes/places-amenities';
import { registerPlaceRoutes } from './routes/places';
import { registerReviewRoutes } from './routes/reviews';
import { registerStateRoutes } from './routes/states';
import { registerUserRoutes } from './routes/users';

export * from './config';

export const API_PREFIX = '/api/v1';

export class HearthServer {
  private app: FastifyInstance;
  private store: ObjectStore;
  private config: HearthServerConfig;
  private initialized = false;

  constructor(store: ObjectStore, config: Partial<HearthServerConfig> = {}) {
    this.store = store;
    this.config = {
      host: config.host ?? '0.0.0.0',
      port: config.port ?? 5000,
      corsOrigin: config.corsOrigin ?? '*',
      logger: config.logger ?? true
    };

    this.app = Fastify({
      logger: this.config.logger,
      genReqId: generateRequestId,
      requestIdHeader: REQUEST_ID_HEADER,
      ignoreTrailingSlash: true
    });
  }

  /**
   * Load the store and register plugins, hooks and routes. Idempotent.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    await this.store.reload();

    await this.app.register(cors, {
      origin: this.config.corsOrigin
    });
    registerRequestId(this.app);
    this.registerErrorHandlers();

    const store = this.store;
    await this.app.register(
      async api => {
        await registerIndexRoutes(api, store);
        await registerStateRoutes(api, store);
        await registerCityRoutes(api, store);
        await registerAmenityRoutes(api, store);
        await registerUserRoutes(api, store);
        await registerPlaceRoutes(api, store);
        await registerReviewRoutes(api, store);
        await registerPlaceAmenityRoutes(api, store);
      },
      { prefix: API_PREFIX }
    );

    await this.app.ready();
    this.initialized = true;
  }

  async start(): Promise<void> {
    console.log('🚀 Starting Hearth API...');
    console.log(`📍 Backend: ${this.store.backend}`);

    try {
      await this.initialize();
      await this.app.listen({
        port: this.config.port,
        host: this.config.host
      });

      console.log('✅ Hearth API started successfully');
      console.log(`🌐 Listening on http://${this.config.host}:${this.config.port}${API_PREFIX}`);
    } catch (error) {
      console.error('❌ Server boot failed:', error instanceof Error ? error.message : String(error));
      throw error;
    }
  }

  async stop(): Promise<void> {
    console.log('🛑 Stopping Hearth API...');
    await this.app.close();
    await this.store.close();
    console.log('✅ Hearth API stopped');
  }

  getApp(): FastifyInstance {
    return this.app;
  }

  private registerErrorHandlers(): void {
    this.app.setErrorHandler(async (error: FastifyError, request, reply) => {
      if (error instanceof EntityValidationError) {
        return reply.code(400).send({ error: error.message });
      }
      if (error instanceof EntityNotFoundError) {
        return reply.code(404).send({ error: 'Not found' });
      }
      if (error instanceof ConstraintViolationError) {
        return reply.code(409).send({ error: error.message });
      }

      // Body could not be parsed as JSON (bad syntax, empty body, unknown media type)
      const code = typeof error.code === 'string' ? error.code : '';
      if (code.startsWith('FST_ERR_CTP') || error.statusCode === 400 || error.statusCode === 415) {
        return reply.code(400).send({ error: 'Not a JSON' });
      }

      request.log.error(error);
      return reply.code(500).send({ error: 'Internal server error' });
    });

    this.app.setNotFoundHandler(async (request, reply) => {
      return reply.code(404).send({ error: 'Not found' });
    });
  }
}
