import Fastify from 'fastify';
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from 'fastify-type-provider-zod';
import { GuardedEmbeddingService, type EmbeddingService } from 'memory-core';
import type { ServerConfig } from './config.js';
import { closeDatabase, type Database } from './db/index.js';
import { RecordStore } from './db/recordStore.js';
import { createEmbeddingService } from './embeddings/index.js';
import { registerErrorHandler } from './plugins/errors.js';
import { adminRoutes } from './routes/admin.js';
import { learningRoutes } from './routes/learnings.js';
import { HealthTracker } from './services/healthTracker.js';
import { LearningService, serviceOptionsFromConfig } from './services/learningService.js';

export const VERSION = '0.1.0';

declare module 'fastify' {
  interface FastifyInstance {
    db: Database;
    config: ServerConfig;
    learnings: LearningService;
    ioHealth: HealthTracker;
  }
}

export interface AppDependencies {
  /** Used instead of the provider named in `config.embedding`; still guarded. */
  embeddings?: EmbeddingService;
  clock?: () => Date;
}

export async function buildApp(config: ServerConfig, db: Database, deps: AppDependencies = {}) {
  const app = Fastify({
    logger: config.nodeEnv === 'test' ? false : { level: config.logLevel },
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  const embeddings = deps.embeddings
    ? new GuardedEmbeddingService(deps.embeddings, config.embedding.timeoutMs)
    : createEmbeddingService(config.embedding);
  const ioHealth = new HealthTracker(config.unhealthyAfterIoErrors);
  const store = new RecordStore(db, {
    admissionThreshold: config.admissionThreshold,
    dimension: embeddings.dimension,
    health: ioHealth,
    clock: deps.clock,
  });
  const learnings = new LearningService(store, embeddings, app.log, serviceOptionsFromConfig(config));

  app.decorate('db', db);
  app.decorate('config', config);
  app.decorate('learnings', learnings);
  app.decorate('ioHealth', ioHealth);

  app.addHook('onClose', async () => {
    closeDatabase(db);
  });

  await registerErrorHandler(app);

  app.get('/health', async (_request, reply) => {
    const health = ioHealth.snapshot();

    if (!health.healthy || !learnings.ready) {
      return reply.code(503).send({
        status: 'degraded',
        timestamp: new Date().toISOString(),
        consecutive_io_errors: health.consecutiveIoErrors,
        last_io_error: health.lastIoError,
      });
    }

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: VERSION,
      learnings_indexed: learnings.indexSize,
      embedding_model: learnings.embeddingModel,
    };
  });

  await app.register(learningRoutes);
  await app.register(adminRoutes);

  await learnings.start();

  return app;
}
