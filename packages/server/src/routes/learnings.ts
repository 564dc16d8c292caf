import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { querySchema, storeBatchSchema, storeSchema } from '../schemas/learnings.js';

export async function learningRoutes(app: FastifyInstance) {
  const server = app.withTypeProvider<ZodTypeProvider>();

  server.post('/store', {
    schema: { body: storeSchema },
  }, async (request, reply) => {
    const { session_source, ...rest } = request.body;
    const result = await app.learnings.store({ ...rest, sessionSource: session_source });

    return reply.code(result.created ? 201 : 200).send(result);
  });

  server.post('/store/batch', {
    schema: { body: storeBatchSchema },
  }, async (request) => {
    const results = await app.learnings.storeBatch(
      request.body.learnings.map(({ session_source, ...rest }) => ({ ...rest, sessionSource: session_source })),
    );

    return {
      results,
      created: results.filter(r => r.ok && r.created).length,
      merged: results.filter(r => r.ok && !r.created).length,
      failed: results.filter(r => !r.ok).length,
    };
  });

  server.post('/query', {
    schema: { body: querySchema },
  }, async (request) => {
    const { probe_text, k, type_filter, min_confidence, min_score } = request.body;
    const results = await app.learnings.query(probe_text, {
      k,
      typeFilter: type_filter,
      minConfidence: min_confidence,
      minScore: min_score,
    });

    return { results };
  });

  server.get('/stats', async () => {
    const stats = await app.learnings.stats();

    return {
      total_learnings: stats.total,
      by_type: stats.byType,
      indexed: app.learnings.indexSize,
      embedding_model: app.learnings.embeddingModel,
    };
  });
}
