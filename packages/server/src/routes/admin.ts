import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import {
  bulkDeleteSchema,
  idParamsSchema,
  listQuerySchema,
  patchSchema,
  toWireLearning,
} from '../schemas/learnings.js';

export async function adminRoutes(app: FastifyInstance) {
  const server = app.withTypeProvider<ZodTypeProvider>();

  server.get('/learnings', {
    schema: { querystring: listQuerySchema },
  }, async (request) => {
    const { type_filter, session_source, min_confidence, include_archived, limit, cursor } = request.query;

    const page = await app.learnings.listPage(
      {
        type: type_filter,
        sessionSource: session_source,
        minConfidence: min_confidence,
        includeArchived: include_archived,
      },
      { limit, cursor },
    );

    return {
      learnings: page.records.map(toWireLearning),
      next_cursor: page.nextCursor,
    };
  });

  server.get('/learnings/:id', {
    schema: { params: idParamsSchema },
  }, async (request) => {
    const record = await app.learnings.get(request.params.id);
    return toWireLearning(record);
  });

  server.patch('/learnings/:id', {
    schema: { params: idParamsSchema, body: patchSchema },
  }, async (request) => {
    const { session_source, ...rest } = request.body;
    const record = await app.learnings.update(request.params.id, { ...rest, sessionSource: session_source });
    return toWireLearning(record);
  });

  server.delete('/learnings/:id', {
    schema: { params: idParamsSchema },
  }, async (request) => {
    const deleted = await app.learnings.delete(request.params.id);
    return { deleted };
  });

  server.post('/learnings/delete', {
    schema: { body: bulkDeleteSchema },
  }, async (request) => {
    const results = await app.learnings.deleteMany(request.body.ids);

    return {
      results,
      deleted: results.filter(r => r.deleted).length,
      failed: results.filter(r => r.error !== undefined).length,
    };
  });

  server.post('/admin/purge', async () => {
    const purged = await app.learnings.purge();
    return { purged };
  });

  server.post('/admin/reindex', async () => {
    const indexed = await app.learnings.reindex();
    return { indexed };
  });
}
