// =============================================================================
// Attendwell API: Imported attendance records (any admin, read-mostly)
// GET  /data-import/stats
// GET  /data-import/overview
// GET  /data-import/records
// GET  /data-import/records/:id
// GET  /data-import/files
// POST /data-import/reprocess/:id
// GET  /data-import/errors
// =============================================================================

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ImportErrorsQuerySchema, ImportRecordsQuerySchema, UuidSchema } from '@attendwell/shared';
import { NotFoundError, ValidationError } from '../../lib/errors.js';
import { principalOf } from '../../plugins/auth.js';
import { isSuperuser } from '../../services/authorization.js';

const IdParams = z.object({ id: UuidSchema });

const RECENT_FILES = 10;
const FILE_LIST_LIMIT = 50;
const REPROCESSABLE = new Set(['error', 'skipped']);

export default async function dataImportRoutes(fastify: FastifyInstance): Promise<void> {
  const admin = { preHandler: [fastify.requireAnyAdmin] };

  fastify.get('/stats', admin, async (request, reply) => {
    const caller = principalOf(request);
    const [summary, recentFiles] = await request.scoped((repos) =>
      Promise.all([repos.imports.summary(), repos.imports.recentFiles(RECENT_FILES)]),
    );

    let organizationName: string | null = null;
    if (!isSuperuser(caller) && caller.organization_id) {
      const orgId = caller.organization_id;
      const org = await fastify.store.withSystem((repos) => repos.organizations.findById(orgId));
      organizationName = org?.name ?? null;
    }

    const { total_records, latest_import, ...statusCounts } = summary;
    return reply.send({
      success: true,
      data: {
        total_records,
        status_breakdown: statusCounts,
        latest_import,
        recent_files: recentFiles,
        organization_name: organizationName,
      },
    });
  });

  fastify.get('/overview', admin, async (request, reply) => {
    const groups = await request.scoped((repos) => repos.imports.overview());
    return reply.send({ success: true, data: groups });
  });

  fastify.get('/records', admin, async (request, reply) => {
    const query = ImportRecordsQuerySchema.parse(request.query);
    const page = await request.scoped((repos) => repos.imports.list(query));
    return reply.send({
      success: true,
      data: {
        items: page.items,
        pagination: {
          total: page.total,
          limit: query.limit,
          offset: query.offset,
          has_more: query.offset + page.items.length < page.total,
        },
      },
    });
  });

  fastify.get('/records/:id', admin, async (request, reply) => {
    const { id } = IdParams.parse(request.params);
    const record = await request.scoped((repos) => repos.imports.findById(id));
    if (!record) throw new NotFoundError('Import record');
    return reply.send({ success: true, data: record });
  });

  fastify.get('/files', admin, async (request, reply) => {
    const files = await request.scoped((repos) => repos.imports.files(FILE_LIST_LIMIT));
    return reply.send({ success: true, data: files });
  });

  fastify.post('/reprocess/:id', admin, async (request, reply) => {
    const { id } = IdParams.parse(request.params);

    const record = await request.scoped(async (repos) => {
      const existing = await repos.imports.findById(id);
      if (!existing) throw new NotFoundError('Import record');
      if (!REPROCESSABLE.has(existing.status)) {
        throw new ValidationError(`Only records in error or skipped status can be reprocessed (current: ${existing.status})`);
      }
      const reset = await repos.imports.resetToPending(id);
      if (!reset) throw new NotFoundError('Import record');
      return reset;
    });

    request.log.info({ record_id: id }, 'Import record queued for reprocessing');
    return reply.send({ success: true, data: record });
  });

  fastify.get('/errors', admin, async (request, reply) => {
    const { limit } = ImportErrorsQuerySchema.parse(request.query);
    const errors = await request.scoped((repos) => repos.imports.errors(limit));
    return reply.send({ success: true, data: errors });
  });
}
