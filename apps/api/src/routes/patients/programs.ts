// =============================================================================
// Attendwell API: Program routes (any admin), mounted at /patients/programs
// =============================================================================

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ProgramCreateSchema, ProgramUpdateSchema, UuidSchema } from '@attendwell/shared';
import { NotFoundError, ValidationError } from '../../lib/errors.js';
import { principalOf } from '../../plugins/auth.js';
import { UniqueViolationError } from '../../repositories/types.js';
import { resolveTargetOrgId, scopeOrgId } from '../../services/authorization.js';

const IdParams = z.object({ id: UuidSchema });

const DUPLICATE_NAME = 'A program with this name already exists in this organization';

async function rethrowDuplicateName<T>(work: Promise<T>): Promise<T> {
  try {
    return await work;
  } catch (err) {
    if (err instanceof UniqueViolationError) throw new ValidationError(DUPLICATE_NAME);
    throw err;
  }
}

export default async function programRoutes(fastify: FastifyInstance): Promise<void> {
  const admin = { preHandler: [fastify.requireAnyAdmin] };

  fastify.get('/', admin, async (request, reply) => {
    const organizationId = scopeOrgId(principalOf(request));
    const programs = await request.scoped((repos) =>
      repos.programs.list({ organization_id: organizationId, status: 'active' }),
    );
    return reply.send({ success: true, data: programs });
  });

  fastify.post('/', admin, async (request, reply) => {
    const body = ProgramCreateSchema.parse(request.body);
    const organizationId = resolveTargetOrgId(principalOf(request), body.organization_id);

    const program = await rethrowDuplicateName(
      request.scoped((repos) =>
        repos.programs.create({
          organization_id: organizationId,
          name: body.name,
          description: body.description ?? null,
          level_of_care: body.level_of_care ?? null,
          hours_per_week: body.hours_per_week,
        }),
      ),
    );

    request.log.info({ program_id: program.program_id }, 'Program created');
    return reply.status(201).send({ success: true, data: program });
  });

  fastify.put('/:id', admin, async (request, reply) => {
    const { id } = IdParams.parse(request.params);
    const body = ProgramUpdateSchema.parse(request.body);

    const program = await rethrowDuplicateName(request.scoped((repos) => repos.programs.update(id, body)));
    if (!program) throw new NotFoundError('Program');

    request.log.info({ program_id: id }, 'Program updated');
    return reply.send({ success: true, data: program });
  });

  // Soft delete: the program is inactivated, never removed
  fastify.delete('/:id', admin, async (request, reply) => {
    const { id } = IdParams.parse(request.params);

    await request.scoped(async (repos) => {
      const program = await repos.programs.findById(id);
      if (!program) throw new NotFoundError('Program');
      const referencing = await repos.patients.countReferencingProgram(id);
      if (referencing > 0) {
        throw new ValidationError(
          `Cannot delete program: ${referencing} patient(s) are still assigned to it`,
          { patient_count: referencing },
        );
      }
      await repos.programs.update(id, { status: 'inactive' });
    });

    request.log.info({ program_id: id }, 'Program inactivated');
    return reply.send({ success: true, data: { message: 'Program deleted successfully' } });
  });

  fastify.get('/:id/patient-count', admin, async (request, reply) => {
    const { id } = IdParams.parse(request.params);

    const count = await request.scoped(async (repos) => {
      const program = await repos.programs.findById(id);
      if (!program) throw new NotFoundError('Program');
      return repos.patients.countReferencingProgram(id);
    });
    return reply.send({ success: true, data: { program_id: id, patient_count: count } });
  });
}
