import type { FastifyRequest } from 'fastify';
import { requireAuth, requireSection } from '@shared/middleware/auth.middleware.js';
import {
  createAttendee,
  getAttendeeById,
  getAttendeeCost,
  listAttendees,
  listPanelists,
  updateAttendee,
  deleteAttendee,
  type RequestMeta,
} from './attendees.service.js';
import {
  CreateAttendeeSchema,
  UpdateAttendeeSchema,
  ListAttendeesQuerySchema,
  AttendeeIdParamSchema,
  type CreateAttendeeInput,
  type UpdateAttendeeInput,
  type ListAttendeesQuery,
} from './attendees.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

export function requestMeta(request: FastifyRequest): RequestMeta {
  return {
    performedBy: request.user?.id,
    ipAddress: request.ip,
    userAgent: request.headers['user-agent'],
  };
}

export async function attendeesRoutes(app: AppInstance): Promise<void> {
  app.addHook('onRequest', requireAuth);
  app.addHook('preHandler', requireSection('attendees'));

  // POST /api/attendees - Create attendee
  app.post<{ Body: CreateAttendeeInput }>(
    '/',
    { schema: { body: CreateAttendeeSchema } },
    async (request, reply) => {
      const attendee = await createAttendee(request.body, requestMeta(request));
      return reply.status(201).send(attendee);
    }
  );

  // GET /api/attendees - List attendees
  app.get<{ Querystring: ListAttendeesQuery }>(
    '/',
    { schema: { querystring: ListAttendeesQuerySchema } },
    async (request, reply) => {
      const result = await listAttendees(request.query);
      return reply.send(result);
    }
  );

  // GET /api/attendees/panelists - Panelists, staff and guests
  app.get('/panelists', async (_request, reply) => {
    const panelists = await listPanelists();
    return reply.send(panelists);
  });

  // GET /api/attendees/:id
  app.get<{ Params: { id: string } }>(
    '/:id',
    { schema: { params: AttendeeIdParamSchema } },
    async (request, reply) => {
      const attendee = await getAttendeeById(request.params.id);
      if (!attendee) {
        throw app.httpErrors.notFound('Attendee not found');
      }
      return reply.send(attendee);
    }
  );

  // GET /api/attendees/:id/cost - Badge cost breakdown
  app.get<{ Params: { id: string } }>(
    '/:id/cost',
    { schema: { params: AttendeeIdParamSchema } },
    async (request, reply) => {
      const cost = await getAttendeeCost(request.params.id);
      return reply.send(cost);
    }
  );

  // PATCH /api/attendees/:id
  app.patch<{ Params: { id: string }; Body: UpdateAttendeeInput }>(
    '/:id',
    { schema: { params: AttendeeIdParamSchema, body: UpdateAttendeeSchema } },
    async (request, reply) => {
      const attendee = await updateAttendee(request.params.id, request.body, requestMeta(request));
      return reply.send(attendee);
    }
  );

  // DELETE /api/attendees/:id
  app.delete<{ Params: { id: string } }>(
    '/:id',
    { schema: { params: AttendeeIdParamSchema } },
    async (request, reply) => {
      await deleteAttendee(request.params.id, requestMeta(request));
      return reply.status(204).send();
    }
  );
}
