import {
  getAttendeeById,
  getAttendeeCost,
  preregisterAttendee,
  updateAttendeeSection,
} from './attendees.service.js';
import { requestMeta } from './attendees.routes.js';
import {
  AttendeeIdParamSchema,
  PreregisterSchema,
  SelfServiceSectionParamSchema,
  SelfServiceUpdateSchema,
  type PreregisterInput,
  type SelfServiceSection,
  type SelfServiceUpdateInput,
} from './attendees.schema.js';
import type { Attendee } from '@/database/schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

type PublicAttendee = Omit<Attendee, 'compedReason' | 'forReview'>;

function toPublicAttendee(attendee: Attendee): PublicAttendee {
  const { compedReason: _compedReason, forReview: _forReview, ...rest } = attendee;
  return rest;
}

// ============================================================================
// Public Routes (No Auth - the attendee id is the capability)
// ============================================================================

export async function attendeesPublicRoutes(app: AppInstance): Promise<void> {
  // POST /api/public/attendees - Pre-register
  app.post<{ Body: PreregisterInput }>(
    '/',
    { schema: { body: PreregisterSchema } },
    async (request, reply) => {
      const attendee = await preregisterAttendee(request.body.data, requestMeta(request));
      return reply.status(201).send(toPublicAttendee(attendee));
    }
  );

  // GET /api/public/attendees/:id
  app.get<{ Params: { id: string } }>(
    '/:id',
    { schema: { params: AttendeeIdParamSchema } },
    async (request, reply) => {
      const attendee = await getAttendeeById(request.params.id);
      if (!attendee) {
        throw app.httpErrors.notFound('Attendee not found');
      }
      return reply.send(toPublicAttendee(attendee));
    }
  );

  // GET /api/public/attendees/:id/cost
  app.get<{ Params: { id: string } }>(
    '/:id/cost',
    { schema: { params: AttendeeIdParamSchema } },
    async (request, reply) => {
      const cost = await getAttendeeCost(request.params.id);
      return reply.send(cost);
    }
  );

  // PUT /api/public/attendees/:id/sections/:section - Self-service edit
  app.put<{
    Params: { id: string; section: SelfServiceSection };
    Body: SelfServiceUpdateInput;
  }>(
    '/:id/sections/:section',
    { schema: { params: SelfServiceSectionParamSchema, body: SelfServiceUpdateSchema } },
    async (request, reply) => {
      const { id, section } = request.params;
      const attendee = await updateAttendeeSection(id, section, request.body.data, requestMeta(request));
      return reply.send(toPublicAttendee(attendee));
    }
  );
}
