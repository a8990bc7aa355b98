import { z } from 'zod';
import { getAttendeeById, hasActiveReceipt } from '@modules/attendees/attendees.service.js';
import { getSectionDefinition, validateSection, type ValidateSectionOptions } from './forms.service.js';
import {
  SectionParamSchema,
  ValidateSectionBodySchema,
  type FormSection,
  type ValidateSectionBody,
} from './forms.schema.js';
import type { FormAttendee } from './forms.rules.js';
import type { AppInstance } from '@shared/types/fastify.js';

const SectionQuerySchema = z
  .object({
    attendeeId: z.string().uuid().optional(),
  })
  .strict();

// ============================================================================
// Public Routes (No Auth)
// ============================================================================

export async function formsPublicRoutes(app: AppInstance): Promise<void> {
  async function loadContext(
    attendeeId: string | undefined
  ): Promise<{ attendee: FormAttendee; options: ValidateSectionOptions }> {
    if (!attendeeId) return { attendee: null, options: { isAdmin: false } };

    const attendee = await getAttendeeById(attendeeId);
    if (!attendee) {
      throw app.httpErrors.notFound('Attendee not found');
    }
    return {
      attendee,
      options: { isAdmin: false, hasActiveReceipt: await hasActiveReceipt(attendeeId) },
    };
  }

  // GET /api/forms/attendee/:section - Field definitions
  app.get<{ Params: { section: FormSection }; Querystring: { attendeeId?: string } }>(
    '/attendee/:section',
    { schema: { params: SectionParamSchema, querystring: SectionQuerySchema } },
    async (request, reply) => {
      const { attendee, options } = await loadContext(request.query.attendeeId);
      return reply.send(getSectionDefinition(request.params.section, attendee, options));
    }
  );

  // POST /api/forms/attendee/:section/validate - Check a section without saving
  app.post<{ Params: { section: FormSection }; Body: ValidateSectionBody }>(
    '/attendee/:section/validate',
    { schema: { params: SectionParamSchema, body: ValidateSectionBodySchema } },
    async (request, reply) => {
      const { attendee, options } = await loadContext(request.body.attendeeId);
      return reply.send(validateSection(request.params.section, request.body.data, attendee, options));
    }
  );
}
