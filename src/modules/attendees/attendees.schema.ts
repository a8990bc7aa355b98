import { z, type ZodTypeAny } from 'zod';
import {
  BADGE_STATUSES,
  BADGE_TYPES,
  PAID_STATUSES,
  RIBBONS,
} from '@shared/constants/convention.js';
import { FormSectionSchema } from '@modules/forms/forms.schema.js';
import { PaginationQuerySchema } from '@shared/utils/pagination.js';

// Blank form inputs clear nullable columns
const emptyToNull = <T extends ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? null : value), schema.nullable());

// ============================================================================
// Attendee Fields
// ============================================================================

export const AttendeeFieldsSchema = z.object({
  groupId: emptyToNull(z.string().uuid()),
  placeholder: z.boolean(),

  firstName: z.string().trim().max(100),
  lastName: z.string().trim().max(100),
  sameLegalName: z.boolean(),
  legalName: z.string().trim().max(200),
  email: z.string().trim().max(255),
  cellphone: z.string().trim().max(50),
  noCellphone: z.boolean(),
  birthdate: emptyToNull(z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')),
  ageGroup: emptyToNull(z.string()),
  ecName: z.string().trim().max(200),
  ecPhone: z.string().trim().max(50),
  onsiteContact: z.string().trim().max(500),
  noOnsiteContact: z.boolean(),
  international: z.boolean(),
  address1: z.string().trim().max(255),
  address2: z.string().trim().max(255),
  city: z.string().trim().max(255),
  region: z.string().trim().max(255),
  zipCode: z.string().trim().max(20),
  country: z.string().trim().max(255),

  badgeType: z.enum(BADGE_TYPES),
  badgeStatus: z.enum(BADGE_STATUSES),
  badgePrintedName: z.string().trim().max(20),
  ribbons: z.array(z.enum(RIBBONS)),
  paid: z.enum(PAID_STATUSES),
  overriddenPrice: emptyToNull(z.number().int().min(0)),
  amountExtra: z.number().int().min(0),
  extraDonation: z.number().int().min(0),
  shirt: z.number().int(),
  promoCode: z.string().trim().max(50),

  staffing: z.boolean(),
  requestedDeptIds: z.array(z.number().int()),
  requestedAccessibilityServices: z.boolean(),
  interests: z.array(z.number().int()),
  fursuiting: emptyToNull(z.number().int()),

  canSpam: z.boolean(),
  piiConsent: z.boolean(),

  compedReason: z.string().trim(),
  forReview: z.string(),
  printPending: z.boolean(),
  timesPrinted: z.number().int().min(0),
  checkedIn: z.coerce.date().nullable(),
});

/**
 * Validated form output, narrowed to attendee columns.
 */
export const AttendeeFormDataSchema = AttendeeFieldsSchema.partial();

export const CreateAttendeeSchema = AttendeeFieldsSchema.partial().strict();

export const UpdateAttendeeSchema = AttendeeFieldsSchema.partial().strict();

export const ListAttendeesQuerySchema = PaginationQuerySchema
  .extend({
    search: z.string().optional(),
    badgeStatus: z.enum(BADGE_STATUSES).optional(),
    badgeType: z.enum(BADGE_TYPES).optional(),
    groupId: z.string().uuid().optional(),
  })
  .strict();

export const AttendeeIdParamSchema = z
  .object({
    id: z.string().uuid(),
  })
  .strict();

// ============================================================================
// Public Schemas
// ============================================================================

export const PreregisterSchema = z
  .object({
    data: z.record(z.string(), z.unknown()),
  })
  .strict();

export const SELF_SERVICE_SECTIONS = [
  'personal_info',
  'badge_extras',
  'other_info',
  'consents',
] as const satisfies readonly z.infer<typeof FormSectionSchema>[];

export const SelfServiceSectionParamSchema = z
  .object({
    id: z.string().uuid(),
    section: z.enum(SELF_SERVICE_SECTIONS),
  })
  .strict();

export const SelfServiceUpdateSchema = z
  .object({
    data: z.record(z.string(), z.unknown()),
  })
  .strict();

// ============================================================================
// Types
// ============================================================================

export type AttendeeFormData = z.infer<typeof AttendeeFormDataSchema>;
export type CreateAttendeeInput = z.infer<typeof CreateAttendeeSchema>;
export type UpdateAttendeeInput = z.infer<typeof UpdateAttendeeSchema>;
export type ListAttendeesQuery = z.infer<typeof ListAttendeesQuerySchema>;
export type PreregisterInput = z.infer<typeof PreregisterSchema>;
export type SelfServiceSection = (typeof SELF_SERVICE_SECTIONS)[number];
export type SelfServiceUpdateInput = z.infer<typeof SelfServiceUpdateSchema>;
