// Services
export {
  createAttendee,
  preregisterAttendee,
  getAttendeeById,
  getAttendeeCost,
  listAttendees,
  updateAttendee,
  updateAttendeeSection,
  deleteAttendee,
  listPanelists,
  hasActiveReceipt,
  type RequestMeta,
} from './attendees.service.js';
export {
  fullName,
  isValid,
  isNew,
  paidForAShirt,
  staffingOrWillBe,
  needsPiiConsent,
  isNotReadyToCheckin,
  ageDiscount,
  badgeCost,
  totalCost,
  costBreakdown,
  applyPresaveAdjustments,
  type CostBreakdown,
} from './attendees.utils.js';

// Schemas & Types
export {
  AttendeeFieldsSchema,
  CreateAttendeeSchema,
  UpdateAttendeeSchema,
  ListAttendeesQuerySchema,
  AttendeeIdParamSchema,
  PreregisterSchema,
  SELF_SERVICE_SECTIONS,
  type CreateAttendeeInput,
  type UpdateAttendeeInput,
  type ListAttendeesQuery,
  type SelfServiceSection,
} from './attendees.schema.js';

// Routes
export { attendeesRoutes, requestMeta } from './attendees.routes.js';
export { attendeesPublicRoutes } from './attendees.public.routes.js';
