// Services
export {
  validateSection,
  getSectionDefinition,
  isInvalidPhoneNumber,
  type ValidateSectionOptions,
  type SectionDefinition,
} from './forms.service.js';
export {
  getOptionalFields,
  getNonAdminLockedFields,
  stripLockedFields,
  type FormAttendee,
  type LockOptions,
} from './forms.rules.js';
export {
  getSectionFields,
  countryChoices,
  buildPiiConsentLabel,
  FIELD_ALIASES,
  PURCHASABLE_BADGE_TYPES,
} from './forms.fields.js';

// Schemas & Types
export {
  FORM_SECTIONS,
  FormSectionSchema,
  FieldWidgetSchema,
  FieldChoiceSchema,
  FieldValidationSchema,
  FieldDefinitionSchema,
  SectionParamSchema,
  ValidateSectionBodySchema,
  type FormSection,
  type FieldWidget,
  type FieldChoice,
  type FieldValidation,
  type FieldDefinition,
  type FormFieldError,
  type SectionValidationResult,
} from './forms.schema.js';

// Routes
export { formsPublicRoutes } from './forms.routes.js';
