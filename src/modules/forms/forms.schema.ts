import { z } from 'zod';

// ============================================================================
// Field Schemas
// ============================================================================

export const FORM_SECTIONS = [
  'personal_info',
  'badge_extras',
  'other_info',
  'prereg_other_info',
  'consents',
  'admin_info',
] as const;

export const FormSectionSchema = z.enum(FORM_SECTIONS);

export const FieldWidgetSchema = z.enum([
  'text',
  'email',
  'tel',
  'date',
  'select',
  'multi_checkbox',
  'switch',
  'dollar',
  'hidden',
  'textarea',
  'checkbox',
  'country_select',
]);

export const FieldValueTypeSchema = z.enum(['string', 'integer', 'boolean']);

export const FieldChoiceSchema = z.object({
  value: z.union([z.string(), z.number()]),
  label: z.string(),
  alternativeSpellings: z.string().optional(),
  relevancyBooster: z.number().int().optional(),
});

const RuleWithMessageSchema = <T extends z.ZodTypeAny>(value: T) =>
  z.object({
    value,
    message: z.string(),
  });

export const FieldValidationSchema = z.object({
  // Message shown when a required field is empty
  required: z.string().optional(),
  maxLength: RuleWithMessageSchema(z.number().int().positive()).optional(),
  min: RuleWithMessageSchema(z.number()).optional(),
  pattern: RuleWithMessageSchema(z.string()).optional(),
});

export const FieldDefinitionSchema = z.object({
  id: z.string(),
  label: z.string(),
  widget: FieldWidgetSchema,
  // Only needed where the widget does not imply it (hidden inputs)
  valueType: FieldValueTypeSchema.optional(),
  choices: z.array(FieldChoiceSchema).optional(),
  placeholder: z.string().optional(),
  description: z.string().optional(),
  validation: FieldValidationSchema.optional(),
});

// ============================================================================
// Request Schemas
// ============================================================================

export const SectionParamSchema = z
  .object({
    section: FormSectionSchema,
  })
  .strict();

export const ValidateSectionBodySchema = z
  .object({
    data: z.record(z.string(), z.unknown()),
    attendeeId: z.string().uuid().optional(),
  })
  .strict();

// ============================================================================
// Types
// ============================================================================

export type FormSection = z.infer<typeof FormSectionSchema>;
export type FieldWidget = z.infer<typeof FieldWidgetSchema>;
export type FieldValueType = z.infer<typeof FieldValueTypeSchema>;
export type FieldChoice = z.infer<typeof FieldChoiceSchema>;
export type FieldValidation = z.infer<typeof FieldValidationSchema>;
export type FieldDefinition = z.infer<typeof FieldDefinitionSchema>;
export type SectionParams = z.infer<typeof SectionParamSchema>;
export type ValidateSectionBody = z.infer<typeof ValidateSectionBodySchema>;

export interface FormFieldError {
  fieldId: string;
  fieldName: string;
  message: string;
}

export interface SectionValidationResult {
  valid: boolean;
  errors: FormFieldError[];
  data: Record<string, unknown>;
}
