import { z, type ZodTypeAny } from 'zod';
import safeRegex from 'safe-regex';
import { convention } from '@config/convention.config.js';
import { BADGE_TYPES } from '@shared/constants/convention.js';
import { hasBadgeTypePrice } from '@modules/pricing/pricing.service.js';
import { logger } from '@shared/utils/logger.js';
import { FIELD_ALIASES, getSectionFields } from './forms.fields.js';
import {
  getNonAdminLockedFields,
  getOptionalFields,
  isChecked,
  stripLockedFields,
  type FormAttendee,
  type LockOptions,
} from './forms.rules.js';
import type {
  FieldDefinition,
  FieldValueType,
  FormFieldError,
  FormSection,
  SectionValidationResult,
} from './forms.schema.js';

export interface ValidateSectionOptions extends LockOptions {
  isAdmin?: boolean;
}

export interface SectionDefinition {
  section: FormSection;
  fields: (FieldDefinition & { locked: boolean })[];
}

const INVALID_CHOICE = 'Not a valid choice.';

// ============================================================================
// Helpers
// ============================================================================

function isEmpty(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    value === false ||
    (typeof value === 'string' && value.trim() === '') ||
    (Array.isArray(value) && value.length === 0)
  );
}

/**
 * A 10-digit US number (optionally with a leading 1), or `+` and a country code.
 */
export function isInvalidPhoneNumber(value: string): boolean {
  const trimmed = value.trim();
  if (trimmed.startsWith('+')) {
    return !/^\d{7,15}$/.test(trimmed.slice(1).replace(/[\s().-]/g, ''));
  }
  return !/^1?\d{10}$/.test(trimmed.replace(/[\s().-]/g, ''));
}

function isSafePattern(pattern: string): boolean {
  if (!safeRegex(pattern)) return false;
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

function valueTypeOf(field: FieldDefinition): FieldValueType {
  if (field.valueType) return field.valueType;
  switch (field.widget) {
    case 'checkbox':
    case 'switch':
      return 'boolean';
    case 'dollar':
      return 'integer';
    default:
      return 'string';
  }
}

// ============================================================================
// Field Schema Builders
// ============================================================================

function buildChoiceSchema(field: FieldDefinition, choices: NonNullable<FieldDefinition['choices']>): ZodTypeAny {
  const values = choices.map((choice) => choice.value);
  const numeric = values.every((value) => typeof value === 'number');
  const single: ZodTypeAny = numeric
    ? z.coerce.number().refine((value) => values.includes(value), INVALID_CHOICE)
    : z.string().refine((value) => values.includes(value), INVALID_CHOICE);

  if (field.widget === 'multi_checkbox') {
    return z.array(single, { invalid_type_error: INVALID_CHOICE });
  }
  return single;
}

function buildStringSchema(field: FieldDefinition): ZodTypeAny {
  let schema = z.string({ invalid_type_error: `${field.label} must be text.` }).trim();
  const validation = field.validation;

  if (validation?.maxLength) {
    schema = schema.max(validation.maxLength.value, validation.maxLength.message);
  }
  if (field.widget === 'email') {
    return schema.refine((value) => value === '' || z.string().email().safeParse(value).success, {
      message: 'Invalid email address.',
    });
  }
  if (validation?.pattern) {
    if (isSafePattern(validation.pattern.value)) {
      const regex = new RegExp(validation.pattern.value);
      return schema.refine((value) => regex.test(value), validation.pattern.message);
    }
    logger.warn(
      { fieldId: field.id, pattern: validation.pattern.value },
      'Skipping unsafe or invalid regex pattern'
    );
  }
  return schema;
}

function buildIntegerSchema(field: FieldDefinition): ZodTypeAny {
  let schema = z.coerce.number({ invalid_type_error: 'Not a valid integer value.' }).int('Not a valid integer value.');
  if (field.validation?.min) {
    schema = schema.min(field.validation.min.value, field.validation.min.message);
  }
  return schema;
}

/**
 * Build the Zod schema that coerces and checks one submitted value.
 */
function buildFieldSchema(field: FieldDefinition): ZodTypeAny {
  if (field.choices && field.widget !== 'country_select') {
    return buildChoiceSchema(field, field.choices);
  }
  switch (valueTypeOf(field)) {
    case 'boolean':
      return z.unknown().transform(isChecked);
    case 'integer':
      return buildIntegerSchema(field);
    case 'string':
      return buildStringSchema(field);
  }
}

// ============================================================================
// Cross-field Checks
// ============================================================================

type FieldCheck = (data: Record<string, unknown>, attendee: FormAttendee) => FormFieldErrorInput[];

interface FormFieldErrorInput {
  fieldId: string;
  message: string;
}

function stringValue(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

const personalInfoChecks: FieldCheck = (data) => {
  const errors: FormFieldErrorInput[] = [];

  const birthdate = stringValue(data.birthdate);
  if (birthdate) {
    const parsed = new Date(`${birthdate}T00:00:00.000Z`);
    if (!/^\d{4}-\d{2}-\d{2}$/.test(birthdate) || Number.isNaN(parsed.getTime())) {
      errors.push({
        fieldId: 'birthdate',
        message: 'Please use the format YYYY-MM-DD for your date of birth.',
      });
    } else if (birthdate > new Date().toISOString().slice(0, 10)) {
      errors.push({ fieldId: 'birthdate', message: 'You cannot be born in the future.' });
    }
  }

  const cellphone = stringValue(data.cellphone);
  const ecPhone = stringValue(data.ecPhone);
  if (cellphone && isInvalidPhoneNumber(cellphone)) {
    errors.push({
      fieldId: 'cellphone',
      message:
        'Your phone number was not a valid 10-digit US phone number. Please include a country code (e.g. +44) for international numbers.',
    });
  }
  if (cellphone && cellphone === ecPhone) {
    errors.push({
      fieldId: 'cellphone',
      message: 'Your phone number cannot be the same as your emergency contact number.',
    });
  }

  if (ecPhone && !isChecked(data.international) && isInvalidPhoneNumber(ecPhone)) {
    errors.push({
      fieldId: 'ecPhone',
      message: convention.features.collectFullAddress
        ? 'Please enter a 10-digit US phone number or include a country code (e.g. +44) for your emergency contact number.'
        : 'Please enter a 10-digit emergency contact number.',
    });
  }

  return errors;
};

const badgeExtrasChecks: FieldCheck = (data, attendee) => {
  const amountExtra = Number(data.amountExtra ?? attendee?.amountExtra ?? 0);
  const badgeType = data.badgeType ?? attendee?.badgeType;
  const shirt = Number(data.shirt ?? attendee?.shirt ?? convention.noShirt);

  const badgeHasShirt = BADGE_TYPES.some((type) => type === badgeType && hasBadgeTypePrice(type));
  if ((amountExtra > 0 || badgeHasShirt) && shirt === convention.noShirt) {
    return [{ fieldId: 'shirt', message: 'Please select a shirt size.' }];
  }
  return [];
};

const preregOtherInfoChecks: FieldCheck = (data) => {
  if (
    isChecked(data.staffing) &&
    !isChecked(data.noCellphone) &&
    !stringValue(data.cellphone)
  ) {
    return [{ fieldId: 'cellphone', message: 'A cellphone number is required for volunteers.' }];
  }
  const cellphone = stringValue(data.cellphone);
  if (cellphone && isInvalidPhoneNumber(cellphone)) {
    return [
      {
        fieldId: 'cellphone',
        message:
          'Your phone number was not a valid 10-digit US phone number. Please include a country code (e.g. +44) for international numbers.',
      },
    ];
  }
  return [];
};

const SECTION_CHECKS: Partial<Record<FormSection, FieldCheck>> = {
  personal_info: personalInfoChecks,
  badge_extras: badgeExtrasChecks,
  prereg_other_info: preregOtherInfoChecks,
};

// ============================================================================
// Public API
// ============================================================================

/**
 * Field definitions for a section, flagged with what this attendee may not edit.
 */
export function getSectionDefinition(
  section: FormSection,
  attendee: FormAttendee = null,
  options: ValidateSectionOptions = {}
): SectionDefinition {
  const locked = new Set(options.isAdmin ? [] : getNonAdminLockedFields(section, attendee, options));
  return {
    section,
    fields: getSectionFields(section).map((field) => ({ ...field, locked: locked.has(field.id) })),
  };
}

function resolveAliases(section: FormSection, data: Record<string, unknown>): Record<string, unknown> {
  const resolved = { ...data };
  for (const [field, aliases] of Object.entries(FIELD_ALIASES[section] ?? {})) {
    for (const alias of aliases) {
      if (resolved[field] === undefined && resolved[alias] !== undefined) {
        resolved[field] = resolved[alias];
      }
      delete resolved[alias];
    }
  }
  return resolved;
}

/**
 * Validate one form section. Non-admin input has locked fields stripped
 * first; only the fields that remain are checked and returned.
 */
export function validateSection(
  section: FormSection,
  data: Record<string, unknown>,
  attendee: FormAttendee = null,
  options: ValidateSectionOptions = {}
): SectionValidationResult {
  const withAliases = resolveAliases(section, data);
  const input = options.isAdmin
    ? withAliases
    : stripLockedFields(section, withAliases, attendee, options);
  const locked = new Set(options.isAdmin ? [] : getNonAdminLockedFields(section, attendee, options));
  const optional = new Set(getOptionalFields(section, input, attendee));

  const errors: FormFieldError[] = [];
  const failed = new Set<string>();
  const validated: Record<string, unknown> = {};
  const fields = getSectionFields(section).filter(
    (field) => !locked.has(field.id) && !Object.values(FIELD_ALIASES[section] ?? {}).flat().includes(field.id)
  );

  for (const field of fields) {
    const value = input[field.id];
    const required = field.validation?.required;

    if (isEmpty(value)) {
      if (required && !optional.has(field.id)) {
        errors.push({ fieldId: field.id, fieldName: field.label, message: required });
        failed.add(field.id);
      } else if (value !== undefined) {
        validated[field.id] = valueTypeOf(field) === 'boolean' ? false : value;
      }
      continue;
    }

    const result = buildFieldSchema(field).safeParse(value);
    if (!result.success) {
      const [issue] = result.error.issues;
      errors.push({ fieldId: field.id, fieldName: field.label, message: issue.message });
      failed.add(field.id);
    } else {
      validated[field.id] = result.data;
    }
  }

  const check = SECTION_CHECKS[section];
  if (check) {
    const labels = new Map(fields.map((field) => [field.id, field.label]));
    for (const error of check(input, attendee)) {
      if (failed.has(error.fieldId) || !labels.has(error.fieldId)) continue;
      errors.push({ ...error, fieldName: labels.get(error.fieldId) ?? error.fieldId });
      failed.add(error.fieldId);
    }
  }

  return { valid: errors.length === 0, errors, data: validated };
}
