import { convention } from '@config/convention.config.js';
import { BadgeStatus, BadgeType, Ribbon } from '@shared/constants/convention.js';
import {
  isNew,
  isValid,
  needsPiiConsent,
} from '@modules/attendees/attendees.utils.js';
import type { Attendee } from '@/database/schema.js';
import { FIELD_ALIASES, getSectionFields } from './forms.fields.js';
import type { FormSection } from './forms.schema.js';

/**
 * The stored attendee a form is filled for; null while registering.
 */
export type FormAttendee = Attendee | null;

export interface LockOptions {
  // The attendee has an open receipt with charges on it
  hasActiveReceipt?: boolean;
}

const PLACEHOLDER_OPTIONAL_FIELDS = [
  'firstName',
  'lastName',
  'legalName',
  'email',
  'birthdate',
  'ageGroup',
  'ecName',
  'ecPhone',
  'address1',
  'city',
  'region',
  'zipCode',
  'country',
  'onsiteContact',
];

export function isChecked(value: unknown): boolean {
  return value === true || value === 'true' || value === 'on' || value === 1 || value === '1';
}

function sectionFieldIds(section: FormSection): string[] {
  return [...new Set(getSectionFields(section).map((field) => field.id))];
}

function isLockedOut(attendee: Attendee): boolean {
  return !isValid(attendee) || attendee.badgeStatus === BadgeStatus.REFUNDED;
}

// ============================================================================
// Optional Fields
// ============================================================================

function personalInfoOptionalFields(data: Record<string, unknown>, attendee: FormAttendee): string[] {
  const unassignedGroupReg = !!attendee?.groupId && !attendee.firstName && !attendee.lastName;
  const validPlaceholder = !!attendee?.placeholder && !!attendee.firstName && !!attendee.lastName;
  if (unassignedGroupReg || validPlaceholder) {
    return [...PLACEHOLDER_OPTIONAL_FIELDS];
  }

  const optional = ['address2'];

  if (!convention.features.collectFullAddress) {
    optional.push('address1', 'city', 'region', 'country');
  } else if (isChecked(data.international)) {
    optional.push('region');
  }

  optional.push(convention.features.collectExactBirthdate ? 'ageGroup' : 'birthdate');

  if (isChecked(data.sameLegalName)) optional.push('legalName');
  if (isChecked(data.noCellphone) || !attendee?.ribbons.includes(Ribbon.DEALER)) {
    optional.push('cellphone');
  }
  if (isChecked(data.noOnsiteContact)) optional.push('onsiteContact');

  return optional;
}

/**
 * Fields whose required check is waived for this submission.
 */
export function getOptionalFields(
  section: FormSection,
  data: Record<string, unknown>,
  attendee: FormAttendee
): string[] {
  switch (section) {
    case 'personal_info':
      return personalInfoOptionalFields(data, attendee);
    default:
      return [];
  }
}

// ============================================================================
// Locked Fields
// ============================================================================

/**
 * Fields a non-admin may not change on this attendee.
 */
export function getNonAdminLockedFields(
  section: FormSection,
  attendee: FormAttendee,
  options: LockOptions = {}
): string[] {
  const allFields = sectionFieldIds(section);

  switch (section) {
    case 'personal_info': {
      if (!attendee || isNew(attendee) || attendee.badgeStatus === BadgeStatus.PENDING) return [];
      if (isLockedOut(attendee)) return allFields;
      if (attendee.placeholder) return [];
      return ['firstName', 'lastName', 'legalName', 'sameLegalName'];
    }

    case 'badge_extras': {
      if (!attendee || isNew(attendee)) return [];
      if (isLockedOut(attendee)) return allFields;
      if (options.hasActiveReceipt || attendee.badgeStatus === BadgeStatus.DEFERRED) {
        return ['badgeType', 'amountExtra', 'extraDonation'];
      }
      if (Object.keys(convention.prices.badgeTypes).length === 0) return ['badgeType'];
      return [];
    }

    case 'other_info':
    case 'prereg_other_info': {
      const locked: string[] = [];
      // Admin field, shown to placeholders on their confirmation page
      if (!attendee?.placeholder) locked.push('placeholder');
      if (!attendee || isNew(attendee)) return locked;
      if (isLockedOut(attendee)) return allFields;
      if (attendee.badgeType === BadgeType.STAFF || attendee.badgeType === BadgeType.CONTRACTOR) {
        locked.push('staffing');
      }
      return locked;
    }

    case 'consents':
      return needsPiiConsent(attendee) ? [] : ['piiConsent'];

    case 'admin_info':
      return allFields;
  }
}

/**
 * Drop locked fields (and their aliases) from non-admin input.
 */
export function stripLockedFields(
  section: FormSection,
  data: Record<string, unknown>,
  attendee: FormAttendee,
  options: LockOptions = {}
): Record<string, unknown> {
  const locked = new Set(getNonAdminLockedFields(section, attendee, options));
  const aliases = FIELD_ALIASES[section] ?? {};
  for (const field of [...locked]) {
    for (const alias of aliases[field] ?? []) locked.add(alias);
  }

  return Object.fromEntries(Object.entries(data).filter(([key]) => !locked.has(key)));
}
