import { describe, it, expect } from 'vitest';
import { getSectionDefinition, isInvalidPhoneNumber, validateSection } from './forms.service.js';
import { createMockAttendee } from '../../../tests/helpers/factories.js';

function personalInfo(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    firstName: 'Robin',
    lastName: 'Lee',
    sameLegalName: true,
    email: 'robin@example.com',
    cellphone: '(555) 555-0123',
    birthdate: '1990-05-17',
    ecName: 'Sam Lee',
    ecPhone: '555-555-0199',
    onsiteContact: '',
    noOnsiteContact: true,
    address1: '1 Main St',
    city: 'Springfield',
    region: 'NY',
    zipCode: '10001',
    country: 'United States',
    ...overrides,
  };
}

function lockedIds(definition: ReturnType<typeof getSectionDefinition>): string[] {
  return definition.fields.filter((field) => field.locked).map((field) => field.id);
}

describe('Forms Service', () => {
  describe('isInvalidPhoneNumber', () => {
    it('should accept US numbers with punctuation or a leading 1', () => {
      expect(isInvalidPhoneNumber('(555) 555-0123')).toBe(false);
      expect(isInvalidPhoneNumber('15555550123')).toBe(false);
    });

    it('should accept international numbers with a country code', () => {
      expect(isInvalidPhoneNumber('+44 20 7946 0958')).toBe(false);
    });

    it('should reject short numbers', () => {
      expect(isInvalidPhoneNumber('555-0123')).toBe(true);
      expect(isInvalidPhoneNumber('+12')).toBe(true);
    });
  });

  describe('validateSection: personal_info', () => {
    it('should accept a complete new registration', () => {
      const result = validateSection('personal_info', personalInfo());

      expect(result.errors).toEqual([]);
      expect(result.valid).toBe(true);
      expect(result.data).toMatchObject({
        firstName: 'Robin',
        sameLegalName: true,
        onsiteContact: '',
        noOnsiteContact: true,
      });
    });

    it('should report a missing required field with its label', () => {
      const result = validateSection('personal_info', personalInfo({ firstName: '  ' }));

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        { fieldId: 'firstName', fieldName: 'First Name', message: 'Please provide your first name.' },
      ]);
    });

    it('should require the legal name unless it matches', () => {
      const result = validateSection('personal_info', personalInfo({ sameLegalName: false }));

      expect(result.errors.map((error) => error.fieldId)).toEqual(['legalName']);
    });

    it('should reject an invalid email address', () => {
      const result = validateSection('personal_info', personalInfo({ email: 'not-an-email' }));

      expect(result.errors).toEqual([
        { fieldId: 'email', fieldName: 'Email Address', message: 'Invalid email address.' },
      ]);
    });

    it('should reject a phone number matching the emergency contact', () => {
      const result = validateSection(
        'personal_info',
        personalInfo({ cellphone: '5555550199', ecPhone: '5555550199' })
      );

      expect(result.errors).toEqual([
        {
          fieldId: 'cellphone',
          fieldName: 'Phone Number',
          message: 'Your phone number cannot be the same as your emergency contact number.',
        },
      ]);
    });

    it('should reject a birthdate in the future', () => {
      const result = validateSection('personal_info', personalInfo({ birthdate: '2999-01-01' }));

      expect(result.errors).toEqual([
        { fieldId: 'birthdate', fieldName: 'Date of Birth', message: 'You cannot be born in the future.' },
      ]);
    });

    it('should waive the region for international attendees', () => {
      const result = validateSection(
        'personal_info',
        personalInfo({ international: true, region: '', ecPhone: '+44 20 7946 0958' })
      );

      expect(result.valid).toBe(true);
    });
  });

  describe('validateSection: badge_extras', () => {
    it('should require a shirt size with pre-ordered merch', () => {
      const result = validateSection('badge_extras', { badgeType: 'ATTENDEE', amountExtra: 2000, shirt: 0 });

      expect(result.errors).toEqual([
        { fieldId: 'shirt', fieldName: 'Shirt Size', message: 'Please select a shirt size.' },
      ]);
    });

    it('should require a shirt size for badges that include one', () => {
      const result = validateSection('badge_extras', { badgeType: 'SPONSOR', shirt: 0 });

      expect(result.errors.map((error) => error.message)).toEqual(['Please select a shirt size.']);
    });

    it('should read the upgrade field as the badge type', () => {
      const result = validateSection('badge_extras', { upgradeBadgeType: 'SPONSOR', shirt: '2' });

      expect(result.valid).toBe(true);
      expect(result.data).toEqual({ badgeType: 'SPONSOR', shirt: 2 });
    });

    it('should not sell staff-assigned badges', () => {
      const result = validateSection('badge_extras', { badgeType: 'STAFF' });

      expect(result.errors).toEqual([
        { fieldId: 'badgeType', fieldName: 'Badge Type', message: 'Not a valid choice.' },
      ]);
    });

    it('should check integer amounts', () => {
      const negative = validateSection('badge_extras', { extraDonation: -5 });
      const notANumber = validateSection('badge_extras', { extraDonation: 'abc' });

      expect(negative.errors[0]?.message).toBe('Extra donation must be a number that is 0 or higher.');
      expect(notANumber.errors[0]?.message).toBe('Not a valid integer value.');
    });

    it('should limit the printed badge name', () => {
      const result = validateSection('badge_extras', { badgePrintedName: 'ABCDEFGHIJKLMNOPQRSTU' });

      expect(result.errors[0]?.message).toBe(
        'Your printed badge name is too long. Please use less than 20 characters.'
      );
    });
  });

  describe('validateSection: other info', () => {
    it('should require a cellphone from volunteers', () => {
      const result = validateSection('prereg_other_info', { staffing: true });

      expect(result.errors).toEqual([
        {
          fieldId: 'cellphone',
          fieldName: 'Phone Number',
          message: 'A cellphone number is required for volunteers.',
        },
      ]);
    });

    it('should check every multi-select choice', () => {
      expect(validateSection('other_info', { interests: [1, 9] }).errors[0]?.message).toBe(
        'Not a valid choice.'
      );
      expect(validateSection('other_info', { interests: [1, 2] }).data.interests).toEqual([1, 2]);
    });
  });

  describe('validateSection: consents', () => {
    it('should require personal data consent from new registrations', () => {
      const result = validateSection('consents', { canSpam: true });

      expect(result.errors.map((error) => error.fieldId)).toEqual(['piiConsent']);
      expect(result.data.canSpam).toBe(true);
    });
  });

  describe('locked fields', () => {
    it('should lock names on a completed registration', () => {
      const attendee = createMockAttendee({ badgeStatus: 'COMPLETED' });

      expect(lockedIds(getSectionDefinition('personal_info', attendee))).toEqual([
        'firstName',
        'lastName',
        'sameLegalName',
        'legalName',
      ]);
    });

    it('should lock nothing for admins', () => {
      const attendee = createMockAttendee({ badgeStatus: 'COMPLETED' });

      expect(lockedIds(getSectionDefinition('personal_info', attendee, { isAdmin: true }))).toEqual([]);
    });

    it('should lock purchases once the receipt has charges', () => {
      const attendee = createMockAttendee({ badgeStatus: 'COMPLETED' });

      expect(
        lockedIds(getSectionDefinition('badge_extras', attendee, { hasActiveReceipt: true }))
      ).toEqual(['badgeType', 'amountExtra', 'extraDonation']);
    });

    it('should drop locked fields from attendee edits', () => {
      const attendee = createMockAttendee({ badgeStatus: 'COMPLETED', firstName: 'Robin' });

      const result = validateSection('personal_info', personalInfo({ firstName: 'Changed' }), attendee);

      expect(result.data.firstName).toBeUndefined();
      expect(result.valid).toBe(true);
    });
  });
});
