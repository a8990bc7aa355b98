import { convention, countryAltSpellings, type Choice } from '@config/convention.config.js';
import {
  BADGE_STATUSES,
  BADGE_TYPES,
  BadgeType,
  PAID_STATUSES,
  RIBBONS,
  type BadgeTypeValue,
} from '@shared/constants/convention.js';
import type { FieldChoice, FieldDefinition, FormSection } from './forms.schema.js';

const BOOSTED_COUNTRIES = ['Australia', 'Canada', 'United States', 'United Kingdom'];

// Badges handed out by staff rather than bought
const ASSIGNED_BADGE_TYPES: readonly BadgeTypeValue[] = [
  BadgeType.STAFF,
  BadgeType.CONTRACTOR,
  BadgeType.GUEST,
];

export const PURCHASABLE_BADGE_TYPES = BADGE_TYPES.filter(
  (type) => !ASSIGNED_BADGE_TYPES.includes(type)
);

const PHONE_PLACEHOLDER = 'A phone number we can use to contact you during the event';

// ============================================================================
// Choices
// ============================================================================

function toChoices(options: Choice[]): FieldChoice[] {
  return options.map((option) => ({ value: option.value, label: option.label }));
}

function enumChoices(values: readonly string[]): FieldChoice[] {
  return values.map((value) => ({ value, label: value }));
}

/**
 * Country options for the type-ahead select. Alternative spellings let
 * "USA" find "United States"; the main English-speaking countries sort first.
 */
export function countryChoices(): FieldChoice[] {
  return Object.keys(countryAltSpellings).map((country) => {
    const choice: FieldChoice = { value: country, label: country };
    const spellings = countryAltSpellings[country];
    if (spellings) {
      choice.alternativeSpellings = spellings;
      if (BOOSTED_COUNTRIES.includes(country)) {
        choice.relevancyBooster = 2;
      }
    }
    return choice;
  });
}

// ============================================================================
// Labels
// ============================================================================

/**
 * Consent wording lists every optional use of personal data the event has enabled.
 */
export function buildPiiConsentLabel(): string {
  const base =
    `Yes, I understand and agree that ${convention.organizationName} will store the personal ` +
    'information I provided above for the limited purposes of contacting me about my registration';
  let label = base;
  if (convention.features.hotelsEnabled) label += ', hotel accommodations';
  if (convention.features.donationsEnabled) label += ', donations';
  if (convention.features.accessibilityServicesEnabled) label += ', accessibility needs';
  if (label !== base) label += ',';
  return `${label} or volunteer opportunities selected at sign-up.`;
}

// ============================================================================
// Section Definitions
// ============================================================================

function addressFields(): FieldDefinition[] {
  return [
    {
      id: 'address1',
      label: 'Address Line 1',
      widget: 'text',
      validation: { required: 'Please enter a street address.' },
    },
    { id: 'address2', label: 'Address Line 2', widget: 'text' },
    {
      id: 'city',
      label: 'City',
      widget: 'text',
      validation: { required: 'Please enter a city.' },
    },
    {
      id: 'region',
      label: 'State/Province/Region',
      widget: 'text',
      validation: { required: 'Please enter a state, province, or region.' },
    },
    {
      id: 'zipCode',
      label: 'Zip/Postal Code',
      widget: 'text',
      validation: { required: 'Please enter a zip or postal code.' },
    },
    {
      id: 'country',
      label: 'Country',
      widget: 'country_select',
      choices: countryChoices(),
      validation: { required: 'Please enter a country.' },
    },
  ];
}

function personalInfoFields(): FieldDefinition[] {
  return [
    {
      id: 'firstName',
      label: 'First Name',
      widget: 'text',
      validation: { required: 'Please provide your first name.' },
    },
    {
      id: 'lastName',
      label: 'Last Name',
      widget: 'text',
      validation: { required: 'Please provide your last name.' },
    },
    {
      id: 'sameLegalName',
      label: 'The above name is exactly what appears on my Legal Photo ID.',
      widget: 'checkbox',
    },
    {
      id: 'legalName',
      label: 'Name as appears on Legal Photo ID',
      widget: 'text',
      placeholder: 'First and last name exactly as they appear on Photo ID',
      validation: {
        required:
          'Please provide the name on your photo ID or indicate that your first and last name match your ID.',
      },
    },
    {
      id: 'email',
      label: 'Email Address',
      widget: 'email',
      placeholder: 'test@example.com',
      validation: {
        required: 'Please enter an email address.',
        maxLength: { value: 255, message: 'Email addresses cannot be longer than 255 characters.' },
      },
    },
    {
      id: 'cellphone',
      label: 'Phone Number',
      widget: 'tel',
      placeholder: PHONE_PLACEHOLDER,
      validation: { required: 'Please provide a phone number.' },
    },
    {
      id: 'birthdate',
      label: 'Date of Birth',
      widget: 'date',
      validation: { required: 'Please enter your date of birth.' },
    },
    {
      id: 'ageGroup',
      label: 'Age Group',
      widget: 'select',
      choices: convention.ageGroups.map((group) => ({ value: group.id, label: group.label })),
      validation: { required: 'Please select your age group.' },
    },
    {
      id: 'ecName',
      label: 'Emergency Contact Name',
      widget: 'text',
      placeholder: 'Who we should contact if something happens to you',
      validation: { required: 'Please tell us the name of your emergency contact.' },
    },
    {
      id: 'ecPhone',
      label: 'Emergency Contact Phone',
      widget: 'tel',
      placeholder: 'A valid phone number for your emergency contact',
      validation: { required: 'Please give us an emergency contact phone number.' },
    },
    {
      id: 'onsiteContact',
      label: 'Onsite Contact',
      widget: 'textarea',
      placeholder:
        'Contact info for a trusted friend or friends who will be at or near the venue during the event',
      validation: {
        required:
          'Please enter contact information for at least one trusted friend onsite, or indicate that we should use your emergency contact information instead.',
        maxLength: {
          value: 500,
          message:
            'You have entered over 500 characters of onsite contact information. Please provide contact information for fewer friends.',
        },
      },
    },
    { id: 'noCellphone', label: "I won't have a phone with me during the event.", widget: 'checkbox' },
    {
      id: 'noOnsiteContact',
      label: 'My emergency contact is also on site with me at the event.',
      widget: 'checkbox',
    },
    { id: 'international', label: "I'm coming from outside the US.", widget: 'checkbox' },
    ...addressFields(),
  ];
}

function badgeExtrasFields(): FieldDefinition[] {
  return [
    {
      id: 'badgeType',
      label: 'Badge Type',
      widget: 'hidden',
      choices: enumChoices(PURCHASABLE_BADGE_TYPES),
    },
    {
      id: 'upgradeBadgeType',
      label: 'Badge Type',
      widget: 'hidden',
      choices: enumChoices(PURCHASABLE_BADGE_TYPES),
    },
    {
      id: 'amountExtra',
      label: 'Pre-order Merch',
      widget: 'hidden',
      valueType: 'integer',
      validation: {
        min: { value: 0, message: 'Amount extra must be a number that is 0 or higher.' },
      },
    },
    {
      id: 'extraDonation',
      label: 'Extra Donation',
      widget: 'dollar',
      validation: {
        min: { value: 0, message: 'Extra donation must be a number that is 0 or higher.' },
      },
    },
    { id: 'shirt', label: 'Shirt Size', widget: 'select', choices: toChoices(convention.shirtOptions) },
    {
      id: 'badgePrintedName',
      label: 'Name Printed on Badge',
      widget: 'text',
      description: 'Badge names have a maximum of 20 characters.',
      validation: {
        maxLength: {
          value: 20,
          message: 'Your printed badge name is too long. Please use less than 20 characters.',
        },
        pattern: {
          value: convention.validBadgePrintedChars,
          message:
            'Your printed badge name has invalid characters. Please use only alphanumeric characters and symbols.',
        },
      },
    },
  ];
}

function otherInfoFields(): FieldDefinition[] {
  return [
    { id: 'placeholder', label: 'Placeholder', widget: 'hidden', valueType: 'boolean' },
    {
      id: 'staffing',
      label: 'I am interested in volunteering!',
      widget: 'switch',
      description: convention.volunteerPerksUrl,
    },
    {
      id: 'requestedDeptIds',
      label: 'Where do you want to help?',
      widget: 'multi_checkbox',
      choices: toChoices(convention.jobInterestOptions),
    },
    {
      id: 'requestedAccessibilityServices',
      label: `I would like to be contacted by the ${convention.eventName} Accessibility Services department prior to the event and I understand my contact information will be shared with Accessibility Services for this purpose.`,
      widget: 'switch',
    },
    {
      id: 'interests',
      label: 'What interests you?',
      widget: 'multi_checkbox',
      choices: toChoices(convention.interestOptions),
    },
    {
      id: 'fursuiting',
      label: 'Will you be fursuiting?',
      widget: 'select',
      choices: toChoices(convention.fursuitingOptions),
    },
  ];
}

function preregOtherInfoFields(): FieldDefinition[] {
  return [
    ...otherInfoFields(),
    { id: 'promoCode', label: 'Promo Code', widget: 'text' },
    {
      id: 'cellphone',
      label: 'Phone Number',
      widget: 'tel',
      placeholder: PHONE_PLACEHOLDER,
      description: 'A cellphone number is required for volunteers.',
    },
    { id: 'noCellphone', label: "I won't have a phone with me during the event.", widget: 'checkbox' },
  ];
}

function consentsFields(): FieldDefinition[] {
  return [
    {
      id: 'canSpam',
      label: `Please send me emails relating to ${convention.eventName} and ${convention.organizationName} in future years.`,
      widget: 'checkbox',
    },
    {
      id: 'piiConsent',
      label: buildPiiConsentLabel(),
      widget: 'checkbox',
      description: convention.privacyPolicyUrl,
      validation: {
        required:
          'You must agree to allow us to store your personal information in order to register.',
      },
    },
  ];
}

function adminInfoFields(): FieldDefinition[] {
  return [
    { id: 'placeholder', label: 'Placeholder', widget: 'checkbox' },
    { id: 'groupId', label: 'Group', widget: 'text' },
    {
      id: 'badgeStatus',
      label: 'Badge Status',
      widget: 'select',
      choices: enumChoices(BADGE_STATUSES),
    },
    { id: 'paid', label: 'Paid Status', widget: 'select', choices: enumChoices(PAID_STATUSES) },
    { id: 'ribbons', label: 'Ribbons', widget: 'multi_checkbox', choices: enumChoices(RIBBONS) },
    {
      id: 'overriddenPrice',
      label: 'Overridden Price',
      widget: 'dollar',
      validation: { min: { value: 0, message: 'Overridden price must be 0 or higher.' } },
    },
    { id: 'compedReason', label: 'Comped Reason', widget: 'text' },
    { id: 'forReview', label: 'Notes for Review', widget: 'textarea' },
  ];
}

const SECTION_BUILDERS: Record<FormSection, () => FieldDefinition[]> = {
  personal_info: personalInfoFields,
  badge_extras: badgeExtrasFields,
  other_info: otherInfoFields,
  prereg_other_info: preregOtherInfoFields,
  consents: consentsFields,
  admin_info: adminInfoFields,
};

export function getSectionFields(section: FormSection): FieldDefinition[] {
  return SECTION_BUILDERS[section]();
}

/**
 * Alternate input names accepted for a field.
 */
export const FIELD_ALIASES: Partial<Record<FormSection, Record<string, string[]>>> = {
  badge_extras: { badgeType: ['upgradeBadgeType'] },
};
