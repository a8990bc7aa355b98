import { faker } from '@faker-js/faker';
import type {
  AccessGroup,
  Attendee,
  Group,
  ModelReceipt,
  ReceiptItem,
  ReceiptTransaction,
  User,
} from '@/database/schema.js';

// ============================================================================
// User Factory
// ============================================================================

export const UserRole = {
  ADMIN: 0,
  STAFF: 1,
} as const;

export function createMockAccessGroup(overrides: Partial<AccessGroup> = {}): AccessGroup {
  return {
    id: faker.string.uuid(),
    name: faker.commerce.department(),
    sections: ['attendees'],
    startTime: null,
    endTime: null,
    createdAt: faker.date.past(),
    updatedAt: faker.date.recent(),
    ...overrides,
  };
}

export function createMockUser(overrides: Partial<User> = {}): User {
  return {
    id: faker.string.alphanumeric(28),
    email: faker.internet.email(),
    name: faker.person.fullName(),
    role: UserRole.STAFF,
    active: true,
    accessGroupId: null,
    createdAt: faker.date.past(),
    updatedAt: faker.date.recent(),
    ...overrides,
  };
}

export function createMockAdmin(overrides: Partial<User> = {}): User {
  return createMockUser({ role: UserRole.ADMIN, ...overrides });
}

// ============================================================================
// Attendee Factory
// ============================================================================

export function createMockAttendee(overrides: Partial<Attendee> = {}): Attendee {
  const firstName = overrides.firstName ?? faker.person.firstName();
  const lastName = overrides.lastName ?? faker.person.lastName();
  return {
    id: faker.string.uuid(),
    groupId: null,
    placeholder: false,
    firstName,
    lastName,
    sameLegalName: true,
    legalName: '',
    email: faker.internet.email({ firstName, lastName }).toLowerCase(),
    cellphone: '5555550123',
    noCellphone: false,
    birthdate: '1990-05-17',
    ageGroup: 'over_18',
    ecName: faker.person.fullName(),
    ecPhone: '5555550199',
    onsiteContact: '',
    noOnsiteContact: true,
    international: false,
    address1: faker.location.streetAddress(),
    address2: '',
    city: faker.location.city(),
    region: 'NY',
    zipCode: '10001',
    country: 'United States',
    badgeType: 'ATTENDEE',
    badgeStatus: 'NEW',
    badgePrintedName: '',
    ribbons: [],
    paid: 'NOT_PAID',
    overriddenPrice: null,
    amountExtra: 0,
    extraDonation: 0,
    shirt: 0,
    promoCode: '',
    staffing: false,
    requestedDeptIds: [],
    requestedAccessibilityServices: false,
    interests: [],
    fursuiting: null,
    canSpam: false,
    piiConsent: true,
    compedReason: '',
    forReview: '',
    printPending: false,
    timesPrinted: 0,
    checkedIn: null,
    registered: new Date('2025-06-01T12:00:00.000Z'),
    createdAt: faker.date.past(),
    updatedAt: faker.date.recent(),
    ...overrides,
  };
}

// ============================================================================
// Group Factory
// ============================================================================

export function createMockGroup(overrides: Partial<Group> = {}): Group {
  return {
    id: faker.string.uuid(),
    name: faker.company.name(),
    tables: 0,
    power: 0,
    powerFee: 0,
    powerUsage: '',
    location: '',
    tableFee: 0,
    taxNumber: '',
    status: 'UNAPPROVED',
    approved: null,
    isDealer: false,
    canAdd: false,
    cost: 0,
    autoRecalc: true,
    leaderId: null,
    createdAt: faker.date.past(),
    updatedAt: faker.date.recent(),
    ...overrides,
  };
}

// ============================================================================
// Receipt Factories
// ============================================================================

export function createMockReceipt(overrides: Partial<ModelReceipt> = {}): ModelReceipt {
  return {
    id: faker.string.uuid(),
    invoiceNum: 0,
    ownerId: faker.string.uuid(),
    ownerModel: 'Attendee',
    closed: null,
    createdAt: new Date('2025-06-01T12:00:00.000Z'),
    ...overrides,
  };
}

export function createMockReceiptItem(overrides: Partial<ReceiptItem> = {}): ReceiptItem {
  return {
    id: faker.string.uuid(),
    receiptId: null,
    amount: 6500,
    count: 1,
    added: new Date('2025-06-01T12:00:00.000Z'),
    closed: null,
    who: 'non-admin',
    desc: 'Attendee badge',
    revertChange: {},
    ...overrides,
  };
}

export function createMockReceiptTransaction(
  overrides: Partial<ReceiptTransaction> = {}
): ReceiptTransaction {
  return {
    id: faker.string.uuid(),
    receiptId: null,
    intentId: null,
    chargeId: null,
    refundId: null,
    method: 'STRIPE',
    amount: 6500,
    refunded: null,
    added: new Date('2025-06-01T12:05:00.000Z'),
    cancelled: null,
    who: 'non-admin',
    desc: '',
    ...overrides,
  };
}
