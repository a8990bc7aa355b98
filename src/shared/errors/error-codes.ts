export const ErrorCodes = {
  // Auth (1xxx)
  UNAUTHORIZED: 'AUTH_1001',
  INVALID_TOKEN: 'AUTH_1002',
  FORBIDDEN: 'AUTH_1004',
  ACCESS_GROUP_INACTIVE: 'AUTH_1005',

  // Validation (2xxx)
  VALIDATION_ERROR: 'VAL_2001',
  FORM_VALIDATION_ERROR: 'VAL_2002',

  // Resource (3xxx)
  NOT_FOUND: 'RES_3001',
  CONFLICT: 'RES_3002',
  BAD_REQUEST: 'RES_3003',

  // Rate Limit (4xxx)
  RATE_LIMITED: 'RATE_4001',

  // Server (5xxx)
  INTERNAL_ERROR: 'SRV_5001',

  // Payments & ledger (6xxx)
  RECEIPT_NOT_FOUND: 'PAY_6001',
  RECEIPT_CLOSED: 'PAY_6002',
  TRANSACTION_NOT_FOUND: 'PAY_6003',
  NOTHING_OWED: 'PAY_6004',
  REFUND_EXCEEDS_PAYMENT: 'PAY_6005',
  NOT_REFUNDABLE: 'PAY_6006',
  PAYMENT_PROVIDER_ERROR: 'PAY_6007',
  PAYMENT_PROVIDER_NOT_CONFIGURED: 'PAY_6008',
  INVALID_WEBHOOK_SIGNATURE: 'PAY_6009',
  TRANSACTION_ALREADY_CANCELLED: 'PAY_6010',
  PAYMENT_IN_PROGRESS: 'PAY_6011',
  PAYMENT_ALREADY_CHARGED: 'PAY_6012',

  // Registration (7xxx)
  ATTENDEE_NOT_FOUND: 'REG_7001',
  GROUP_NOT_FOUND: 'REG_7002',
  MERCH_DISCOUNT_USED: 'REG_7003',
  MERCH_ALREADY_PICKED_UP: 'REG_7004',
  NO_SHIRT_ALREADY_RECORDED: 'REG_7005',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
