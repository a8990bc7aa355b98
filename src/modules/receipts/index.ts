// Services
export {
  getOrCreateReceipt,
  getReceiptById,
  addReceiptItem,
  closeReceipt,
  listReceipts,
  recordManualTransaction,
  cancelTransaction,
  startStripePayment,
  markPaidFromIntentId,
  checkPaidFromStripe,
  updateAmountRefunded,
  refundTransaction,
  handleStripeEvent,
  type ReceiptDetail,
  type ReceiptListRow,
  type StartedPayment,
} from './receipts.service.js';
export {
  formatCurrency,
  itemTotal,
  paymentTotal,
  refundTotal,
  txnTotal,
  currentReceiptAmount,
  currentAmountOwed,
  totalStr,
  allSortedItemsAndTxns,
  summarizeReceipt,
  type ReceiptWithLines,
  type ReceiptSummary,
  type LedgerEntry,
} from './receipts.utils.js';

// Schemas & Types
export {
  OwnerParamSchema,
  ReceiptIdParamSchema,
  TransactionIdParamSchema,
  ListReceiptsQuerySchema,
  AddReceiptItemSchema,
  ManualTransactionSchema,
  RefundTransactionSchema,
  StartPaymentSchema,
  type OwnerParams,
  type ListReceiptsQuery,
  type AddReceiptItemInput,
  type ManualTransactionInput,
  type RefundTransactionInput,
  type StartPaymentInput,
} from './receipts.schema.js';

// Routes
export { receiptsRoutes } from './receipts.routes.js';
export { receiptsPublicRoutes } from './receipts.public.routes.js';
export { stripeWebhookRoutes } from './receipts.webhook.routes.js';
