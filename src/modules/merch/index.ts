// Services
export {
  recordArbitraryCharge,
  listArbitraryCharges,
  useMerchDiscount,
  getMerchDiscount,
  recordMerchPickup,
  listMerchPickups,
  recordMPointsForCash,
  listMPointsForCash,
  recordOldMPointExchange,
  listOldMPointExchanges,
  recordNoShirt,
  listNoShirts,
  recordSale,
  listSales,
  getSalesSummary,
  type SalesSummaryRow,
} from './merch.service.js';

// Schemas & Types
export {
  RecordArbitraryChargeSchema,
  RecordMerchPickupSchema,
  RecordMPointsSchema,
  RecordNoShirtSchema,
  RecordSaleSchema,
  ListMerchQuerySchema,
  SalesSummaryQuerySchema,
  type RecordArbitraryChargeInput,
  type RecordMerchPickupInput,
  type RecordMPointsInput,
  type RecordNoShirtInput,
  type RecordSaleInput,
  type ListMerchQuery,
  type SalesSummaryQuery,
} from './merch.schema.js';

// Routes
export { merchRoutes } from './merch.routes.js';
