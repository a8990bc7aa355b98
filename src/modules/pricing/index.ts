// Services
export {
  getAttendeePrice,
  getOnedayPrice,
  getPresoldOnedayPrice,
  getBadgeTypePrice,
  hasBadgeTypePrice,
  getTablePrice,
  getPowerPrice,
  getConventionPhase,
  isPreCon,
  isAtTheCon,
  getPricingOverview,
  type ConventionPhase,
} from './pricing.service.js';

// Schemas & Types
export {
  PriceBumpSchema,
  PricingOverviewSchema,
  type PriceBump,
  type PricingOverview,
} from './pricing.schema.js';

// Routes
export { pricingPublicRoutes } from './pricing.routes.js';
