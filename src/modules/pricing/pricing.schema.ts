import { z } from 'zod';
import { BADGE_TYPES } from '@shared/constants/convention.js';

// ============================================================================
// Response Schemas
// ============================================================================

export const PriceBumpSchema = z.object({
  date: z.date(),
  price: z.number().int(),
});

export const PricingOverviewSchema = z.object({
  currency: z.string(),
  phase: z.enum(['PRE_CON', 'AT_THE_CON', 'POST_CON']),
  attendeePrice: z.number().int(),
  onedayPrice: z.number().int(),
  upcomingAttendeeBumps: z.array(PriceBumpSchema),
  upcomingOnedayBumps: z.array(PriceBumpSchema),
  presoldOneday: z.record(z.enum(BADGE_TYPES), z.number().int()),
  badgeTypes: z.record(z.enum(BADGE_TYPES), z.number().int()),
  tables: z.array(
    z.object({
      tables: z.number().int(),
      label: z.string(),
      price: z.number().int(),
    })
  ),
});

// ============================================================================
// Types
// ============================================================================

export type PriceBump = z.infer<typeof PriceBumpSchema>;
export type PricingOverview = z.infer<typeof PricingOverviewSchema>;
