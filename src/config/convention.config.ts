import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import safeRegex from 'safe-regex';
import { config } from './app.config.js';
import { BADGE_TYPES } from '@shared/constants/convention.js';

// ============================================================================
// Schema
// ============================================================================

const PriceBumpSchema = z.object({
  date: z.coerce.date(),
  price: z.number().int().min(0),
});

const ChoiceSchema = z.object({
  value: z.number().int(),
  label: z.string().min(1),
});

const AgeGroupSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  discount: z.number().int().min(0).default(0),
  underThirteen: z.boolean().default(false),
});

export const ConventionConfigSchema = z
  .object({
    eventName: z.string().min(1),
    organizationName: z.string().min(1),
    currency: z.string().length(3).default('USD'),
    timezone: z.string().default('UTC'),
    epoch: z.coerce.date(),
    eschaton: z.coerce.date(),
    prices: z.object({
      initialAttendee: z.number().int().min(0),
      attendeeBumps: z.array(PriceBumpSchema).default([]),
      initialOneday: z.number().int().min(0),
      onedayBumps: z.array(PriceBumpSchema).default([]),
      presoldOneday: z.record(z.enum(BADGE_TYPES), z.number().int().min(0)).default({}),
      badgeTypes: z.record(z.enum(BADGE_TYPES), z.number().int().min(0)).default({}),
      tables: z.array(z.number().int().min(0)).min(1),
      power: z.array(z.number().int().min(0)).min(1),
    }),
    tableOptions: z.array(z.string()).default([]),
    powerOptions: z.array(z.string()).default([]),
    dealerPaymentDays: z.number().int().min(0).default(14),
    maxDealers: z.number().int().min(0).default(0),
    ageGroups: z.array(AgeGroupSchema).min(1),
    shirtOptions: z.array(ChoiceSchema).min(1),
    noShirt: z.number().int().default(0),
    jobInterestOptions: z.array(ChoiceSchema).default([]),
    interestOptions: z.array(ChoiceSchema).default([]),
    fursuitingOptions: z.array(ChoiceSchema).default([]),
    validBadgePrintedChars: z
      .string()
      .refine((pattern) => safeRegex(pattern), 'Badge name pattern allows catastrophic backtracking'),
    volunteerPerksUrl: z.string().url().optional(),
    privacyPolicyUrl: z.string().url().optional(),
    features: z
      .object({
        collectExactBirthdate: z.boolean().default(true),
        collectFullAddress: z.boolean().default(true),
        allowMarketingOptIn: z.boolean().default(true),
        hotelsEnabled: z.boolean().default(false),
        donationsEnabled: z.boolean().default(false),
        accessibilityServicesEnabled: z.boolean().default(false),
      })
      .default({}),
  })
  .refine((value) => value.epoch < value.eschaton, {
    message: 'Event start must be before event end',
    path: ['eschaton'],
  });

export type ConventionConfig = z.infer<typeof ConventionConfigSchema>;
export type AgeGroup = z.infer<typeof AgeGroupSchema>;
export type Choice = z.infer<typeof ChoiceSchema>;

const CountryAltSpellingsSchema = z.record(z.string(), z.string());

// ============================================================================
// Loading
// ============================================================================

/**
 * Read and validate a convention settings file.
 * Price bumps are sorted by date so lookups can walk them in order.
 */
export function loadConventionConfig(filePath: string): ConventionConfig {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  const parsed = ConventionConfigSchema.parse(raw);

  parsed.prices.attendeeBumps.sort((a, b) => a.date.getTime() - b.date.getTime());
  parsed.prices.onedayBumps.sort((a, b) => a.date.getTime() - b.date.getTime());

  return parsed;
}

/**
 * Country names mapped to space-separated alternative spellings,
 * read from countries.json beside the convention settings file.
 */
export function loadCountryAltSpellings(conventionPath: string): Record<string, string> {
  const filePath = path.join(path.dirname(conventionPath), 'countries.json');
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  return CountryAltSpellingsSchema.parse(raw);
}

const conventionPath = path.resolve(process.cwd(), config.CONVENTION_CONFIG_PATH);

export const convention = loadConventionConfig(conventionPath);
export const countryAltSpellings = loadCountryAltSpellings(conventionPath);
