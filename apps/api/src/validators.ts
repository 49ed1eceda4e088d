import { BUSINESS_CATEGORIES, INSIGHT_JOB_TYPES, OFFER_TYPES } from '@pointwell/core';
import { z } from 'zod';

const isoDate = z
  .string()
  .refine((value: string) => !Number.isNaN(Date.parse(value)), 'must be an ISO date')
  .transform((value) => new Date(value));

// Amount rules live in the ledger so they answer with its error code.
const points = z.number().finite();
const hexColour = z.string().regex(/^#[0-9a-fA-F]{6}$/, 'must be a hex colour such as #cd7f32');

export const createBusinessSchema = z.object({
  name: z.string().trim().min(1).max(200),
  email: z.string().email(),
  category: z.enum(BUSINESS_CATEGORIES).default('other'),
  point_value: z.number().positive().optional(),
  points_per_currency: z.number().positive().optional(),
});

export const businessConfigSchema = z
  .object({
    enable_point_expiry: z.boolean(),
    point_expiry_days: z.number().int().positive(),
    enable_cross_business_redemption: z.boolean(),
    cross_business_conversion_rate: z.number().positive(),
  })
  .partial();

const tierSchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: z.string().nullable().optional(),
  minimum_points: z.number().int().nonnegative(),
  point_multiplier: z.number().positive().default(1),
  special_offers: z.boolean().default(false),
  priority_support: z.boolean().default(false),
  exclusive_events: z.boolean().default(false),
  color_code: hexColour.default('#000000'),
});

export const tierCatalogSchema = z.object({
  tiers: z
    .array(tierSchema)
    .min(1)
    .refine(
      (tiers) => new Set(tiers.map((tier) => tier.minimum_points)).size === tiers.length,
      'minimum_points must be unique within a catalog',
    ),
});

export type TierInput = z.infer<typeof tierSchema>;

const offerFields = {
  title: z.string().trim().min(1).max(200),
  description: z.string().default(''),
  offer_type: z.enum(OFFER_TYPES),
  points_required: z.number().int().nonnegative().default(0),
  discount_percentage: z.number().int().min(0).max(100).nullable().optional(),
  discount_amount: z.number().nonnegative().nullable().optional(),
  points_multiplier: z.number().positive().nullable().optional(),
  free_item_description: z.string().nullable().optional(),
  is_active: z.boolean().default(true),
  valid_from: isoDate.optional(),
  valid_until: isoDate.nullable().optional(),
  specific_tier_id: z.string().min(1).nullable().optional(),
};

export const createOfferSchema = z.object(offerFields);

export const updateOfferSchema = z
  .object({
    title: offerFields.title,
    description: z.string(),
    points_required: z.number().int().nonnegative(),
    is_active: z.boolean(),
    valid_until: isoDate.nullable(),
    discount_percentage: offerFields.discount_percentage,
    free_item_description: offerFields.free_item_description,
  })
  .partial()
  .refine((patch) => Object.keys(patch).length > 0, 'at least one field must be provided');

export const offerListQuerySchema = z.object({
  active: z.enum(['true', 'false']).optional(),
});

export const suggestOfferSchema = z.object({
  customer_id: z.string().min(1).optional(),
});

export const enrolSchema = z.object({
  customer_id: z.string().min(1),
});

export const creditSchema = z.object({
  points,
  kind: z.enum(['earn', 'bonus', 'transfer', 'adjustment']).default('adjustment'),
  description: z.string().trim().min(1).max(255),
  reference: z.string().min(1).max(100).optional(),
});

export const debitSchema = z.object({
  points,
  kind: z.enum(['redeem', 'expire', 'transfer', 'adjustment']).default('adjustment'),
  description: z.string().trim().min(1).max(255),
  reference: z.string().min(1).max(100).optional(),
});

export const earnSchema = z.object({
  amount: z.number().finite().positive(),
  description: z.string().trim().min(1).max(255).optional(),
  reference: z.string().min(1).max(100).optional(),
});

export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export const redeemSchema = z.object({
  customer_id: z.string().min(1),
  offer_id: z.string().min(1),
});

export const assistantSchema = z.object({
  query: z.string().trim().min(1).max(1000),
  customer_id: z.string().min(1).optional(),
});

export const insightRefreshSchema = z.object({
  jobs: z.array(z.enum(INSIGHT_JOB_TYPES)).min(1).default([...INSIGHT_JOB_TYPES]),
});
