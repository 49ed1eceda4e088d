export type TransactionKind = 'earn' | 'redeem' | 'expire' | 'transfer' | 'bonus' | 'adjustment';

export const OFFER_TYPES = ['discount', 'points_multiplier', 'free_item', 'special_event', 'other'] as const;
export type OfferType = (typeof OFFER_TYPES)[number];

export const BUSINESS_CATEGORIES = [
  'retail',
  'restaurant',
  'hospitality',
  'beauty',
  'entertainment',
  'travel',
  'other',
] as const;
export type BusinessCategory = (typeof BUSINESS_CATEGORIES)[number];

export interface Business {
  id: string;
  slug: string;
  name: string;
  email: string;
  category: BusinessCategory;
  pointValue: number;
  pointsPerCurrency: number;
  isActive: boolean;
  isVerified: boolean;
}

export interface BusinessConfig {
  businessId: string;
  enablePointExpiry: boolean;
  pointExpiryDays: number;
  enableCrossBusinessRedemption: boolean;
  crossBusinessConversionRate: number;
}

export interface Tier {
  id: string;
  businessId: string;
  name: string;
  description: string | null;
  minimumPoints: number;
  pointMultiplier: number;
  specialOffers: boolean;
  prioritySupport: boolean;
  exclusiveEvents: boolean;
  colorCode: string;
}

export interface Wallet {
  id: string;
  customerId: string;
  businessId: string;
  pointsBalance: number;
  /** Never reduced by debits; drives tier membership. */
  lifetimePoints: number;
  currentTierId: string | null;
  /** Stamped by the first credit, kept for expiry policies. */
  oldestActivePoints: Date | null;
  lastActivity: Date;
  createdAt: Date;
}

export interface WalletTransaction {
  id: string;
  walletId: string;
  /** Positive for credits, negative for debits. */
  points: number;
  kind: TransactionKind;
  description: string;
  reference: string | null;
  createdAt: Date;
}

export interface Offer {
  id: string;
  businessId: string;
  title: string;
  description: string;
  type: OfferType;
  /** 0 means the offer is not exchanged for points. */
  pointsRequired: number;
  discountPercentage: number | null;
  discountAmount: number | null;
  pointsMultiplier: number | null;
  freeItemDescription: string | null;
  isActive: boolean;
  validFrom: Date;
  validUntil: Date | null;
  specificTierId: string | null;
  isAiGenerated: boolean;
}

export interface Redemption {
  id: string;
  walletId: string;
  offerId: string;
  pointsUsed: number;
  code: string;
  isUsed: boolean;
  redeemedAt: Date;
  usedAt: Date | null;
}

export interface Logger {
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}
