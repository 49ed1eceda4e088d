import type {
  Business,
  BusinessConfig,
  Offer,
  Redemption,
  Tier,
  Wallet,
  WalletTransaction,
} from '@pointwell/core';

function iso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

export function businessJson(business: Business) {
  return {
    business_id: business.id,
    slug: business.slug,
    name: business.name,
    email: business.email,
    category: business.category,
    point_value: business.pointValue,
    points_per_currency: business.pointsPerCurrency,
    is_active: business.isActive,
    is_verified: business.isVerified,
  };
}

export function configJson(config: BusinessConfig) {
  return {
    business_id: config.businessId,
    enable_point_expiry: config.enablePointExpiry,
    point_expiry_days: config.pointExpiryDays,
    enable_cross_business_redemption: config.enableCrossBusinessRedemption,
    cross_business_conversion_rate: config.crossBusinessConversionRate,
  };
}

export function tierJson(tier: Tier) {
  return {
    tier_id: tier.id,
    name: tier.name,
    description: tier.description,
    minimum_points: tier.minimumPoints,
    point_multiplier: tier.pointMultiplier,
    special_offers: tier.specialOffers,
    priority_support: tier.prioritySupport,
    exclusive_events: tier.exclusiveEvents,
    color_code: tier.colorCode,
  };
}

export function offerJson(offer: Offer) {
  return {
    offer_id: offer.id,
    business_id: offer.businessId,
    title: offer.title,
    description: offer.description,
    offer_type: offer.type,
    points_required: offer.pointsRequired,
    discount_percentage: offer.discountPercentage,
    discount_amount: offer.discountAmount,
    points_multiplier: offer.pointsMultiplier,
    free_item_description: offer.freeItemDescription,
    is_active: offer.isActive,
    valid_from: offer.validFrom.toISOString(),
    valid_until: iso(offer.validUntil),
    specific_tier_id: offer.specificTierId,
    is_ai_generated: offer.isAiGenerated,
  };
}

export function walletJson(wallet: Wallet) {
  return {
    wallet_id: wallet.id,
    customer_id: wallet.customerId,
    business_id: wallet.businessId,
    points_balance: wallet.pointsBalance,
    lifetime_points: wallet.lifetimePoints,
    current_tier_id: wallet.currentTierId,
    oldest_active_points: iso(wallet.oldestActivePoints),
    last_activity: wallet.lastActivity.toISOString(),
    created_at: wallet.createdAt.toISOString(),
  };
}

export function transactionJson(transaction: WalletTransaction) {
  return {
    transaction_id: transaction.id,
    wallet_id: transaction.walletId,
    points: transaction.points,
    kind: transaction.kind,
    description: transaction.description,
    reference: transaction.reference,
    created_at: transaction.createdAt.toISOString(),
  };
}

export function redemptionJson(redemption: Redemption) {
  return {
    redemption_id: redemption.id,
    wallet_id: redemption.walletId,
    offer_id: redemption.offerId,
    points_used: redemption.pointsUsed,
    code: redemption.code,
    is_used: redemption.isUsed,
    redeemed_at: redemption.redeemedAt.toISOString(),
    used_at: iso(redemption.usedAt),
  };
}

export function serializeTiers(tiers: Tier[]) {
  return [...tiers].sort((a, b) => a.minimumPoints - b.minimumPoints).map(tierJson);
}
