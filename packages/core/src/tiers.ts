import { TierConfigurationMissingError } from './errors.js';
import type { Tier, Wallet } from './types.js';

export type TierThreshold = Pick<Tier, 'minimumPoints'>;

export interface TierCatalogHelpers {
  getTiers(businessId: string): Promise<Tier[]>;
}

/**
 * Highest-threshold tier the lifetime total qualifies for, or null when the
 * catalog has no tier at or below it.
 */
export function selectTier<T extends TierThreshold>(tiers: readonly T[], lifetimePoints: number): T | null {
  const ordered = [...tiers].sort((a, b) => b.minimumPoints - a.minimumPoints);
  for (const tier of ordered) {
    if (lifetimePoints >= tier.minimumPoints) {
      return tier;
    }
  }
  return null;
}

export async function resolveTier(
  helpers: TierCatalogHelpers,
  businessId: string,
  lifetimePoints: number,
): Promise<Tier | null> {
  const tiers = await helpers.getTiers(businessId);
  return selectTier(tiers, lifetimePoints);
}

export function baselineTier<T extends TierThreshold>(tiers: readonly T[]): T | null {
  return tiers.find((tier) => tier.minimumPoints === 0) ?? null;
}

export function assertBaselineTier<T extends TierThreshold>(businessId: string, tiers: readonly T[]): T {
  const baseline = baselineTier(tiers);
  if (!baseline) {
    throw new TierConfigurationMissingError(businessId);
  }
  return baseline;
}

export interface TierAssignment {
  walletId: string;
  tierId: string | null;
}

/**
 * Tier changes a new catalog implies for existing wallets. Wallets whose tier
 * is unchanged are left out.
 */
export function reassignTiers<T extends TierThreshold & Pick<Tier, 'id'>>(
  tiers: readonly T[],
  wallets: ReadonlyArray<Pick<Wallet, 'id' | 'lifetimePoints' | 'currentTierId'>>,
): TierAssignment[] {
  const assignments: TierAssignment[] = [];
  for (const wallet of wallets) {
    const tierId = selectTier(tiers, wallet.lifetimePoints)?.id ?? null;
    if (tierId !== wallet.currentTierId) {
      assignments.push({ walletId: wallet.id, tierId });
    }
  }
  return assignments;
}
