import type { ChurnScore, WalletSnapshot } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_RISK = 0.95;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function baseEngagement(daysIdle: number): number {
  if (daysIdle <= 7) return 0.9;
  if (daysIdle <= 30) return 0.7;
  if (daysIdle <= 90) return 0.4;
  return 0.1;
}

export function scoreChurn(wallet: WalletSnapshot, now: Date): ChurnScore {
  const daysSinceLastActivity = Math.max(0, Math.floor((now.getTime() - wallet.lastActivity.getTime()) / DAY_MS));

  let engagement = baseEngagement(daysSinceLastActivity);
  if (wallet.pointsBalance > 1000) {
    engagement += 0.2;
  } else if (wallet.pointsBalance < 100) {
    engagement -= 0.1;
  }

  const engagementScore = round2(engagement);
  const churnRiskScore = round2(Math.max(0, Math.min(1 - engagementScore, MAX_RISK)));

  return { churnRiskScore, engagementScore, daysSinceLastActivity };
}
