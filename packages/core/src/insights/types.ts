import type { Offer, OfferType } from '../types.js';

export type TimeOfDay = 'morning' | 'day' | 'evening';
export type DayOfWeek = 'weekday' | 'weekend';

export interface OfferDraftContext {
  pointsBalance: number;
  timeOfDay: TimeOfDay;
  dayOfWeek: DayOfWeek;
  now: Date;
  choose<T>(options: readonly T[]): T;
}

export interface OfferDraft {
  title: string;
  description: string;
  type: OfferType;
  pointsRequired: number;
  discountPercentage: number | null;
  pointsMultiplier: number | null;
  freeItemDescription: string | null;
  validFrom: Date;
  validUntil: Date;
}

export interface WalletSnapshot {
  pointsBalance: number;
  lastActivity: Date;
}

export interface AssistantContext {
  wallet: WalletSnapshot | null;
  activeOffers: Array<Pick<Offer, 'title' | 'pointsRequired'>>;
}

export interface ChurnScore {
  churnRiskScore: number;
  engagementScore: number;
  daysSinceLastActivity: number;
}

export type SegmentType = 'demographic' | 'behavioral' | 'value' | 'churn_risk' | 'custom';

export interface SegmentDefinition {
  name: string;
  description: string;
  segmentType: SegmentType;
  criteria: Record<string, number>;
}

export interface InsightEngine {
  name: string;
  draftOffer(context: OfferDraftContext): OfferDraft;
  scoreChurn(wallet: WalletSnapshot, now: Date): ChurnScore;
  answer(query: string, context: AssistantContext): string;
  segments(): SegmentDefinition[];
}

export const INSIGHT_JOB_TYPES = ['churn_scan', 'segments'] as const;
export type InsightJobType = (typeof INSIGHT_JOB_TYPES)[number];
