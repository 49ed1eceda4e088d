import { answer } from './assistant.js';
import { scoreChurn } from './churn.js';
import { draftOffer } from './offers.js';
import { countSegmentMembers, defaultSegments, matchesSegment, type SegmentMember } from './segments.js';
import type { DayOfWeek, InsightEngine, TimeOfDay } from './types.js';

export * from './types.js';
export { answer, scoreChurn, draftOffer, defaultSegments, countSegmentMembers, matchesSegment };
export type { SegmentMember };

export const ruleBasedInsights: InsightEngine = {
  name: 'rule_based',
  draftOffer,
  scoreChurn,
  answer,
  segments: defaultSegments,
};

export const INSIGHTS_DISABLED_REPLY = "I'm sorry, the AI chatbot service is currently disabled.";

export function timeOfDay(at: Date): TimeOfDay {
  const hour = at.getUTCHours();
  if (hour < 11) return 'morning';
  if (hour >= 18) return 'evening';
  return 'day';
}

export function dayOfWeek(at: Date): DayOfWeek {
  const day = at.getUTCDay();
  return day === 0 || day === 6 ? 'weekend' : 'weekday';
}
