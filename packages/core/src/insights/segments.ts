import type { SegmentDefinition } from './types.js';

export function defaultSegments(): SegmentDefinition[] {
  return [
    {
      name: 'High Value Customers',
      description: 'Customers with high lifetime points',
      segmentType: 'value',
      criteria: { min_lifetime_points: 5000 },
    },
    {
      name: 'At Risk Customers',
      description: 'Customers with high churn risk',
      segmentType: 'churn_risk',
      criteria: { min_churn_risk: 0.7 },
    },
    {
      name: 'New Customers',
      description: 'Customers who joined in the last 30 days',
      segmentType: 'behavioral',
      criteria: { max_days_since_joined: 30 },
    },
    {
      name: 'Inactive Customers',
      description: 'Customers with no activity in the last 60 days',
      segmentType: 'behavioral',
      criteria: { min_days_since_activity: 60 },
    },
  ];
}

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SegmentMember {
  lifetimePoints: number;
  createdAt: Date;
  lastActivity: Date;
  churnRiskScore: number | null;
}

function daysBetween(from: Date, to: Date): number {
  return Math.max(0, Math.floor((to.getTime() - from.getTime()) / DAY_MS));
}

/** Every criterion must hold; unknown criteria never match. */
export function matchesSegment(definition: SegmentDefinition, member: SegmentMember, now: Date): boolean {
  return Object.entries(definition.criteria).every(([criterion, threshold]) => {
    switch (criterion) {
      case 'min_lifetime_points':
        return member.lifetimePoints >= threshold;
      case 'min_churn_risk':
        return member.churnRiskScore !== null && member.churnRiskScore >= threshold;
      case 'max_days_since_joined':
        return daysBetween(member.createdAt, now) <= threshold;
      case 'min_days_since_activity':
        return daysBetween(member.lastActivity, now) >= threshold;
      default:
        return false;
    }
  });
}

export function countSegmentMembers(
  definition: SegmentDefinition,
  members: readonly SegmentMember[],
  now: Date,
): number {
  return members.filter((member) => matchesSegment(definition, member, now)).length;
}
