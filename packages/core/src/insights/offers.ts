import type { OfferDraft, OfferDraftContext } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

type DraftKind = 'discount' | 'points_multiplier' | 'free_item';
const DRAFT_KINDS: readonly DraftKind[] = ['discount', 'points_multiplier', 'free_item'];

function daysFrom(now: Date, days: number): Date {
  return new Date(now.getTime() + days * DAY_MS);
}

function discountDraft(context: OfferDraftContext): OfferDraft {
  const bonus = Math.min(Math.floor(context.pointsBalance / 1000), 15);
  const discount = 10 + bonus + (context.dayOfWeek === 'weekend' ? 5 : 0);

  return {
    title: `${discount}% Off Your Next Purchase`,
    description: `As a valued customer, enjoy ${discount}% off your next purchase!`,
    type: 'discount',
    pointsRequired: Math.max(100, Math.min(Math.floor(context.pointsBalance / 2), 500)),
    discountPercentage: discount,
    pointsMultiplier: null,
    freeItemDescription: null,
    validFrom: context.now,
    validUntil: daysFrom(context.now, 7),
  };
}

function multiplierDraft(context: OfferDraftContext): OfferDraft {
  let multiplier = 2;
  let title = 'Midday Bonus: 2x Points';
  let description = 'Take a break and earn double points on all purchases between 11 AM and 6 PM.';

  if (context.timeOfDay === 'morning') {
    title = 'Morning Boost: 2x Points';
    description = 'Start your day right! Earn double points on all purchases before 11 AM.';
  } else if (context.timeOfDay === 'evening') {
    multiplier = 3;
    title = 'Evening Special: 3x Points';
    description = 'Reward yourself after a long day! Earn triple points on all purchases after 6 PM.';
  }

  return {
    title,
    description,
    type: 'points_multiplier',
    pointsRequired: 0,
    discountPercentage: null,
    pointsMultiplier: multiplier,
    freeItemDescription: null,
    validFrom: context.now,
    validUntil: daysFrom(context.now, 3),
  };
}

function freeItemDraft(context: OfferDraftContext): OfferDraft {
  const weekend = context.dayOfWeek === 'weekend';
  return {
    title: weekend ? 'Weekend Treat on Us' : 'Weekday Perk: Free Item',
    description: weekend
      ? 'Enjoy a complimentary dessert or side item with your purchase this weekend.'
      : 'Brighten your weekday with a free item of your choice with any purchase over $20.',
    type: 'free_item',
    pointsRequired: 300,
    discountPercentage: null,
    pointsMultiplier: null,
    freeItemDescription: 'Any item up to $10 value',
    validFrom: context.now,
    validUntil: daysFrom(context.now, 5),
  };
}

export function draftOffer(context: OfferDraftContext): OfferDraft {
  switch (context.choose(DRAFT_KINDS)) {
    case 'discount':
      return discountDraft(context);
    case 'points_multiplier':
      return multiplierDraft(context);
    case 'free_item':
      return freeItemDraft(context);
  }
}
