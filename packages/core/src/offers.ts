import { randomInt, randomUUID } from 'crypto';
import type { Offer } from './types.js';

export const REDEMPTION_CODE_LENGTH = 8;
export const REDEMPTION_CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

export function isOfferValid(offer: Pick<Offer, 'isActive' | 'validFrom' | 'validUntil'>, now: Date): boolean {
  if (!offer.isActive) {
    return false;
  }
  if (offer.validFrom.getTime() > now.getTime()) {
    return false;
  }
  return offer.validUntil === null || offer.validUntil.getTime() >= now.getTime();
}

export function generateRedemptionCode(nextIndex: (max: number) => number = (max) => randomInt(max)): string {
  let code = '';
  for (let i = 0; i < REDEMPTION_CODE_LENGTH; i++) {
    code += REDEMPTION_CODE_ALPHABET[nextIndex(REDEMPTION_CODE_ALPHABET.length)];
  }
  return code;
}

export function generateId(): string {
  return randomUUID();
}
