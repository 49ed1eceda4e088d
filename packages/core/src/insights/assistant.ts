import type { AssistantContext } from './types.js';

function mentions(query: string, words: readonly string[]): boolean {
  return words.some((word) => query.includes(word));
}

export function answer(query: string, context: AssistantContext): string {
  const normalized = query.toLowerCase();

  if (mentions(normalized, ['point', 'balance'])) {
    if (!context.wallet) {
      return "You don't have a wallet with this business yet. Would you like to sign up for our loyalty program?";
    }
    return `Your current points balance is ${context.wallet.pointsBalance}. Is there anything specific you'd like to know about redeeming these points?`;
  }

  if (mentions(normalized, ['redeem', 'reward', 'offer'])) {
    const offers = [...context.activeOffers].sort((a, b) => a.pointsRequired - b.pointsRequired).slice(0, 3);
    if (offers.length === 0) {
      return 'There are currently no active offers available. Please check back soon!';
    }
    const lines = offers.map((offer) => `- ${offer.title}: ${offer.pointsRequired} points required\n`);
    return `Here are some offers you might be interested in:\n\n${lines.join('')}`;
  }

  if (mentions(normalized, ['help', 'support', 'assistance'])) {
    return "I'm here to help! You can ask me about your points balance, available rewards, how to earn more points, or any other questions about our loyalty program.";
  }

  if (normalized.includes('thank')) {
    return "You're welcome! Is there anything else I can help you with today?";
  }

  return "I'm still learning how to answer that. In the meantime, you can ask me about your points balance, available rewards, or how to earn more points.";
}
