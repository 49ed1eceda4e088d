import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  InsufficientBalanceError,
  OfferExpiredOrInactiveError,
  OfferNotFoundError,
  RedemptionCodeUnavailableError,
  WalletNotFoundError,
} from './errors.js';
import { creditWallet } from './ledger.js';
import {
  RedemptionCoordinator,
  markRedemptionUsed,
  recordRedemptionMetric,
  redeemOffer,
  type AiMetricsCollaborator,
} from './redemption.js';
import { MemoryLedger } from './testing/memory-ledger.js';
import type { Logger } from './types.js';

const BUSINESS = 'biz_cafe';
const CUSTOMER = 'cust_1';
const request = { customerId: CUSTOMER, businessId: BUSINESS, offerId: 'offer_latte' };

function sequence(...codes: string[]): () => string {
  let index = 0;
  return () => {
    const code = codes[Math.min(index, codes.length - 1)];
    index += 1;
    return code;
  };
}

function fakeLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

describe('redeemOffer', () => {
  let ledger: MemoryLedger;

  async function fundedWallet(points: number) {
    const wallet = ledger.openWallet(CUSTOMER, BUSINESS);
    if (points > 0) {
      await creditWallet(ledger, wallet, { points, kind: 'earn', description: 'seed' });
    }
    return ledger.wallet(wallet.id);
  }

  beforeEach(() => {
    ledger = new MemoryLedger();
    ledger.setTiers(BUSINESS, [{ name: 'Bronze', minimumPoints: 0 }]);
  });

  it('debits the wallet and issues an unused redemption', async () => {
    const wallet = await fundedWallet(600);
    ledger.addOffer({ id: 'offer_latte', businessId: BUSINESS, title: 'Free latte', pointsRequired: 500 });

    const outcome = await redeemOffer(ledger, request, { generateCode: () => 'LATTE001' });

    expect(outcome.wallet.pointsBalance).toBe(100);
    expect(outcome.redemption).toEqual({
      id: 'id_3',
      walletId: wallet.id,
      offerId: 'offer_latte',
      pointsUsed: 500,
      code: 'LATTE001',
      isUsed: false,
      redeemedAt: new Date('2024-03-01T12:00:00Z'),
      usedAt: null,
    });
    expect(outcome.transaction).toMatchObject({
      points: -500,
      kind: 'redeem',
      description: 'Redemption of Free latte',
      reference: 'offer_latte',
    });
    expect(ledger.redemptionsFor(wallet.id)).toHaveLength(1);
    expect(ledger.transactionsFor(wallet.id).map((transaction) => transaction.points)).toEqual([600, -500]);
  });

  it('reports a missing offer before a missing wallet', async () => {
    await expect(redeemOffer(ledger, request)).rejects.toBeInstanceOf(OfferNotFoundError);
  });

  it('does not resolve offers that belong to another business', async () => {
    await fundedWallet(600);
    ledger.addOffer({ id: 'offer_latte', businessId: 'biz_other', title: 'Free latte', pointsRequired: 500 });

    await expect(redeemOffer(ledger, request)).rejects.toBeInstanceOf(OfferNotFoundError);
  });

  it('reports a missing wallet once the offer resolves', async () => {
    ledger.addOffer({ id: 'offer_latte', businessId: BUSINESS, title: 'Free latte', pointsRequired: 500 });

    await expect(redeemOffer(ledger, request)).rejects.toBeInstanceOf(WalletNotFoundError);
  });

  it('checks offer validity before the balance', async () => {
    await fundedWallet(0);
    ledger.addOffer({
      id: 'offer_latte',
      businessId: BUSINESS,
      title: 'Free latte',
      pointsRequired: 500,
      isActive: false,
    });

    await expect(redeemOffer(ledger, request)).rejects.toBeInstanceOf(OfferExpiredOrInactiveError);
  });

  it('rejects offers outside their validity window', async () => {
    await fundedWallet(600);
    ledger.addOffer({
      id: 'offer_latte',
      businessId: BUSINESS,
      title: 'Free latte',
      pointsRequired: 500,
      validUntil: new Date('2024-02-29T23:59:59Z'),
    });
    await expect(redeemOffer(ledger, request)).rejects.toBeInstanceOf(OfferExpiredOrInactiveError);

    ledger.addOffer({
      id: 'offer_latte',
      businessId: BUSINESS,
      title: 'Free latte',
      pointsRequired: 500,
      validFrom: new Date('2024-03-02T00:00:00Z'),
    });
    await expect(redeemOffer(ledger, request)).rejects.toBeInstanceOf(OfferExpiredOrInactiveError);
  });

  it('leaves the wallet untouched when the balance is short', async () => {
    const wallet = await fundedWallet(400);
    ledger.addOffer({ id: 'offer_latte', businessId: BUSINESS, title: 'Free latte', pointsRequired: 500 });

    const failure = redeemOffer(ledger, request);
    await expect(failure).rejects.toBeInstanceOf(InsufficientBalanceError);
    await expect(failure).rejects.toMatchObject({ available: 400, requested: 500 });

    expect(ledger.wallet(wallet.id).pointsBalance).toBe(400);
    expect(ledger.transactionsFor(wallet.id)).toHaveLength(1);
    expect(ledger.redemptionsFor(wallet.id)).toHaveLength(0);
  });

  it('redeems a free offer without touching the balance', async () => {
    const wallet = await fundedWallet(0);
    ledger.addOffer({ id: 'offer_latte', businessId: BUSINESS, title: 'Welcome gift', pointsRequired: 0 });

    const outcome = await redeemOffer(ledger, request, { generateCode: () => 'WELCOME1' });

    expect(outcome.transaction).toBeNull();
    expect(outcome.redemption.pointsUsed).toBe(0);
    expect(outcome.wallet.pointsBalance).toBe(0);
    expect(ledger.transactionsFor(wallet.id)).toHaveLength(0);
  });

  it('draws a new code when the first one is taken', async () => {
    await fundedWallet(1000);
    ledger.addOffer({ id: 'offer_latte', businessId: BUSINESS, title: 'Free latte', pointsRequired: 100 });

    await redeemOffer(ledger, request, { generateCode: () => 'TAKEN001' });
    const second = await redeemOffer(ledger, request, { generateCode: sequence('TAKEN001', 'FRESH002') });

    expect(second.redemption.code).toBe('FRESH002');
  });

  it('draws a new code when the insert finds the code taken', async () => {
    await fundedWallet(1000);
    ledger.addOffer({ id: 'offer_latte', businessId: BUSINESS, title: 'Free latte', pointsRequired: 100 });
    // Another redemption claims the code between generation and insert.
    vi.spyOn(ledger, 'insertRedemption').mockResolvedValueOnce(false);
    const generateCode = vi.fn(sequence('RACED001', 'FRESH002'));

    const outcome = await redeemOffer(ledger, request, { generateCode });

    expect(generateCode).toHaveBeenCalledTimes(2);
    expect(outcome.redemption.code).toBe('FRESH002');
    expect(ledger.redemptionsFor(outcome.wallet.id).map((redemption) => redemption.code)).toEqual(['FRESH002']);
  });

  it('gives up after the configured number of code attempts and rolls back the debit', async () => {
    const wallet = await fundedWallet(1000);
    ledger.addOffer({ id: 'offer_latte', businessId: BUSINESS, title: 'Free latte', pointsRequired: 100 });
    await redeemOffer(ledger, request, { generateCode: () => 'TAKEN001' });

    const generateCode = vi.fn(() => 'TAKEN001');
    const failure = ledger.transaction((helpers) => redeemOffer(helpers, request, { generateCode, codeAttempts: 3 }));

    await expect(failure).rejects.toBeInstanceOf(RedemptionCodeUnavailableError);
    expect(generateCode).toHaveBeenCalledTimes(3);
    expect(ledger.wallet(wallet.id).pointsBalance).toBe(900);
    expect(ledger.transactionsFor(wallet.id)).toHaveLength(2);
    expect(ledger.redemptionsFor(wallet.id)).toHaveLength(1);
  });
});

describe('recordRedemptionMetric', () => {
  it('counts redemptions of generated offers only', async () => {
    const metrics: AiMetricsCollaborator = { incrementRedemptionCount: vi.fn(async () => undefined) };
    const logger = fakeLogger();

    await recordRedemptionMetric(metrics, { id: 'offer_manual', isAiGenerated: false }, logger);
    await recordRedemptionMetric(metrics, { id: 'offer_ai', isAiGenerated: true }, logger);

    expect(metrics.incrementRedemptionCount).toHaveBeenCalledTimes(1);
    expect(metrics.incrementRedemptionCount).toHaveBeenCalledWith('offer_ai');
  });

  it('logs a failing counter instead of throwing', async () => {
    const failure = new Error('metrics table locked');
    const metrics: AiMetricsCollaborator = {
      incrementRedemptionCount: async () => {
        throw failure;
      },
    };
    const logger = fakeLogger();

    await expect(recordRedemptionMetric(metrics, { id: 'offer_ai', isAiGenerated: true }, logger)).resolves.toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith(
      { err: failure, offerId: 'offer_ai' },
      'Failed to update AI offer redemption count',
    );
  });
});

describe('markRedemptionUsed', () => {
  let ledger: MemoryLedger;

  beforeEach(async () => {
    ledger = new MemoryLedger();
    const wallet = ledger.openWallet(CUSTOMER, BUSINESS);
    await creditWallet(ledger, wallet, { points: 100, kind: 'earn', description: 'seed' });
    ledger.addOffer({ id: 'offer_latte', businessId: BUSINESS, title: 'Free latte', pointsRequired: 50 });
  });

  it('stamps the first use and keeps it on later calls', async () => {
    const { redemption } = await redeemOffer(ledger, request, { generateCode: () => 'LATTE001' });

    ledger.clock = new Date('2024-03-03T08:00:00Z');
    const used = await markRedemptionUsed(ledger, redemption);
    expect(used.isUsed).toBe(true);
    expect(used.usedAt).toEqual(new Date('2024-03-03T08:00:00Z'));

    ledger.clock = new Date('2024-03-04T08:00:00Z');
    expect(await markRedemptionUsed(ledger, used)).toBe(used);

    const fromStaleRead = await markRedemptionUsed(ledger, redemption);
    expect(fromStaleRead.usedAt).toEqual(new Date('2024-03-03T08:00:00Z'));
  });

  it('never records a use earlier than the redemption', async () => {
    const { redemption } = await redeemOffer(ledger, request, { generateCode: () => 'LATTE001' });

    ledger.clock = new Date('2024-02-01T00:00:00Z');
    const used = await markRedemptionUsed(ledger, redemption);

    expect(used.usedAt).toEqual(redemption.redeemedAt);
  });
});

describe('RedemptionCoordinator', () => {
  let ledger: MemoryLedger;
  let metrics: AiMetricsCollaborator;
  let logger: ReturnType<typeof fakeLogger>;
  let coordinator: RedemptionCoordinator;

  beforeEach(async () => {
    ledger = new MemoryLedger();
    const wallet = ledger.openWallet(CUSTOMER, BUSINESS);
    await creditWallet(ledger, wallet, { points: 600, kind: 'earn', description: 'seed' });
    ledger.addOffer({
      id: 'offer_latte',
      businessId: BUSINESS,
      title: 'Free latte',
      pointsRequired: 500,
      isAiGenerated: true,
    });
    metrics = { incrementRedemptionCount: vi.fn(async () => undefined) };
    logger = fakeLogger();
    coordinator = new RedemptionCoordinator({
      runInTransaction: (work) => ledger.transaction(work),
      metrics,
      logger,
      generateCode: () => 'CODE0001',
    });
  });

  it('returns a receipt and records the metric after the redemption', async () => {
    const receipt = await coordinator.redeem(request);

    expect(receipt).toEqual({ redemptionId: 'id_3', code: 'CODE0001', pointsUsed: 500, pointsBalance: 100 });
    expect(metrics.incrementRedemptionCount).toHaveBeenCalledWith('offer_latte');
    expect(logger.info).toHaveBeenCalledWith(
      { redemptionId: 'id_3', walletId: `wallet_${CUSTOMER}_${BUSINESS}`, offerId: 'offer_latte', pointsUsed: 500 },
      'Offer redeemed',
    );
  });

  it('lets only one of two concurrent redemptions spend the balance', async () => {
    const results = await Promise.allSettled([coordinator.redeem(request), coordinator.redeem(request)]);

    const rejected = results.filter((result): result is PromiseRejectedResult => result.status === 'rejected');
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(InsufficientBalanceError);

    const walletId = `wallet_${CUSTOMER}_${BUSINESS}`;
    expect(ledger.wallet(walletId).pointsBalance).toBe(100);
    expect(ledger.redemptionsFor(walletId)).toHaveLength(1);
    expect(metrics.incrementRedemptionCount).toHaveBeenCalledTimes(1);
  });

  it('does not record the metric when the redemption fails', async () => {
    await expect(coordinator.redeem({ ...request, offerId: 'offer_missing' })).rejects.toBeInstanceOf(
      OfferNotFoundError,
    );
    expect(metrics.incrementRedemptionCount).not.toHaveBeenCalled();
  });
});
