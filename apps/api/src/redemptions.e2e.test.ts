import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import type { Pool } from 'pg';
import { buildServer } from './index.js';
import { createLedgerHelpers } from './store.js';
import { TestClock, createPrincipal, createTestPool, type TestPrincipal } from './testing/setup.js';

const CODE_PATTERN = /^[A-Z0-9]{8}$/;

describe('Redemption API', () => {
  const clock = new TestClock();
  let pool: Pool;
  let server: Awaited<ReturnType<typeof buildServer>>;
  let admin: TestPrincipal;
  let owner: TestPrincipal;
  let ana: TestPrincipal;
  let ben: TestPrincipal;
  let businessId: string;
  const offers: Record<string, string> = {};

  async function createOffer(payload: Record<string, unknown>): Promise<string> {
    const response = await server.inject({
      method: 'POST',
      url: `/v1/businesses/${businessId}/offers`,
      headers: owner.headers,
      payload,
    });
    return response.json().offer_id;
  }

  async function walletWith(customerId: string, points: number): Promise<string> {
    const enrolled = await server.inject({
      method: 'POST',
      url: `/v1/businesses/${businessId}/wallets`,
      headers: admin.headers,
      payload: { customer_id: customerId },
    });
    const walletId = enrolled.json().wallet_id;
    if (points > 0) {
      await server.inject({
        method: 'POST',
        url: `/v1/wallets/${walletId}/credit`,
        headers: admin.headers,
        payload: { points, kind: 'bonus', description: 'Opening balance' },
      });
    }
    return walletId;
  }

  function redeem(principal: TestPrincipal, customerId: string, offerId: string) {
    return server.inject({
      method: 'POST',
      url: `/v1/businesses/${businessId}/redemptions`,
      headers: principal.headers,
      payload: { customer_id: customerId, offer_id: offerId },
    });
  }

  async function balanceOf(walletId: string): Promise<number> {
    const result = await pool.query(`SELECT points_balance FROM wallets WHERE wallet_id = $1`, [walletId]);
    return Number(result.rows[0].points_balance);
  }

  beforeAll(async () => {
    pool = await createTestPool();
    server = await buildServer({ now: clock.now, pick: (choices) => choices[choices.length - 1] });
    await server.ready();

    admin = await createPrincipal('ops', 'platform_admin');
    const created = await server.inject({
      method: 'POST',
      url: '/v1/businesses',
      headers: admin.headers,
      payload: { name: 'Daily Grind', email: 'team@grind.test', category: 'restaurant' },
    });
    businessId = created.json().business_id;
    await server.inject({
      method: 'PUT',
      url: `/v1/businesses/${businessId}/tiers`,
      headers: admin.headers,
      payload: { tiers: [{ name: 'Regular', minimum_points: 0 }] },
    });

    owner = await createPrincipal('grind_owner', 'business_admin', { businessId });
    ana = await createPrincipal('ana', 'customer', { customerId: 'cust_ana' });
    ben = await createPrincipal('ben', 'customer', { customerId: 'cust_ben' });

    offers.latte = await createOffer({
      title: 'Latte',
      offer_type: 'free_item',
      points_required: 500,
      free_item_description: 'Any size latte',
      valid_from: '2024-02-01T00:00:00Z',
    });
    offers.sticker = await createOffer({ title: 'Sticker', offer_type: 'other', points_required: 0 });
    offers.expired = await createOffer({
      title: 'Holiday Mug',
      offer_type: 'special_event',
      points_required: 50,
      valid_from: '2023-12-01T00:00:00Z',
      valid_until: '2023-12-31T00:00:00Z',
    });
  });

  afterAll(async () => {
    await server.close();
  });

  it('redeems an offer and debits the wallet', async () => {
    const walletId = await walletWith('cust_ana', 600);
    clock.advance(60_000);

    const response = await redeem(ana, 'cust_ana', offers.latte);
    expect(response.statusCode).toBe(201);
    const receipt = response.json();
    expect(receipt).toMatchObject({ points_used: 500, points_balance: 100 });
    expect(receipt.code).toMatch(CODE_PATTERN);

    const stored = await pool.query(`SELECT * FROM offer_redemptions WHERE redemption_id = $1`, [receipt.redemption_id]);
    expect(stored.rows[0]).toMatchObject({
      wallet_id: walletId,
      offer_id: offers.latte,
      points_used: 500,
      code: receipt.code,
      is_used: false,
      used_at: null,
    });

    const history = await server.inject({
      method: 'GET',
      url: `/v1/wallets/${walletId}/transactions?limit=1`,
      headers: ana.headers,
    });
    expect(history.json().transactions).toHaveLength(1);
    expect(history.json().transactions[0]).toMatchObject({
      points: -500,
      kind: 'redeem',
      description: 'Redemption of Latte',
      reference: offers.latte,
    });
  });

  it('checks the offer, the wallet, the validity window and the balance in that order', async () => {
    const walletId = await walletWith('cust_low', 100);

    const unknownOffer = await redeem(admin, 'cust_ghost', 'offer_missing');
    expect(unknownOffer.statusCode).toBe(404);
    expect(unknownOffer.json()).toEqual({ error: 'Offer not found', code: 'offer_not_found' });

    const unknownWallet = await redeem(admin, 'cust_ghost', offers.expired);
    expect(unknownWallet.statusCode).toBe(404);
    expect(unknownWallet.json().code).toBe('wallet_not_found');

    const expired = await redeem(admin, 'cust_low', offers.expired);
    expect(expired.statusCode).toBe(409);
    expect(expired.json()).toEqual({ error: 'This offer is no longer valid', code: 'offer_expired_or_inactive' });

    const short = await redeem(admin, 'cust_low', offers.latte);
    expect(short.statusCode).toBe(409);
    expect(short.json()).toEqual({ error: 'Insufficient points balance', code: 'insufficient_balance' });

    expect(await balanceOf(walletId)).toBe(100);
    const redemptions = await pool.query(`SELECT COUNT(*) AS count FROM offer_redemptions WHERE wallet_id = $1`, [
      walletId,
    ]);
    expect(Number(redemptions.rows[0].count)).toBe(0);
  });

  it('skips a code another redemption already stored', async () => {
    const walletId = await walletWith('cust_codes', 0);
    const issued = (await redeem(admin, 'cust_codes', offers.sticker)).json();

    const client = await pool.connect();
    try {
      const inserted = await createLedgerHelpers(client, clock.now).insertRedemption({
        id: 'redemption_duplicate',
        walletId,
        offerId: offers.sticker,
        pointsUsed: 0,
        code: issued.code,
        isUsed: false,
        redeemedAt: clock.now(),
        usedAt: null,
      });
      expect(inserted).toBe(false);
    } finally {
      client.release();
    }

    const stored = await pool.query(`SELECT redemption_id FROM offer_redemptions WHERE code = $1`, [issued.code]);
    expect(stored.rows).toEqual([{ redemption_id: issued.redemption_id }]);
  });

  it('lets customers redeem only from their own wallet', async () => {
    const response = await redeem(ben, 'cust_ana', offers.sticker);
    expect(response.statusCode).toBe(403);
    expect(response.json()).toEqual({ error: 'Forbidden' });
  });

  it('issues free offers without touching the balance', async () => {
    const walletId = await walletWith('cust_ben', 0);

    const response = await redeem(ben, 'cust_ben', offers.sticker);
    expect(response.statusCode).toBe(201);
    expect(response.json()).toMatchObject({ points_used: 0, points_balance: 0 });

    const history = await server.inject({
      method: 'GET',
      url: `/v1/wallets/${walletId}/transactions`,
      headers: ben.headers,
    });
    expect(history.json()).toEqual({ transactions: [] });
  });

  it('marks a redemption used once and keeps the first timestamp', async () => {
    const walletId = await walletWith('cust_use', 0);
    const user = await createPrincipal('user', 'customer', { customerId: 'cust_use' });
    const redemptionId = (await redeem(user, 'cust_use', offers.sticker)).json().redemption_id;

    clock.advance(5 * 60_000);
    const usedAt = clock.now().toISOString();
    const first = await server.inject({
      method: 'POST',
      url: `/v1/redemptions/${redemptionId}/use`,
      headers: user.headers,
    });
    expect(first.statusCode).toBe(200);
    expect(first.json()).toMatchObject({ redemption_id: redemptionId, wallet_id: walletId, is_used: true, used_at: usedAt });

    clock.advance(5 * 60_000);
    const second = await server.inject({
      method: 'POST',
      url: `/v1/redemptions/${redemptionId}/use`,
      headers: user.headers,
    });
    expect(second.json()).toMatchObject({ is_used: true, used_at: usedAt });

    const stranger = await server.inject({
      method: 'POST',
      url: `/v1/redemptions/${redemptionId}/use`,
      headers: ben.headers,
    });
    expect(stranger.statusCode).toBe(403);

    const missing = await server.inject({
      method: 'POST',
      url: '/v1/redemptions/redemption_missing/use',
      headers: admin.headers,
    });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ error: 'Redemption not found' });

    const listed = await server.inject({
      method: 'GET',
      url: `/v1/wallets/${walletId}/redemptions`,
      headers: user.headers,
    });
    expect(listed.json().redemptions).toHaveLength(1);
    expect(listed.json().redemptions[0]).toMatchObject({ redemption_id: redemptionId, is_used: true });
  });

  it('counts redemptions of generated offers', async () => {
    const suggested = await server.inject({
      method: 'POST',
      url: `/v1/businesses/${businessId}/offers/suggest`,
      headers: owner.headers,
      payload: {},
    });
    expect(suggested.json()).toMatchObject({ offer_type: 'free_item', points_required: 300, is_ai_generated: true });
    const offerId = suggested.json().offer_id;

    await walletWith('cust_fan', 700);
    expect((await redeem(admin, 'cust_fan', offerId)).json().points_balance).toBe(400);
    expect((await redeem(admin, 'cust_fan', offerId)).json().points_balance).toBe(100);

    const metrics = await pool.query(`SELECT redemptions FROM ai_offer_metrics WHERE offer_id = $1`, [offerId]);
    expect(Number(metrics.rows[0].redemptions)).toBe(2);

    await redeem(admin, 'cust_fan', offers.sticker);
    const untracked = await pool.query(`SELECT COUNT(*) AS count FROM ai_offer_metrics WHERE offer_id = $1`, [
      offers.sticker,
    ]);
    expect(Number(untracked.rows[0].count)).toBe(0);
  });
});
