import { describe, expect, it } from 'vitest';
import {
  authorize,
  businessOwnership,
  customerOwnership,
  walletOwnership,
  type Principal,
} from './ownership.js';

const admin: Principal = { role: 'platform_admin', principalId: 'ops' };
const cafeAdmin: Principal = { role: 'business_admin', principalId: 'owner_1', businessId: 'biz_cafe' };
const alice: Principal = { role: 'customer', principalId: 'alice_login', customerId: 'cust_alice' };

const aliceWallet = walletOwnership({ customerId: 'cust_alice', businessId: 'biz_cafe' });
const bobWallet = walletOwnership({ customerId: 'cust_bob', businessId: 'biz_cafe' });
const bakeryWallet = walletOwnership({ customerId: 'cust_alice', businessId: 'biz_bakery' });
const cafe = businessOwnership({ businessId: 'biz_cafe' });

describe('authorize', () => {
  it('lets platform admins act on anything', () => {
    expect(authorize(admin, bobWallet, 'credit')).toBe(true);
    expect(authorize(admin, cafe, 'manage')).toBe(true);
  });

  it('limits business admins to their own business', () => {
    expect(authorize(cafeAdmin, aliceWallet, 'credit')).toBe(true);
    expect(authorize(cafeAdmin, cafe, 'manage')).toBe(true);
    expect(authorize(cafeAdmin, bakeryWallet, 'read')).toBe(false);
    expect(authorize(cafeAdmin, businessOwnership({ businessId: 'biz_bakery' }), 'manage')).toBe(false);
  });

  it('lets customers read and spend from their own wallets only', () => {
    expect(authorize(alice, aliceWallet, 'read')).toBe(true);
    expect(authorize(alice, aliceWallet, 'debit')).toBe(true);
    expect(authorize(alice, aliceWallet, 'redeem')).toBe(true);
    expect(authorize(alice, bakeryWallet, 'redeem')).toBe(true);
    expect(authorize(alice, bobWallet, 'read')).toBe(false);
  });

  it('keeps customers away from crediting and business resources', () => {
    expect(authorize(alice, aliceWallet, 'credit')).toBe(false);
    expect(authorize(alice, aliceWallet, 'manage')).toBe(false);
    expect(authorize(alice, cafe, 'read')).toBe(false);
  });

  it('resolves customer scoped lookups the same way as wallets', () => {
    expect(authorize(alice, customerOwnership('cust_alice', 'biz_cafe'), 'read')).toBe(true);
    expect(authorize(cafeAdmin, customerOwnership('cust_alice', 'biz_bakery'), 'read')).toBe(false);
  });
});
