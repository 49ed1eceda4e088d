import type { Wallet } from './types.js';

export type Principal =
  | { role: 'platform_admin'; principalId: string }
  | { role: 'business_admin'; principalId: string; businessId: string }
  | { role: 'customer'; principalId: string; customerId: string };

export type PrincipalRole = Principal['role'];

export type OwnerKind = 'customer' | 'business';

export interface OwnedResource {
  ownerKind: OwnerKind;
  ownerId: string;
  businessId: string;
}

export type ResourceAction = 'read' | 'credit' | 'debit' | 'redeem' | 'manage';

const CUSTOMER_ACTIONS: ReadonlySet<ResourceAction> = new Set(['read', 'debit', 'redeem']);

export function walletOwnership(wallet: Pick<Wallet, 'customerId' | 'businessId'>): OwnedResource {
  return { ownerKind: 'customer', ownerId: wallet.customerId, businessId: wallet.businessId };
}

export function businessOwnership(resource: { businessId: string }): OwnedResource {
  return { ownerKind: 'business', ownerId: resource.businessId, businessId: resource.businessId };
}

export function customerOwnership(customerId: string, businessId: string): OwnedResource {
  return { ownerKind: 'customer', ownerId: customerId, businessId };
}

export function authorize(principal: Principal, resource: OwnedResource, action: ResourceAction): boolean {
  switch (principal.role) {
    case 'platform_admin':
      return true;
    case 'business_admin':
      return principal.businessId === resource.businessId;
    case 'customer':
      return (
        resource.ownerKind === 'customer' &&
        resource.ownerId === principal.customerId &&
        CUSTOMER_ACTIONS.has(action)
      );
  }
}
