/**
 * Sell offer data models
 */

import { AccountId, AssetId } from './Asset';

export type OfferId = string;
export type OfferStatus = 'open' | 'filled' | 'cancelled';

export interface Offer {
  readonly id: OfferId;
  readonly assetId: AssetId;
  readonly seller: AccountId;
  readonly unitPrice: number;
  readonly unitsOffered: number;
  readonly unitsRemaining: number;
  readonly status: OfferStatus;
}

export interface Settlement {
  readonly offerId: OfferId;
  readonly assetId: AssetId;
  readonly seller: AccountId;
  readonly unitPrice: number;
  readonly unitsRemaining: number;
  readonly status: OfferStatus;
}
