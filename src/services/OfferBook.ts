/**
 * Offer Book: fixed-price sell offers backed by units locked in the ledger
 */

import { AccountId, AssetId } from '../models/Asset';
import { Offer, OfferId, OfferStatus, Settlement } from '../models/Offer';
import { ledgerError } from '../utils/ErrorHandler';
import { StagedSequence, StagedStore } from '../utils/StagedStore';
import { isPositiveInteger } from '../utils/unitMath';
import { UnitLedger } from './UnitLedger';

export interface OfferBookStores {
  offers: StagedStore<OfferId, Offer>;
  /** Every offer ever opened on each asset */
  byAsset: StagedStore<AssetId, readonly OfferId[]>;
  /** Offers still open on each asset, in opening order */
  openByAsset: StagedStore<AssetId, readonly OfferId[]>;
  sequence: StagedSequence;
}

export class OfferBook {
  constructor(
    private readonly stores: OfferBookStores,
    private readonly ledger: UnitLedger
  ) {}

  /**
   * Locks the seller's units, then records the offer
   */
  open(assetId: AssetId, seller: AccountId, units: number, unitPrice: number): Offer {
    const available = this.ledger.availableUnits(assetId, seller);
    if (isPositiveInteger(units) && units > available) {
      throw ledgerError(
        'INSUFFICIENT_UNITS',
        `Cannot offer ${units} units: ${seller} has ${available} unlocked`,
        { operation: 'open', component: 'OfferBook', accountId: seller, assetId }
      );
    }

    this.ledger.lock(assetId, seller, units);

    const offer: Offer = {
      id: this.stores.sequence.next(),
      assetId,
      seller,
      unitPrice,
      unitsOffered: units,
      unitsRemaining: units,
      status: 'open'
    };
    this.stores.offers.set(offer.id, offer);
    appendId(this.stores.byAsset, assetId, offer.id);
    appendId(this.stores.openByAsset, assetId, offer.id);

    return offer;
  }

  /**
   * Takes `units` out of an open offer. Moving the units is left to the caller.
   */
  settle(offerId: OfferId, buyer: AccountId, units: number): Settlement {
    const offer = this.get(offerId);
    const context = { operation: 'settle', component: 'OfferBook', accountId: buyer, assetId: offer.assetId, offerId };

    if (offer.status !== 'open') {
      throw ledgerError('NOT_OPEN', `Offer ${offerId} is ${offer.status}`, context);
    }
    if (!isPositiveInteger(units)) {
      throw ledgerError('INVALID_AMOUNT', `Unit amount must be a positive integer, got ${units}`, context);
    }
    if (units > offer.unitsRemaining) {
      throw ledgerError(
        'EXCEEDS_REMAINING',
        `Cannot take ${units} units from offer ${offerId}: ${offer.unitsRemaining} remaining`,
        context
      );
    }

    const unitsRemaining = offer.unitsRemaining - units;
    const status: OfferStatus = unitsRemaining === 0 ? 'filled' : 'open';
    this.stores.offers.set(offerId, { ...offer, unitsRemaining, status });
    if (status === 'filled') {
      removeId(this.stores.openByAsset, offer.assetId, offerId);
    }

    return {
      offerId,
      assetId: offer.assetId,
      seller: offer.seller,
      unitPrice: offer.unitPrice,
      unitsRemaining,
      status
    };
  }

  /**
   * Closes an open offer and releases its remaining locked units
   */
  cancel(offerId: OfferId, requester: AccountId): Offer {
    const offer = this.get(offerId);
    const context = { operation: 'cancel', component: 'OfferBook', accountId: requester, assetId: offer.assetId, offerId };

    if (offer.seller !== requester) {
      throw ledgerError('NOT_SELLER', `${requester} is not the seller of offer ${offerId}`, context);
    }
    if (offer.status !== 'open') {
      throw ledgerError('NOT_OPEN', `Offer ${offerId} is ${offer.status}`, context);
    }

    if (offer.unitsRemaining > 0) {
      this.ledger.unlock(offer.assetId, offer.seller, offer.unitsRemaining);
    }

    const cancelled: Offer = { ...offer, status: 'cancelled' };
    this.stores.offers.set(offerId, cancelled);
    removeId(this.stores.openByAsset, offer.assetId, offerId);
    return cancelled;
  }

  get(offerId: OfferId): Offer {
    const offer = this.stores.offers.get(offerId);
    if (!offer) {
      throw ledgerError('NOT_FOUND', `Offer not found: ${offerId}`, {
        operation: 'get',
        component: 'OfferBook',
        offerId
      });
    }
    return offer;
  }

  find(offerId: OfferId): Offer | undefined {
    return this.stores.offers.get(offerId);
  }

  listByAsset(assetId: AssetId, status?: OfferStatus): Offer[] {
    const index = status === 'open' ? this.stores.openByAsset : this.stores.byAsset;
    return (index.get(assetId) ?? [])
      .map(offerId => this.get(offerId))
      .filter(offer => status === undefined || offer.status === status);
  }

  listBySeller(seller: AccountId, status?: OfferStatus): Offer[] {
    return this.filter(offer => offer.seller === seller && (status === undefined || offer.status === status));
  }

  private filter(predicate: (offer: Offer) => boolean): Offer[] {
    return Array.from(this.stores.offers.values()).filter(predicate);
  }
}

function appendId(index: StagedStore<AssetId, readonly OfferId[]>, assetId: AssetId, offerId: OfferId): void {
  index.set(assetId, [...(index.get(assetId) ?? []), offerId]);
}

function removeId(index: StagedStore<AssetId, readonly OfferId[]>, assetId: AssetId, offerId: OfferId): void {
  index.set(assetId, (index.get(assetId) ?? []).filter(id => id !== offerId));
}
