/**
 * Ledger State: the registry, unit ledger and offer book over one set of
 * staged stores, applied or discarded together
 */

import { AccountId, Asset, AssetId } from '../models/Asset';
import { Holding } from '../models/Holding';
import { Offer, OfferId } from '../models/Offer';
import { ledgerError } from '../utils/ErrorHandler';
import { StagedSequence, StagedStore, Transactional } from '../utils/StagedStore';
import { AssetRegistry, AssetRegistryOptions } from './AssetRegistry';
import { OfferBook } from './OfferBook';
import { UnitLedger } from './UnitLedger';

export const DEFAULT_REGISTRY_OPTIONS: AssetRegistryOptions = {
  maxTotalUnits: Number.MAX_SAFE_INTEGER,
  rejectDuplicateMetadata: true
};

export class LedgerState {
  readonly ledger: UnitLedger;
  readonly registry: AssetRegistry;
  readonly offers: OfferBook;
  private readonly stores: Transactional[];

  constructor(options: AssetRegistryOptions = DEFAULT_REGISTRY_OPTIONS) {
    const holdings = new StagedStore<string, Holding>();
    const holders = new StagedStore<AssetId, readonly AccountId[]>();
    const assets = new StagedStore<AssetId, Asset>();
    const fingerprints = new StagedStore<string, AssetId>();
    const offers = new StagedStore<OfferId, Offer>();
    const offersByAsset = new StagedStore<AssetId, readonly OfferId[]>();
    const openOffersByAsset = new StagedStore<AssetId, readonly OfferId[]>();
    const assetSequence = new StagedSequence('asset');
    const offerSequence = new StagedSequence('offer');

    this.stores = [
      holdings,
      holders,
      assets,
      fingerprints,
      offers,
      offersByAsset,
      openOffersByAsset,
      assetSequence,
      offerSequence
    ];

    this.ledger = new UnitLedger({ holdings, holders });
    this.registry = new AssetRegistry({ assets, fingerprints, sequence: assetSequence }, this.ledger, options);
    this.offers = new OfferBook(
      { offers, byAsset: offersByAsset, openByAsset: openOffersByAsset, sequence: offerSequence },
      this.ledger
    );
  }

  /**
   * Runs `work` against staged stores. Its writes become visible only if it
   * returns; if it throws, every write is discarded and the error rethrown.
   */
  transaction<T>(operation: string, work: () => T): T {
    if (this.inTransaction()) {
      throw ledgerError('TRANSACTION_IN_PROGRESS', `Cannot start ${operation} inside another transaction`, {
        operation,
        component: 'LedgerState'
      });
    }

    this.stores.forEach(store => store.begin());
    try {
      const result = work();
      this.stores.forEach(store => store.commit());
      return result;
    } catch (error) {
      this.stores.forEach(store => store.rollback());
      throw error;
    }
  }

  inTransaction(): boolean {
    return this.stores.some(store => store.isStaging());
  }
}
