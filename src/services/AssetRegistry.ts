/**
 * Asset Registry: asset records, denominations and lifecycle status
 */

import { createHash } from 'crypto';
import { AccountId, Asset, AssetId } from '../models/Asset';
import { ledgerError } from '../utils/ErrorHandler';
import { StagedSequence, StagedStore } from '../utils/StagedStore';
import { isPositiveInteger } from '../utils/unitMath';
import { UnitLedger } from './UnitLedger';

export interface AssetRegistryOptions {
  maxTotalUnits: number;
  rejectDuplicateMetadata: boolean;
}

export interface AssetRegistryStores {
  assets: StagedStore<AssetId, Asset>;
  /** Keyed by metadata fingerprint and creator */
  fingerprints: StagedStore<string, AssetId>;
  sequence: StagedSequence;
}

export function fingerprintMetadata(metadata: string): string {
  return createHash('sha256').update(metadata, 'utf8').digest('hex');
}

export class AssetRegistry {
  constructor(
    private readonly stores: AssetRegistryStores,
    private readonly ledger: UnitLedger,
    private readonly options: AssetRegistryOptions
  ) {}

  /**
   * Registers an active asset and grants the creator every unit
   */
  create(creator: AccountId, metadata: string, totalUnits: number): Asset {
    if (!isPositiveInteger(totalUnits) || totalUnits > this.options.maxTotalUnits) {
      throw ledgerError(
        'INVALID_DENOMINATION',
        `Total units must be a positive integer no greater than ${this.options.maxTotalUnits}, got ${totalUnits}`,
        { operation: 'create', component: 'AssetRegistry', accountId: creator }
      );
    }

    const fingerprint = fingerprintMetadata(metadata);
    // Duplicates are scoped to the creator; other accounts may register the same metadata
    const registrationKey = `${fingerprint}|${creator}`;
    const existing = this.stores.fingerprints.get(registrationKey);
    if (this.options.rejectDuplicateMetadata && existing !== undefined) {
      throw ledgerError(
        'ASSET_ALREADY_EXISTS',
        `${creator} already registered identical metadata as ${existing}`,
        { operation: 'create', component: 'AssetRegistry', accountId: creator, assetId: existing }
      );
    }

    const asset: Asset = {
      id: this.stores.sequence.next(),
      creator,
      totalUnits,
      metadata,
      fingerprint,
      status: 'active'
    };

    this.stores.assets.set(asset.id, asset);
    if (existing === undefined) {
      this.stores.fingerprints.set(registrationKey, asset.id);
    }
    this.ledger.credit(asset.id, creator, totalUnits);

    return asset;
  }

  get(assetId: AssetId): Asset {
    const asset = this.stores.assets.get(assetId);
    if (!asset) {
      throw ledgerError('NOT_FOUND', `Asset not found: ${assetId}`, {
        operation: 'get',
        component: 'AssetRegistry',
        assetId
      });
    }
    return asset;
  }

  find(assetId: AssetId): Asset | undefined {
    return this.stores.assets.get(assetId);
  }

  list(): Asset[] {
    return Array.from(this.stores.assets.values());
  }

  markClaimed(assetId: AssetId, owner: AccountId): Asset {
    const asset = this.get(assetId);
    if (asset.status !== 'active') {
      throw ledgerError('ALREADY_CLAIMED', `Asset ${assetId} is already claimed`, {
        operation: 'markClaimed',
        component: 'AssetRegistry',
        accountId: owner,
        assetId
      });
    }

    const claimed: Asset = { ...asset, status: 'claimed', owner };
    this.stores.assets.set(assetId, claimed);
    return claimed;
  }
}
