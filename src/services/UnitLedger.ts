/**
 * Unit Ledger: per (asset, account) integer bookkeeping of held and locked units
 */

import { AccountId, AssetId } from '../models/Asset';
import { Holding } from '../models/Holding';
import { ledgerError } from '../utils/ErrorHandler';
import { StagedStore } from '../utils/StagedStore';
import { isPositiveInteger } from '../utils/unitMath';

export function holdingKey(assetId: AssetId, account: AccountId): string {
  return `${assetId}|${account}`;
}

export interface UnitLedgerStores {
  holdings: StagedStore<string, Holding>;
  /** Accounts that have ever held each asset, in first-credit order */
  holders: StagedStore<AssetId, readonly AccountId[]>;
}

export class UnitLedger {
  private readonly holdings: StagedStore<string, Holding>;
  private readonly holders: StagedStore<AssetId, readonly AccountId[]>;

  constructor(stores: UnitLedgerStores = { holdings: new StagedStore(), holders: new StagedStore() }) {
    this.holdings = stores.holdings;
    this.holders = stores.holders;
  }

  /**
   * Holdings are implicit: an unknown pair reads as zero
   */
  getHolding(assetId: AssetId, account: AccountId): Holding {
    return this.holdings.get(holdingKey(assetId, account)) ?? {
      assetId,
      account,
      units: 0,
      lockedUnits: 0
    };
  }

  availableUnits(assetId: AssetId, account: AccountId): number {
    const holding = this.getHolding(assetId, account);
    return holding.units - holding.lockedUnits;
  }

  credit(assetId: AssetId, account: AccountId, units: number): Holding {
    this.assertAmount('credit', assetId, account, units);
    const holding = this.getHolding(assetId, account);
    return this.write({ ...holding, units: holding.units + units });
  }

  /**
   * Removes unlocked units only
   */
  debit(assetId: AssetId, account: AccountId, units: number): Holding {
    this.assertAmount('debit', assetId, account, units);
    const holding = this.getHolding(assetId, account);
    const available = holding.units - holding.lockedUnits;

    if (units > available) {
      throw ledgerError(
        'INSUFFICIENT_UNITS',
        `Cannot debit ${units} units from ${account}: only ${available} unlocked`,
        { operation: 'debit', component: 'UnitLedger', accountId: account, assetId }
      );
    }

    return this.write({ ...holding, units: holding.units - units });
  }

  lock(assetId: AssetId, account: AccountId, units: number): Holding {
    this.assertAmount('lock', assetId, account, units);
    const holding = this.getHolding(assetId, account);

    if (holding.lockedUnits + units > holding.units) {
      throw ledgerError(
        'INSUFFICIENT_UNLOCKED_UNITS',
        `Cannot lock ${units} units for ${account}: ${holding.units - holding.lockedUnits} unlocked`,
        { operation: 'lock', component: 'UnitLedger', accountId: account, assetId }
      );
    }

    return this.write({ ...holding, lockedUnits: holding.lockedUnits + units });
  }

  unlock(assetId: AssetId, account: AccountId, units: number): Holding {
    this.assertAmount('unlock', assetId, account, units);
    const holding = this.getHolding(assetId, account);

    if (units > holding.lockedUnits) {
      throw ledgerError(
        'INVALID_UNLOCK',
        `Cannot unlock ${units} units for ${account}: only ${holding.lockedUnits} locked`,
        { operation: 'unlock', component: 'UnitLedger', accountId: account, assetId }
      );
    }

    return this.write({ ...holding, lockedUnits: holding.lockedUnits - units });
  }

  /**
   * Debit and credit of the same amount, so the asset total is unchanged
   */
  transfer(assetId: AssetId, from: AccountId, to: AccountId, units: number): void {
    this.debit(assetId, from, units);
    this.credit(assetId, to, units);
  }

  /**
   * Non-zero holdings of an asset
   */
  holdingsOf(assetId: AssetId): Holding[] {
    return (this.holders.get(assetId) ?? [])
      .map(account => this.getHolding(assetId, account))
      .filter(holding => holding.units > 0);
  }

  /**
   * Non-zero holdings of an account across assets
   */
  holdingsFor(account: AccountId): Holding[] {
    const result: Holding[] = [];
    for (const holding of this.holdings.values()) {
      if (holding.account === account && holding.units > 0) {
        result.push(holding);
      }
    }
    return result;
  }

  /**
   * Sum of all holdings of an asset
   */
  totalUnits(assetId: AssetId): number {
    return this.holdingsOf(assetId).reduce((total, holding) => total + holding.units, 0);
  }

  private write(holding: Holding): Holding {
    const key = holdingKey(holding.assetId, holding.account);
    if (!this.holdings.has(key)) {
      this.holders.set(holding.assetId, [...(this.holders.get(holding.assetId) ?? []), holding.account]);
    }
    this.holdings.set(key, holding);
    return holding;
  }

  private assertAmount(operation: string, assetId: AssetId, account: AccountId, units: number): void {
    if (!isPositiveInteger(units)) {
      throw ledgerError(
        'INVALID_AMOUNT',
        `Unit amount must be a positive integer, got ${units}`,
        { operation, component: 'UnitLedger', accountId: account, assetId }
      );
    }
  }
}
