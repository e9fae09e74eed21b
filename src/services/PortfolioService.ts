/**
 * Portfolio Service for read-only ownership views
 * Aggregates an account's holdings across assets and an asset's holders
 */

import { AccountId, AssetId } from '../models/Asset';
import { CapTable, Portfolio, PortfolioEntry } from '../models/Holding';
import { ownershipPercent } from '../utils/unitMath';
import { LedgerState } from './LedgerState';

export class PortfolioService {
  constructor(private readonly state: LedgerState) {}

  /**
   * Every non-zero holding of the account, ordered by asset id
   */
  getPortfolio(account: AccountId): Portfolio {
    const entries: PortfolioEntry[] = this.state.ledger
      .holdingsFor(account)
      .map(holding => {
        const asset = this.state.registry.get(holding.assetId);
        return {
          assetId: holding.assetId,
          units: holding.units,
          lockedUnits: holding.lockedUnits,
          availableUnits: holding.units - holding.lockedUnits,
          totalUnits: asset.totalUnits,
          ownershipPercent: ownershipPercent(holding.units, asset.totalUnits),
          assetStatus: asset.status
        };
      })
      .sort((a, b) => compareIds(a.assetId, b.assetId));

    return { account, entries };
  }

  /**
   * Holders of an asset, largest first
   */
  getCapTable(assetId: AssetId): CapTable {
    const asset = this.state.registry.get(assetId);
    const holders = this.state.ledger
      .holdingsOf(assetId)
      .map(holding => ({
        account: holding.account,
        units: holding.units,
        lockedUnits: holding.lockedUnits,
        ownershipPercent: ownershipPercent(holding.units, asset.totalUnits)
      }))
      .sort((a, b) => b.units - a.units || a.account.localeCompare(b.account));

    return {
      assetId,
      totalUnits: asset.totalUnits,
      heldUnits: holders.reduce((total, holder) => total + holder.units, 0),
      holders
    };
  }
}

/**
 * Orders `asset_2` before `asset_10`
 */
function compareIds(a: string, b: string): number {
  return a.localeCompare(b, undefined, { numeric: true });
}
