/**
 * Unit holding data models
 */

import { AccountId, AssetId } from './Asset';

export interface Holding {
  readonly assetId: AssetId;
  readonly account: AccountId;
  readonly units: number;
  readonly lockedUnits: number;
}

export interface PortfolioEntry {
  assetId: AssetId;
  units: number;
  lockedUnits: number;
  availableUnits: number;
  totalUnits: number;
  ownershipPercent: number;
  assetStatus: 'active' | 'claimed';
}

export interface Portfolio {
  account: AccountId;
  entries: PortfolioEntry[];
}

export interface CapTableEntry {
  account: AccountId;
  units: number;
  lockedUnits: number;
  ownershipPercent: number;
}

export interface CapTable {
  assetId: AssetId;
  totalUnits: number;
  heldUnits: number;
  holders: CapTableEntry[];
}
