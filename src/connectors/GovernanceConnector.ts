/**
 * Optional governance collaborators: trust checks and the stakeholder registry
 */

import { AccountId, AssetId } from '../models/Asset';
import { Holding } from '../models/Holding';

export interface ITrustVerifier {
  isTrusted(account: AccountId): boolean;
}

export interface HoldingsChange {
  operation: string;
  assetId: AssetId;
  holdings: Holding[];
}

/**
 * Notified after an operation commits; not consulted for correctness
 */
export interface IStakeholderRegistry {
  onHoldingsChanged(change: HoldingsChange): void;
}
