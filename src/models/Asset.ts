/**
 * Asset registry data models
 */

export type AccountId = string;
export type AssetId = string;

export type AssetStatus = 'active' | 'claimed';

export interface Asset {
  readonly id: AssetId;
  readonly creator: AccountId;
  readonly totalUnits: number;
  readonly metadata: string;
  readonly fingerprint: string;
  readonly status: AssetStatus;
  readonly owner?: AccountId;
}
