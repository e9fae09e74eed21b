/**
 * Currency transfer collaborator used to settle share purchases
 */

import { AccountId } from '../models/Asset';

export interface PaymentResult {
  success: boolean;
  transactionId?: string;
  error?: string;
}

/**
 * A payment either moves the full amount or nothing; it never completes partially
 */
export interface ICurrencyConnector {
  pay(from: AccountId, to: AccountId, amount: number): PaymentResult;
}
