/**
 * Balance-keeping currency connector held entirely in memory
 */

import { AccountId } from '../models/Asset';
import { isNonNegativeInteger } from '../utils/unitMath';
import { ICurrencyConnector, PaymentResult } from './CurrencyConnector';

export interface PaymentRecord {
  transactionId: string;
  from: AccountId;
  to: AccountId;
  amount: number;
  timestamp: Date;
}

export class InMemoryCurrencyConnector implements ICurrencyConnector {
  private balances: Map<AccountId, number> = new Map();
  private payments: PaymentRecord[] = [];
  private nextTransaction = 1;

  constructor(initialBalances: Record<AccountId, number> = {}) {
    for (const [account, amount] of Object.entries(initialBalances)) {
      this.deposit(account, amount);
    }
  }

  deposit(account: AccountId, amount: number): void {
    if (!isNonNegativeInteger(amount)) {
      throw new Error(`Invalid deposit amount: ${amount}`);
    }
    this.balances.set(account, this.getBalance(account) + amount);
  }

  getBalance(account: AccountId): number {
    return this.balances.get(account) ?? 0;
  }

  getPayments(): PaymentRecord[] {
    return [...this.payments];
  }

  pay(from: AccountId, to: AccountId, amount: number): PaymentResult {
    if (!isNonNegativeInteger(amount)) {
      return { success: false, error: `Invalid payment amount: ${amount}` };
    }

    const available = this.getBalance(from);
    if (available < amount) {
      return {
        success: false,
        error: `Insufficient balance: ${from} has ${available}, needs ${amount}`
      };
    }

    this.balances.set(from, available - amount);
    this.balances.set(to, this.getBalance(to) + amount);

    const transactionId = `payment_${this.nextTransaction++}`;
    this.payments.push({ transactionId, from, to, amount, timestamp: new Date() });

    return { success: true, transactionId };
  }
}
