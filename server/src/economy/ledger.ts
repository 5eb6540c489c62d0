import type { IncomeSource } from '@hustle/shared';
import { SIM_CONFIG, LARGE_DEPOSIT_THRESHOLD } from '@hustle/shared';

/** What the heat engine needs from whoever keeps the money */
export interface EconomyPort {
  /** Share of income that can be explained, 0-1 */
  getLegitimacyRatio(actorId: string): number;
  getBalance(actorId: string): number;
  freezeFunds(actorId: string, amount: number): void;
  unfreezeFunds(actorId: string): void;
  applyFine(actorId: string, amount: number, reason: string): void;
}

export interface Wallet {
  balance: number;
  frozen: number;
  legalIncome: number;
  illegalIncome: number;
  unexplainedIncome: number;
}

export interface TransactionResult {
  success: boolean;
  message: string;
}

type IncomeListener = (actorId: string, amount: number, source: IncomeSource) => void;

/**
 * Per-actor wallets. Only as much bookkeeping as the audit needs:
 * balances, frozen funds, and where the money came from.
 */
export class Ledger implements EconomyPort {
  private wallets = new Map<string, Wallet>();
  private incomeListeners: IncomeListener[] = [];

  onIncome(listener: IncomeListener): void {
    this.incomeListeners.push(listener);
  }

  getWallet(actorId: string): Wallet {
    let wallet = this.wallets.get(actorId);
    if (!wallet) {
      wallet = { balance: 0, frozen: 0, legalIncome: 0, illegalIncome: 0, unexplainedIncome: 0 };
      this.wallets.set(actorId, wallet);
    }
    return wallet;
  }

  addIncome(actorId: string, amount: number, source: IncomeSource): TransactionResult {
    if (!(amount > 0) || !Number.isFinite(amount)) {
      return { success: false, message: 'Income must be a positive amount' };
    }

    const wallet = this.getWallet(actorId);
    wallet.balance += amount;
    if (SIM_CONFIG.illegalIncomeSources.includes(source)) {
      wallet.illegalIncome += amount;
    } else if (source === 'Other' && amount > LARGE_DEPOSIT_THRESHOLD) {
      wallet.unexplainedIncome += amount;
    } else {
      wallet.legalIncome += amount;
    }

    for (const listener of this.incomeListeners) listener(actorId, amount, source);
    return { success: true, message: `Received ${amount.toFixed(2)} (${source})` };
  }

  deductExpense(actorId: string, amount: number, reason: string): TransactionResult {
    if (!(amount > 0) || !Number.isFinite(amount)) {
      return { success: false, message: 'Expense must be a positive amount' };
    }
    const wallet = this.getWallet(actorId);
    if (amount > this.spendable(actorId)) {
      return { success: false, message: `Insufficient funds for ${reason}` };
    }
    wallet.balance -= amount;
    return { success: true, message: `Paid ${amount.toFixed(2)} for ${reason}` };
  }

  spendable(actorId: string): number {
    const wallet = this.getWallet(actorId);
    return Math.max(0, wallet.balance - wallet.frozen);
  }

  // === EconomyPort ===

  getLegitimacyRatio(actorId: string): number {
    const wallet = this.getWallet(actorId);
    const total = wallet.legalIncome + wallet.illegalIncome + wallet.unexplainedIncome;
    if (total <= 0) return 1;
    return wallet.legalIncome / total;
  }

  getBalance(actorId: string): number {
    return this.getWallet(actorId).balance;
  }

  freezeFunds(actorId: string, amount: number): void {
    const wallet = this.getWallet(actorId);
    wallet.frozen = Math.min(wallet.balance, wallet.frozen + Math.max(0, amount));
  }

  unfreezeFunds(actorId: string): void {
    this.getWallet(actorId).frozen = 0;
  }

  /** Fines ignore the freeze and may not take the balance below zero */
  applyFine(actorId: string, amount: number, reason: string): void {
    const wallet = this.getWallet(actorId);
    const fine = Math.min(wallet.balance, Math.max(0, amount));
    wallet.balance -= fine;
    wallet.frozen = Math.min(wallet.frozen, wallet.balance);
    console.log(`[Ledger] ${actorId} fined ${fine.toFixed(2)}: ${reason}`);
  }
}
