import { describe, it, expect } from 'vitest';
import type { IncomeSource } from '@hustle/shared';
import { Ledger } from '../src/economy/ledger.js';

describe('Ledger', () => {
  it('treats an actor with no income as fully legitimate', () => {
    expect(new Ledger().getLegitimacyRatio('player')).toBe(1);
  });

  it('splits legal from illegal income', () => {
    const ledger = new Ledger();
    ledger.addIncome('player', 3000, 'Salary');
    ledger.addIncome('player', 1000, 'DrugSale');

    expect(ledger.getBalance('player')).toBe(4000);
    expect(ledger.getLegitimacyRatio('player')).toBe(0.75);
  });

  it('counts large unexplained deposits against legitimacy', () => {
    const ledger = new Ledger();
    ledger.addIncome('player', 100, 'Other');
    ledger.addIncome('player', 6000, 'Other');

    const wallet = ledger.getWallet('player');
    expect(wallet.legalIncome).toBe(100);
    expect(wallet.unexplainedIncome).toBe(6000);
    expect(ledger.getLegitimacyRatio('player')).toBeCloseTo(100 / 6100);
  });

  it('rejects non-positive amounts', () => {
    const ledger = new Ledger();
    expect(ledger.addIncome('player', 0, 'Salary')).toEqual({ success: false, message: 'Income must be a positive amount' });
    expect(ledger.deductExpense('player', -1, 'rent').success).toBe(false);
  });

  it('keeps frozen funds out of reach of expenses', () => {
    const ledger = new Ledger();
    ledger.addIncome('player', 1000, 'Salary');
    ledger.freezeFunds('player', 300);

    expect(ledger.spendable('player')).toBe(700);
    expect(ledger.deductExpense('player', 800, 'rent')).toEqual({ success: false, message: 'Insufficient funds for rent' });
    expect(ledger.deductExpense('player', 700, 'rent').success).toBe(true);
    expect(ledger.getBalance('player')).toBe(300);

    ledger.unfreezeFunds('player');
    expect(ledger.spendable('player')).toBe(300);
  });

  it('takes fines from the whole balance but never below zero', () => {
    const ledger = new Ledger();
    ledger.addIncome('player', 500, 'Salary');
    ledger.freezeFunds('player', 400);
    ledger.applyFine('player', 200, 'test fine');

    expect(ledger.getBalance('player')).toBe(300);
    expect(ledger.getWallet('player').frozen).toBe(300);

    ledger.applyFine('player', 1000, 'test fine');
    expect(ledger.getBalance('player')).toBe(0);
  });

  it('notifies income listeners', () => {
    const ledger = new Ledger();
    const seen: Array<[string, number, IncomeSource]> = [];
    ledger.onIncome((actorId, amount, source) => seen.push([actorId, amount, source]));
    ledger.addIncome('player', 250, 'Gift');
    expect(seen).toEqual([['player', 250, 'Gift']]);
  });
});
