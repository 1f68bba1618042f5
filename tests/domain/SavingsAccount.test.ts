import { describe, expect, test } from 'vitest';
import { SavingsAccount } from '../../src/domain/entities/SavingsAccount.js';
import {
  InvalidAmountError,
  InvalidRateError,
  WithdrawalLimitExceededError,
} from '../../src/domain/errors/BankingError.js';

const holder = 'Olga Sidorova';

describe('SavingsAccount', () => {
  test('interest of 10% on 100 yields 110 and one interest entry', () => {
    const account = new SavingsAccount({ holder, balance: 100 });

    account.applyInterest(10);

    expect(account.balance).toBe(110);
    const history = account.getHistory();
    expect(history).toHaveLength(1);
    expect(history[0]).toMatchObject({ kind: 'interest', amount: 10, balanceAfter: 110, status: 'success' });
  });

  test('a non-positive rate fails without a ledger entry', () => {
    const account = new SavingsAccount({ holder, balance: 100 });

    expect(() => account.applyInterest(0)).toThrow(InvalidRateError);
    expect(() => account.applyInterest(-5)).toThrow(InvalidRateError);

    expect(account.balance).toBe(100);
    expect(account.getHistory()).toHaveLength(0);
  });

  test('interest on an empty balance records nothing', () => {
    const account = new SavingsAccount({ holder });

    account.applyInterest(5);

    expect(account.balance).toBe(0);
    expect(account.getHistory()).toHaveLength(0);
  });

  test('withdrawing exactly half of the balance succeeds', () => {
    const account = new SavingsAccount({ holder, balance: 100 });

    account.withdraw(50);

    expect(account.balance).toBe(50);
    expect(account.getHistory()[0]).toMatchObject({ kind: 'withdraw', amount: 50, balanceAfter: 50, status: 'success' });
  });

  test('withdrawing more than half is refused before anything is recorded', () => {
    const account = new SavingsAccount({ holder, balance: 100 });

    expect(() => account.withdraw(50.01)).toThrow(WithdrawalLimitExceededError);
    expect(() => account.withdraw(60)).toThrow(WithdrawalLimitExceededError);

    expect(account.balance).toBe(100);
    expect(account.getHistory()).toEqual([]);
  });

  test('the limit message names the available maximum', () => {
    const account = new SavingsAccount({ holder, balance: 80 });

    expect(() => account.withdraw(60)).toThrow('Maximum available: 40.00');
  });

  test('a non-positive withdrawal fails before the limit check and is not recorded', () => {
    const account = new SavingsAccount({ holder, balance: 100 });

    expect(() => account.withdraw(0)).toThrow(InvalidAmountError);
    expect(account.getHistory()).toHaveLength(0);
  });

  test('repeated withdrawals never take more than half of the current balance', () => {
    const account = new SavingsAccount({ holder, balance: 1000 });
    const attempts = [400, 400, 300, 150, 200];

    for (const amount of attempts) {
      const before = account.balance;
      try {
        account.withdraw(amount);
        expect(amount).toBeLessThanOrEqual(before * 0.5);
      } catch (error) {
        expect(error).toBeInstanceOf(WithdrawalLimitExceededError);
        expect(account.balance).toBe(before);
      }
    }

    expect(account.balance).toBe(150);
  });

  test('allows interest among imported kinds', () => {
    expect(new SavingsAccount({ holder }).allowedImportKinds).toEqual(['deposit', 'withdraw', 'interest']);
  });
});
