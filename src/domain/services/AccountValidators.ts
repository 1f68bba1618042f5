import { InvalidAccountNumberError, InvalidHolderNameError } from '../errors/BankingError.js';

const holderNamePattern = /^[A-ZА-ЯЁ][a-zа-яё]+ [A-ZА-ЯЁ][a-zа-яё]+$/;
const accountNumberPattern = /^ACC-([+-]?\d+)$/;

export const ACCOUNT_NUMBER_PREFIX = 'ACC-';

export const validateHolderName = (name: string): string => {
  if (!holderNamePattern.test(name)) {
    throw new InvalidHolderNameError(name);
  }

  return name;
};

/**
 * Canonical form of an account number. Integers become `ACC-<integer>`;
 * strings must already carry the prefix followed by an integer.
 */
export const canonicalizeAccountNumber = (value: string | number): string => {
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new InvalidAccountNumberError(value);
    }

    return `${ACCOUNT_NUMBER_PREFIX}${value}`;
  }

  if (!accountNumberPattern.test(value)) {
    throw new InvalidAccountNumberError(value);
  }

  return value;
};
