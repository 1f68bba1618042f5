import multer from 'multer';
import { ZodError } from 'zod';
import {
  AccountNotFoundError,
  BankingError,
  DuplicateAccountNumberError,
  InvalidImportedBalanceError,
  NegativeBalanceAfterImportError,
} from '../../domain/errors/BankingError.js';

export interface ErrorBody {
  error: string;
  code?: string;
  issues?: Array<{ path: string; message: string }>;
}

export const httpStatusFor = (error: unknown): number => {
  if (error instanceof AccountNotFoundError) return 404;
  if (error instanceof DuplicateAccountNumberError) return 409;
  if (error instanceof InvalidImportedBalanceError || error instanceof NegativeBalanceAfterImportError) return 422;
  if (error instanceof BankingError || error instanceof ZodError || error instanceof multer.MulterError) return 400;
  return 500;
};

export const errorBody = (error: unknown, fallback: string): ErrorBody => {
  if (error instanceof ZodError) {
    return {
      error: 'Invalid request',
      issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    };
  }

  if (error instanceof BankingError) {
    return { error: error.message, code: error.code };
  }

  return { error: error instanceof Error ? error.message : fallback };
};
