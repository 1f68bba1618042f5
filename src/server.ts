import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import {
  AmountRequestSchema,
  InterestRequestSchema,
  OpenAccountSchema,
  TopOperationsQuerySchema,
} from './application/dto/AccountRequestDTO.js';
import { UnsupportedFormatError } from './domain/errors/BankingError.js';
import type { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { detectHistoryFormat } from './infrastructure/adapters/source/FileOperationSource.js';
import { errorBody, httpStatusFor } from './infrastructure/http/errorResponse.js';

const sendError = (res: Response, error: unknown, fallback: string) => {
  const status = httpStatusFor(error);
  if (status >= 500) {
    console.error(`${fallback}:`, error);
  }

  res.status(status).json(errorBody(error, fallback));
};

export const createServer = (container: AppContainer) => {
  const app = express();
  const { accountService } = container;

  // History uploads stay in memory; they are read to completion before cleaning.
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: container.config.imports.maxFileSizeBytes,
    },
    fileFilter: (req, file, cb) => {
      if (detectHistoryFormat(file.originalname)) {
        cb(null, true);
      } else {
        cb(new UnsupportedFormatError(file.originalname));
      }
    },
  });

  app.use(cors({ origin: container.config.server.corsOrigin, credentials: false }));
  app.use(express.json({ limit: '1mb' }));

  app.get('/api/health', async (req, res) => {
    try {
      const accounts = await accountService.listAccounts();
      res.json({
        name: container.config.app.name,
        version: container.config.app.version,
        accounts: accounts.length,
      });
    } catch (error) {
      sendError(res, error, 'Health check failed');
    }
  });

  app.post('/api/accounts', async (req, res) => {
    try {
      const params = OpenAccountSchema.parse(req.body);
      const account = await accountService.openAccount(params);
      res.status(201).json(account.getAccountInfo());
    } catch (error) {
      sendError(res, error, 'Unable to open account');
    }
  });

  app.get('/api/accounts', async (req, res) => {
    try {
      res.json(await accountService.listAccounts());
    } catch (error) {
      sendError(res, error, 'Unable to list accounts');
    }
  });

  app.get('/api/accounts/:accountNumber', async (req, res) => {
    try {
      const account = await accountService.getAccount(req.params.accountNumber);
      res.json(account.getAccountInfo());
    } catch (error) {
      sendError(res, error, 'Unable to load account');
    }
  });

  app.post('/api/accounts/:accountNumber/deposit', async (req, res) => {
    try {
      const { amount } = AmountRequestSchema.parse(req.body);
      res.json(await accountService.deposit(req.params.accountNumber, amount));
    } catch (error) {
      sendError(res, error, 'Unable to deposit');
    }
  });

  app.post('/api/accounts/:accountNumber/withdraw', async (req, res) => {
    try {
      const { amount } = AmountRequestSchema.parse(req.body);
      res.json(await accountService.withdraw(req.params.accountNumber, amount));
    } catch (error) {
      sendError(res, error, 'Unable to withdraw');
    }
  });

  app.post('/api/accounts/:accountNumber/interest', async (req, res) => {
    try {
      const { rate } = InterestRequestSchema.parse(req.body);
      res.json(await accountService.applyInterest(req.params.accountNumber, rate));
    } catch (error) {
      sendError(res, error, 'Unable to apply interest');
    }
  });

  app.post('/api/accounts/:accountNumber/import', upload.single('history'), async (req, res) => {
    try {
      if (!req.file) {
        res.status(400).json({ error: 'No history file provided. Upload a CSV or JSON file as "history".' });
        return;
      }

      const report = await accountService.importHistory(req.params.accountNumber, {
        fileName: req.file.originalname,
        content: req.file.buffer,
      });

      res.json(report);
    } catch (error) {
      sendError(res, error, 'Unable to import history');
    }
  });

  app.get('/api/accounts/:accountNumber/history', async (req, res) => {
    try {
      res.json(await accountService.history(req.params.accountNumber));
    } catch (error) {
      sendError(res, error, 'Unable to load history');
    }
  });

  app.get('/api/accounts/:accountNumber/top', async (req, res) => {
    try {
      const { count, sortBy } = TopOperationsQuerySchema.parse(req.query);
      res.json(await accountService.topOperations(req.params.accountNumber, count, sortBy));
    } catch (error) {
      sendError(res, error, 'Unable to rank operations');
    }
  });

  app.get('/api/accounts/:accountNumber/chart', async (req, res) => {
    try {
      res.json(await accountService.balanceChart(req.params.accountNumber));
    } catch (error) {
      sendError(res, error, 'Unable to build chart');
    }
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'API endpoint not found' });
  });

  // Upload rejections from multer arrive here rather than in the route.
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    sendError(res, error, 'Request failed');
  });

  return app;
};
