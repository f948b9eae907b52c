import { Router } from 'express';
import { z } from 'zod';
import { DEFAULT_TRANSACTION_LIMIT, WalletAggregator } from '../services/wallet/wallet-aggregator';
import { nowIso } from '../utils/time';
import { asyncHandler, parseWith } from './validation';

export const MAX_TRANSACTION_LIMIT = 100;

const transactionsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_TRANSACTION_LIMIT).default(DEFAULT_TRANSACTION_LIMIT),
});

// Aggregator envelopes go out as-is; provider trouble shows in their status field.
export function createWalletRouter(wallet: WalletAggregator): Router {
  const router = Router();

  router.get('/balance', asyncHandler(async (_req, res) => {
    res.json(await wallet.getBalance());
  }));

  router.get('/tokens', asyncHandler(async (_req, res) => {
    res.json(await wallet.getTokens());
  }));

  router.get('/nfts', asyncHandler(async (_req, res) => {
    res.json(await wallet.getNfts());
  }));

  router.get('/transactions', asyncHandler(async (req, res) => {
    const { limit } = parseWith(transactionsQuery, req.query);
    res.json(await wallet.getTransactions(limit));
  }));

  router.get('/monitor', asyncHandler(async (_req, res) => {
    res.json(await wallet.monitor());
  }));

  router.get('/value', asyncHandler(async (_req, res) => {
    res.json(await wallet.walletValue());
  }));

  router.get('/profit', (_req, res) => {
    res.json(wallet.trackProfit());
  });

  router.get('/status', (_req, res) => {
    res.json(wallet.status());
  });

  router.get('/history', (_req, res) => {
    const history = wallet.balanceHistory();
    res.json({ status: 'success', history, count: history.length, timestamp: nowIso() });
  });

  return router;
}
