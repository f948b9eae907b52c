import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { Server } from 'http';
import { TradeDesk } from '../services/formulas';
import { WalletAggregator } from '../services/wallet/wallet-aggregator';
import { RequestValidationError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { nowIso } from '../utils/time';
import { createFormulaRouter } from './formula-api';
import { createWalletRouter } from './wallet-api';

const logger = createLogger('API');

export const API_VERSION = 'v1';

export interface ApiDependencies {
  wallet: WalletAggregator;
  tradeDesk: TradeDesk;
}

function isBodyParseError(err: unknown): err is SyntaxError & { status: number } {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

export function createApp({ wallet, tradeDesk }: ApiDependencies): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: API_VERSION,
      wallet: wallet.walletAddress,
      timestamp: nowIso(),
    });
  });

  app.use('/api/wallet', createWalletRouter(wallet));
  app.use('/api', createFormulaRouter(tradeDesk));

  app.use((req, res) => {
    res.status(404).json({ status: 'error', error: `Not found: ${req.method} ${req.path}` });
  });

  // Error handling middleware
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof RequestValidationError) {
      res.status(400).json({ status: 'error', error: err.message, issues: err.issues });
      return;
    }
    if (isBodyParseError(err)) {
      res.status(400).json({ status: 'error', error: 'Malformed JSON body' });
      return;
    }
    logger.error('Server error:', err);
    res.status(500).json({ status: 'error', error: 'Internal server error' });
  });

  return app;
}

export function startServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once('listening', () => {
      logger.info(`🚀 API server running on http://localhost:${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
