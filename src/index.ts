import { Server } from 'http';
import { createApp, startServer } from './api/server';
import { AppConfig, loadConfig } from './config/app-config';
import { TradeDesk } from './services/formulas';
import { HeliusSource } from './services/wallet/sources/helius-source';
import { MagicEdenSource } from './services/wallet/sources/magic-eden-source';
import { SolscanSource } from './services/wallet/sources/solscan-source';
import { WalletAggregator } from './services/wallet/wallet-aggregator';
import { createLogger, setLogLevel } from './utils/logger';

const logger = createLogger('Main');

export function buildWalletAggregator(config: AppConfig): WalletAggregator {
  const { providers, providerTimeoutMs: timeout } = config;

  return new WalletAggregator({
    walletAddress: config.walletAddress,
    balanceHistorySize: config.balanceHistorySize,
    sources: {
      helius: new HeliusSource({
        baseUrl: providers.heliusUrl,
        timeout,
        ...(providers.heliusApiKey ? { params: { 'api-key': providers.heliusApiKey } } : {}),
      }),
      solscan: new SolscanSource({ baseUrl: providers.solscanUrl, timeout }),
      magicEden: new MagicEdenSource({ baseUrl: providers.magicEdenUrl, timeout }),
    },
  });
}

function shutdown(server: Server, signal: string): void {
  logger.info(`${signal} received, shutting down server...`);
  server.close(error => {
    if (error) {
      logger.error('Error while closing server:', error);
      process.exit(1);
    }
    logger.info('Server closed');
    process.exit(0);
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const app = createApp({
    wallet: buildWalletAggregator(config),
    tradeDesk: new TradeDesk(),
  });
  const server = await startServer(app, config.port);

  process.on('SIGINT', () => shutdown(server, 'SIGINT'));
  process.on('SIGTERM', () => shutdown(server, 'SIGTERM'));
}

if (require.main === module) {
  main().catch(error => {
    logger.error('Startup failed:', error);
    process.exitCode = 1;
  });
}
