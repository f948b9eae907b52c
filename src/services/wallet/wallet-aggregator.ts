import { errorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { nowIso } from '../../utils/time';
import { BalanceHistory } from './balance-history';
import { fetchWithFallback } from './fetch-with-fallback';
import { computeProfitDelta } from './profit-delta';
import { ProfitTracker } from './profit-tracker';
import { HeliusSource } from './sources/helius-source';
import { MagicEdenSource } from './sources/magic-eden-source';
import { SolscanSource } from './sources/solscan-source';
import {
  BalanceEnvelope,
  BalanceHistoryEntry,
  DegradedOutcome,
  ErrorEnvelope,
  MonitorSnapshot,
  NftsEnvelope,
  ProfitReport,
  TokensEnvelope,
  TransactionsEnvelope,
  PlaceholderEnvelope,
  WalletResource,
  WalletStatus,
  WalletValueResponse,
} from './types';

const logger = createLogger('WalletAggregator');

export const DEFAULT_TRANSACTION_LIMIT = 50;
export const MONITOR_TRANSACTION_LIMIT = 10;

export interface WalletSources {
  helius: HeliusSource;
  solscan: SolscanSource;
  magicEden: MagicEdenSource;
}

export interface WalletAggregatorOptions {
  walletAddress: string;
  sources: WalletSources;
  balanceHistorySize: number;
  profitTracker?: ProfitTracker;
}

/**
 * Read-only view of one wallet assembled from third-party data providers.
 *
 * Every public operation resolves with a well-formed envelope. A provider
 * call that throws, for whatever reason, falls through to the next provider
 * and finally to a `pending` placeholder; anything thrown outside a provider
 * call becomes an `error` envelope.
 */
export class WalletAggregator {
  readonly walletAddress: string;
  private readonly sources: WalletSources;
  private readonly profitTracker: ProfitTracker;
  private readonly history: BalanceHistory;
  private transactions: unknown[] = [];

  constructor(options: WalletAggregatorOptions) {
    this.walletAddress = options.walletAddress;
    this.sources = options.sources;
    this.profitTracker = options.profitTracker ?? new ProfitTracker();
    this.history = new BalanceHistory(options.balanceHistorySize);

    logger.info(`🔐 Wallet aggregator initialized for ${this.walletAddress}`);
  }

  async getBalance(): Promise<BalanceEnvelope> {
    const envelope = await this.guard('balance', () => this.loadBalance());
    this.history.add(this.toHistoryEntry(envelope));
    return envelope;
  }

  async getTokens(): Promise<TokensEnvelope> {
    return this.guard<TokensEnvelope>('tokens', async () => {
      const { magicEden } = this.sources;
      const outcome = await fetchWithFallback('tokens', [
        { provider: magicEden.name, run: () => magicEden.getTokens(this.walletAddress) },
      ]);
      if (outcome.kind !== 'success') {
        return this.unavailable(outcome, 'Token balances unavailable');
      }
      return {
        status: 'success',
        tokens: outcome.data,
        count: outcome.data.length,
        timestamp: outcome.fetchedAt,
      };
    });
  }

  async getNfts(): Promise<NftsEnvelope> {
    return this.guard<NftsEnvelope>('nfts', async () => {
      const { magicEden } = this.sources;
      const outcome = await fetchWithFallback('nfts', [
        { provider: magicEden.name, run: () => magicEden.getNfts(this.walletAddress) },
      ]);
      if (outcome.kind !== 'success') {
        return this.unavailable(outcome, 'NFT holdings unavailable');
      }
      return {
        status: 'success',
        nfts: outcome.data,
        count: outcome.data.length,
        timestamp: outcome.fetchedAt,
      };
    });
  }

  async getTransactions(limit: number = DEFAULT_TRANSACTION_LIMIT): Promise<TransactionsEnvelope> {
    return this.guard<TransactionsEnvelope>('transactions', async () => {
      const { solscan } = this.sources;
      const outcome = await fetchWithFallback('transactions', [
        { provider: solscan.name, run: () => solscan.getTransactions(this.walletAddress, limit) },
      ]);
      if (outcome.kind !== 'success') {
        return this.unavailable(outcome, 'Transaction history unavailable');
      }
      this.transactions = outcome.data;
      return {
        status: 'success',
        transactions: outcome.data,
        count: outcome.data.length,
        timestamp: outcome.fetchedAt,
      };
    });
  }

  /**
   * Balance, tokens and recent transactions in one snapshot. The profit
   * delta of the first transactions is added to the running total and the
   * session counter moves on by one, whatever the providers returned.
   */
  async monitor(): Promise<MonitorSnapshot> {
    logger.info('👁️ Monitoring wallet for activity...');

    const [balance, tokens, transactions] = await Promise.all([
      this.getBalance(),
      this.getTokens(),
      this.getTransactions(MONITOR_TRANSACTION_LIMIT),
    ]);

    const profit =
      transactions.status === 'success' ? computeProfitDelta(transactions.transactions) : 0;
    const profitTracking = this.profitTracker.record(profit);

    logger.info('✓ Wallet monitoring complete');
    logger.info(`  - Balance status: ${balance.status}`);
    logger.info(`  - Tokens: ${tokens.count}`);
    logger.info(`  - Recent transactions: ${transactions.count}`);
    logger.info(`  - Profit detected: ${profit}`);

    return {
      status: 'success',
      wallet: this.walletAddress,
      balance,
      tokens,
      transactions,
      profitTracking,
      timestamp: nowIso(),
    };
  }

  // Monetary fields stay at zero: there is no pricing source behind them.
  async walletValue(): Promise<WalletValueResponse> {
    logger.info('💰 Calculating wallet value...');

    const [tokens, nfts] = await Promise.all([this.getTokens(), this.getNfts(), this.getBalance()]);
    const timestamp = nowIso();

    logger.info(`✓ Wallet value calculated (tokens: ${tokens.count}, nfts: ${nfts.count})`);

    return {
      status: 'success',
      wallet: this.walletAddress,
      value: {
        solBalance: 0,
        tokenValue: 0,
        tokenCount: tokens.count,
        nftCount: nfts.count,
        totalUsdValue: 0,
        timestamp,
      },
      timestamp,
    };
  }

  trackProfit(): ProfitReport {
    const profitTracking = this.profitTracker.snapshot();
    return {
      status: 'success',
      profitTracking,
      totalProfit: profitTracking.totalProfit,
      averageProfitPerSession: this.profitTracker.averagePerSession(),
      sessions: profitTracking.sessions,
      timestamp: nowIso(),
    };
  }

  status(): WalletStatus {
    const { helius, solscan, magicEden } = this.sources;
    return {
      status: 'active',
      walletAddress: this.walletAddress,
      profitTracking: this.profitTracker.snapshot(),
      transactionCount: this.transactions.length,
      balanceHistorySize: this.history.size(),
      sources: [helius.getHealth(), solscan.getHealth(), magicEden.getHealth()],
      timestamp: nowIso(),
    };
  }

  balanceHistory(): BalanceHistoryEntry[] {
    return this.history.list();
  }

  private async loadBalance(): Promise<BalanceEnvelope> {
    const { helius, solscan } = this.sources;
    const outcome = await fetchWithFallback('balance', [
      { provider: helius.name, run: () => helius.getBalance(this.walletAddress) },
      { provider: solscan.name, run: () => solscan.getAccount(this.walletAddress) },
    ]);
    if (outcome.kind !== 'success') {
      return this.unavailable(outcome, 'Wallet monitoring active');
    }
    return {
      status: 'success',
      wallet: this.walletAddress,
      source: outcome.provider,
      balance: outcome.data,
      timestamp: outcome.fetchedAt,
    };
  }

  private unavailable(outcome: DegradedOutcome, message: string): PlaceholderEnvelope {
    return {
      status: 'pending',
      wallet: this.walletAddress,
      message,
      failures: outcome.failures,
      count: 0,
      timestamp: outcome.fetchedAt,
    };
  }

  private async guard<E>(resource: WalletResource, operation: () => Promise<E>): Promise<E | ErrorEnvelope> {
    try {
      return await operation();
    } catch (error) {
      logger.error(`Error assembling ${resource}:`, error);
      return {
        status: 'error',
        wallet: this.walletAddress,
        error: errorMessage(error),
        count: 0,
        timestamp: nowIso(),
      };
    }
  }

  private toHistoryEntry(envelope: BalanceEnvelope): BalanceHistoryEntry {
    if (envelope.status === 'success') {
      return { status: envelope.status, source: envelope.source, timestamp: envelope.timestamp };
    }
    return { status: envelope.status, timestamp: envelope.timestamp };
  }
}
