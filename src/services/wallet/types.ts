import { ProviderErrorKind } from '../../utils/errors';

export type WalletResource = 'balance' | 'tokens' | 'transactions' | 'nfts';

// 'unexpected' covers anything thrown that is not a ProviderError
export type FailureKind = ProviderErrorKind | 'unexpected';

export interface ProviderFailure {
  provider: string;
  kind: FailureKind;
  message: string;
  status?: number;
}

export interface SuccessOutcome<T> {
  kind: 'success';
  provider: string;
  data: T;
  fetchedAt: string;
}

// Every provider attempt threw
export interface DegradedOutcome {
  kind: 'degraded';
  failures: ProviderFailure[];
  fetchedAt: string;
}

export type FetchOutcome<T> = SuccessOutcome<T> | DegradedOutcome;

export interface FetchAttempt<T> {
  provider: string;
  run: () => Promise<T>;
}

export type JsonObject = Record<string, unknown>;

export interface PlaceholderEnvelope {
  status: 'pending';
  wallet: string;
  message: string;
  failures: ProviderFailure[];
  count: 0;
  timestamp: string;
}

export interface ErrorEnvelope {
  status: 'error';
  wallet: string;
  error: string;
  count: 0;
  timestamp: string;
}

export type UnavailableEnvelope = PlaceholderEnvelope | ErrorEnvelope;

export type BalanceEnvelope =
  | {
      status: 'success';
      wallet: string;
      source: string;
      balance: JsonObject;
      timestamp: string;
    }
  | UnavailableEnvelope;

export type TokensEnvelope =
  | { status: 'success'; tokens: unknown[]; count: number; timestamp: string }
  | UnavailableEnvelope;

export type NftsEnvelope =
  | { status: 'success'; nfts: unknown[]; count: number; timestamp: string }
  | UnavailableEnvelope;

export type TransactionsEnvelope =
  | { status: 'success'; transactions: unknown[]; count: number; timestamp: string }
  | UnavailableEnvelope;

export interface ProfitTracking {
  totalProfit: number;
  lastProfit: number;
  sessions: number;
  timestamp: string;
}

export interface MonitorSnapshot {
  status: 'success';
  wallet: string;
  balance: BalanceEnvelope;
  tokens: TokensEnvelope;
  transactions: TransactionsEnvelope;
  profitTracking: ProfitTracking;
  timestamp: string;
}

export interface WalletValue {
  solBalance: number;
  tokenValue: number;
  tokenCount: number;
  nftCount: number;
  totalUsdValue: number;
  timestamp: string;
}

export interface WalletValueResponse {
  status: 'success';
  wallet: string;
  value: WalletValue;
  timestamp: string;
}

export interface ProfitReport {
  status: 'success';
  profitTracking: ProfitTracking;
  totalProfit: number;
  averageProfitPerSession: number;
  sessions: number;
  timestamp: string;
}

export interface BalanceHistoryEntry {
  status: BalanceEnvelope['status'];
  source?: string;
  timestamp: string;
}

export interface SourceHealth {
  name: string;
  healthy: boolean;
  consecutiveFailures: number;
  lastError: string | null;
}

export interface WalletStatus {
  status: 'active';
  walletAddress: string;
  profitTracking: ProfitTracking;
  transactionCount: number;
  balanceHistorySize: number;
  sources: SourceHealth[];
  timestamp: string;
}
