import * as dotenv from 'dotenv';
import { PublicKey } from '@solana/web3.js';
import { ConfigError } from '../utils/errors';
import { isLogLevel, LogLevel } from '../utils/logger';

dotenv.config();

export interface ProviderEndpoints {
  heliusUrl: string;
  heliusApiKey?: string;
  solscanUrl: string;
  magicEdenUrl: string;
}

export interface AppConfig {
  port: number;
  walletAddress: string;
  providers: ProviderEndpoints;
  providerTimeoutMs: number;
  balanceHistorySize: number;
  logLevel: LogLevel;
}

export const defaultConfig = {
  port: 3000,
  providers: {
    heliusUrl: 'https://api.helius.xyz/v0',
    solscanUrl: 'https://api.solscan.io/api',
    magicEdenUrl: 'https://api.magiceden.dev/v2',
  },
  providerTimeoutMs: 10000, // one-shot calls, no retry
  balanceHistorySize: 100,
  logLevel: 'info',
} as const;

type Env = Record<string, string | undefined>;

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export function parseWalletAddress(value: string | undefined): string {
  const address = value?.trim();
  if (!address) {
    throw new ConfigError('WALLET_ADDRESS environment variable is required');
  }
  try {
    return new PublicKey(address).toBase58();
  } catch {
    throw new ConfigError(`WALLET_ADDRESS is not a valid Solana address: ${address}`);
  }
}

export function loadConfig(env: Env = process.env): AppConfig {
  const logLevel = env.LOG_LEVEL?.toLowerCase();
  const heliusApiKey = env.HELIUS_API_KEY?.trim();

  const providers: ProviderEndpoints = {
    heliusUrl: env.HELIUS_API_URL || defaultConfig.providers.heliusUrl,
    solscanUrl: env.SOLSCAN_API_URL || defaultConfig.providers.solscanUrl,
    magicEdenUrl: env.MAGIC_EDEN_API_URL || defaultConfig.providers.magicEdenUrl,
  };
  if (heliusApiKey) {
    providers.heliusApiKey = heliusApiKey;
  }

  return {
    port: parseNumber(env.API_PORT, defaultConfig.port),
    walletAddress: parseWalletAddress(env.WALLET_ADDRESS),
    providers,
    providerTimeoutMs: parseNumber(env.PROVIDER_TIMEOUT_MS, defaultConfig.providerTimeoutMs),
    balanceHistorySize: Math.max(
      1,
      Math.floor(parseNumber(env.BALANCE_HISTORY_SIZE, defaultConfig.balanceHistorySize))
    ),
    logLevel: logLevel && isLogLevel(logLevel) ? logLevel : defaultConfig.logLevel,
  };
}
