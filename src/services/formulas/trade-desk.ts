import { Decimal } from 'decimal.js';
import { createLogger } from '../../utils/logger';
import { nowIso } from '../../utils/time';
import { principleVibration, VibrationResult } from './hermetic-principles';
import {
  EthicalAlignmentRecord,
  ethicalAlignment,
  gratitudePractice,
  GratitudeRecord,
  intentionSetting,
  IntentionRecord,
} from './positive-practice';
import { goldenRatioLevels, PHI } from './sacred-geometry';
import { superposition, SuperpositionResult } from './quantum-consciousness';

const logger = createLogger('TradeDesk');

export const PROFIT_MULTIPLIER = 1.1;

export interface OpportunityAnalysis {
  asset: string;
  price: number;
  volume: number;
  sacredGeometry: {
    fibonacciLevels: number[];
    goldenRatio: number;
  };
  hermeticAnalysis: VibrationResult;
  quantumAnalysis: SuperpositionResult;
  ethicalAlignment: EthicalAlignmentRecord;
  opportunityScore: number;
  timestamp: string;
}

export interface TradeRecord {
  asset: string;
  amount: number;
  entryPrice: number;
  intention: IntentionRecord;
  gratitude: GratitudeRecord;
  status: 'EXECUTED';
  timestamp: string;
}

export interface ProfitCalculation {
  entryPrice: number;
  exitPrice: number;
  amount: number;
  profit: number;
  roiPercent: number;
  multiplier: number;
  boostedProfit: number;
  totalProfits: number;
  timestamp: string;
}

export interface TradeDeskStatus {
  tradesExecuted: number;
  profitsCalculated: number;
  totalProfit: number;
  averageProfitPerTrade: number;
  timestamp: string;
}

/**
 * Paper trade book. "Executing" a trade only records it in memory; nothing
 * is signed or sent anywhere.
 */
export class TradeDesk {
  private readonly trades: TradeRecord[] = [];
  private readonly profits: number[] = [];
  private totalProfit = new Decimal(0);

  analyzeOpportunity(asset: string, price: number, volume: number): OpportunityAnalysis {
    const levels = goldenRatioLevels(price);
    const highest = Math.max(...levels);

    return {
      asset,
      price,
      volume,
      sacredGeometry: {
        fibonacciLevels: levels.slice(0, 5),
        goldenRatio: PHI,
      },
      hermeticAnalysis: principleVibration(volume),
      quantumAnalysis: superposition(price * 1.05, price * 0.95),
      ethicalAlignment: ethicalAlignment(`Trade ${asset} at ${price}`, true),
      opportunityScore: highest === 0 ? 0 : (price / highest) * 100,
      timestamp: nowIso(),
    };
  }

  executeTrade(asset: string, amount: number, price: number): TradeRecord {
    const trade: TradeRecord = {
      asset,
      amount,
      entryPrice: price,
      intention: intentionSetting(
        `Profitable trade in ${asset}`,
        `I attract profitable opportunities with ${asset}`
      ),
      gratitude: gratitudePractice('Abundance, opportunity, and wisdom'),
      status: 'EXECUTED',
      timestamp: nowIso(),
    };

    this.trades.push(trade);
    logger.info(`✓ Trade recorded: ${asset} @ ${price}`);

    return trade;
  }

  calculateProfit(entry: number, exit: number, amount: number): ProfitCalculation {
    const profit = (exit - entry) * amount;
    const roiPercent = entry === 0 ? 0 : ((exit - entry) / entry) * 100;
    const boostedProfit = profit * PROFIT_MULTIPLIER;

    this.profits.push(boostedProfit);
    this.totalProfit = this.totalProfit.plus(boostedProfit);

    return {
      entryPrice: entry,
      exitPrice: exit,
      amount,
      profit,
      roiPercent,
      multiplier: PROFIT_MULTIPLIER,
      boostedProfit,
      totalProfits: this.totalProfit.toNumber(),
      timestamp: nowIso(),
    };
  }

  status(): TradeDeskStatus {
    return {
      tradesExecuted: this.trades.length,
      profitsCalculated: this.profits.length,
      totalProfit: this.totalProfit.toNumber(),
      averageProfitPerTrade: this.totalProfit.dividedBy(Math.max(1, this.profits.length)).toNumber(),
      timestamp: nowIso(),
    };
  }

  getTrades(): TradeRecord[] {
    return [...this.trades];
  }
}
