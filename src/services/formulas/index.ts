export * from './statistics';
export * from './sacred-geometry';
export * from './hermetic-principles';
export * from './quantum-consciousness';
export * from './positive-practice';
export { TradeDesk, PROFIT_MULTIPLIER } from './trade-desk';
export type {
  OpportunityAnalysis,
  TradeRecord,
  ProfitCalculation,
  TradeDeskStatus,
} from './trade-desk';
