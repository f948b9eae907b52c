import { Decimal } from 'decimal.js';
import { nowIso } from '../../utils/time';
import { ProfitTracking } from './types';

/**
 * Process-lifetime profit counter. `record` is synchronous, so updates from
 * concurrent requests are applied one at a time on the event loop.
 */
export class ProfitTracker {
  private total = new Decimal(0);
  private last = new Decimal(0);
  private sessions = 0;
  private updatedAt: string = nowIso();

  record(delta: number): ProfitTracking {
    this.last = new Decimal(delta);
    this.total = this.total.plus(this.last);
    this.sessions++;
    this.updatedAt = nowIso();
    return this.snapshot();
  }

  snapshot(): ProfitTracking {
    return {
      totalProfit: this.total.toNumber(),
      lastProfit: this.last.toNumber(),
      sessions: this.sessions,
      timestamp: this.updatedAt,
    };
  }

  averagePerSession(): number {
    return this.total.dividedBy(Math.max(1, this.sessions)).toNumber();
  }
}
