import { Injectable } from '@nestjs/common';
import { Lot } from './entities/lot.entity';
import { SecuritySummary } from './entities/security-summary.entity';
import Decimal from 'decimal.js';
import { divideOrZero, toDecimal } from '../common/utils/decimal.util';

@Injectable()
export class SummaryBuilderService {
  /**
   * Rolls remaining lots up per security, sorted by security key.
   * Lots with nothing left are ignored.
   */
  build(lots: Lot[]): SecuritySummary[] {
    const bySecurity = new Map<string, Lot[]>();

    for (const lot of lots) {
      if (lot.remainingQty <= 0) {
        continue;
      }
      const group = bySecurity.get(lot.security);
      if (group) {
        group.push(lot);
      } else {
        bySecurity.set(lot.security, [lot]);
      }
    }

    return Array.from(bySecurity.entries())
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([security, group]) => this.summarize(security, group));
  }

  summarize(security: string, lots: Lot[]): SecuritySummary {
    const remaining = lots.filter((lot) => lot.remainingQty > 0);
    const totalShares = remaining.reduce((sum, lot) => sum + lot.remainingQty, 0);
    const totalCost = remaining.reduce((sum, lot) => sum.plus(lot.remainingCost), new Decimal(0));

    let earliestPurchase: Date | null = null;
    let latestPurchase: Date | null = null;
    for (const lot of remaining) {
      const time = lot.tradeDate.getTime();
      if (!earliestPurchase || time < earliestPurchase.getTime()) {
        earliestPurchase = lot.tradeDate;
      }
      if (!latestPurchase || time > latestPurchase.getTime()) {
        latestPurchase = lot.tradeDate;
      }
    }

    return {
      security,
      totalShares,
      totalCost,
      earliestPurchase,
      latestPurchase,
      lotCount: remaining.length,
      averageCost: divideOrZero(totalCost, toDecimal(totalShares)),
    };
  }
}
