import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { TradeRecord } from './entities/trade-record.entity';
import { Lot } from './entities/lot.entity';
import { CostBasis } from '../config/app.config';
import { toDateKey } from '../common/utils/date.util';

export const AGGREGATED_ORDER_PREFIX = 'Aggregated-';

// Collapses same-day buys of a security into one lot at the quantity-weighted average price.
@Injectable()
export class SameDayAggregatorService {
  /**
   * Groups buys by (security, trade date).
   * Lots come back ordered by the earliest row of each group, so aggregation
   * never moves a purchase relative to the rest of the security's trades.
   */
  aggregate(buys: TradeRecord[], costBasis: CostBasis): Lot[] {
    const groups = new Map<string, TradeRecord[]>();

    for (const buy of buys) {
      const key = `${buy.security}\u0000${toDateKey(buy.tradeDate)}`;
      const group = groups.get(key);
      if (group) {
        group.push(buy);
      } else {
        groups.set(key, [buy]);
      }
    }

    return Array.from(groups.values())
      .map((group) => this.buildLot(group, costBasis))
      .sort((a, b) => a.position - b.position);
  }

  private buildLot(group: TradeRecord[], costBasis: CostBasis): Lot {
    const [first] = group;
    const quantity = group.reduce((sum, buy) => sum + buy.buyQty, 0);
    const totalCost = group.reduce((sum, buy) => sum.plus(this.costOf(buy, costBasis)), new Decimal(0));
    const position = group.reduce((earliest, buy) => Math.min(earliest, buy.position), first.position);
    const aggregated = group.length > 1;

    // single lots priced by qty × price keep the row price untouched
    const price = !aggregated && costBasis === 'price'
      ? first.buyPrice
      : totalCost.dividedBy(quantity);

    return {
      security: first.security,
      segment: first.segment,
      tradeDate: first.tradeDate,
      originalQty: quantity,
      price,
      totalCost,
      remainingQty: quantity,
      remainingCost: totalCost,
      clientCode: first.clientCode,
      orderRef: aggregated ? `${AGGREGATED_ORDER_PREFIX}${toDateKey(first.tradeDate)}` : first.orderRef,
      tradeCount: group.length,
      position,
    };
  }

  private costOf(buy: TradeRecord, costBasis: CostBasis): Decimal {
    if (costBasis === 'amount' && buy.buyAmount !== null && buy.buyAmount.greaterThan(0)) {
      return buy.buyAmount;
    }
    return buy.buyPrice.times(buy.buyQty);
  }
}
