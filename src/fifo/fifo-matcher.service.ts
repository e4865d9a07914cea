import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { Lot, SellEvent } from './entities/lot.entity';
import { LedgerEvent, SecurityResult } from './entities/security-ledger.entity';
import { Diagnostics } from './entities/diagnostics.entity';
import { clampToZero, round } from '../common/utils/decimal.util';
import { formatTradeDate } from '../common/utils/date.util';

// Open lots of one security. Lots are never removed; head points at the oldest open one.
interface LotArena {
  lots: Lot[];
  head: number;
}

/**
 * FIFO consumption of purchase lots by sells, one security at a time.
 * Mutates the lots it is given (remainingQty / remainingCost).
 * remainingCost stays at remainingQty × price, rounded to the cost precision.
 */
@Injectable()
export class FifoMatcherService {
  match(
    security: string,
    events: LedgerEvent[],
    diagnostics: Diagnostics,
    costPrecision: number,
  ): SecurityResult {
    const arena: LotArena = { lots: [], head: 0 };
    let consumedQty = 0;
    let shortfallQty = 0;

    for (const event of events) {
      if (event.type === 'lot') {
        arena.lots.push(event.lot);
        continue;
      }

      const unmatched = this.consume(arena, event.sell, costPrecision);
      consumedQty += event.sell.quantity - unmatched;

      if (unmatched > 0) {
        shortfallQty += unmatched;
        diagnostics.recordOverSell({
          security,
          row: event.sell.position + 1,
          date: formatTradeDate(event.sell.tradeDate),
          requestedQty: event.sell.quantity,
          shortfallQty: unmatched,
        });
      }
    }

    return { status: 'processed', security, lots: arena.lots, consumedQty, shortfallQty };
  }

  // Returns the quantity that no open lot could cover.
  private consume(arena: LotArena, sell: SellEvent, costPrecision: number): number {
    let remaining = sell.quantity;

    while (remaining > 0 && arena.head < arena.lots.length) {
      const oldestLot = arena.lots[arena.head];
      const take = Math.min(remaining, oldestLot.remainingQty);

      oldestLot.remainingQty -= take;
      remaining -= take;

      if (oldestLot.remainingQty === 0) {
        // full lot consumption
        oldestLot.remainingCost = new Decimal(0);
        arena.head += 1;
      } else {
        // recomputed from the unit price, not decremented, so rounding never accumulates
        oldestLot.remainingCost = clampToZero(
          round(oldestLot.price.times(oldestLot.remainingQty), costPrecision),
        );
      }
    }

    return remaining;
  }
}
