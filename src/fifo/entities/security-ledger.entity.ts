import { Lot, SellEvent } from './lot.entity';
import { OutOfOrderWarning } from './diagnostics.entity';

export type LedgerEvent =
  | { type: 'lot'; lot: Lot }
  | { type: 'sell'; sell: SellEvent };

// Lots and sells of one security ordered by row position. Built per run, never stored.
export interface SecurityLedger {
  security: string;
  events: LedgerEvent[];
}

export type SecurityResult =
  | {
      status: 'processed';
      security: string;
      lots: Lot[];             // includes fully consumed lots
      consumedQty: number;
      shortfallQty: number;
    }
  | {
      status: 'skipped';
      security: string;
      reason: OutOfOrderWarning;
    };

export function eventDate(event: LedgerEvent): Date {
  return event.type === 'lot' ? event.lot.tradeDate : event.sell.tradeDate;
}

export function eventPosition(event: LedgerEvent): number {
  return event.type === 'lot' ? event.lot.position : event.sell.position;
}
