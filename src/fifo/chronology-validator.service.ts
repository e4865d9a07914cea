import { Injectable } from '@nestjs/common';
import { LedgerEvent, SecurityLedger, eventDate, eventPosition } from './entities/security-ledger.entity';

export interface ChronologyViolation {
  row: number;
  eventDate: Date;
  previousDate: Date;
}

export type ChronologyCheck =
  | { inOrder: true }
  | { inOrder: false; violation: ChronologyViolation };

@Injectable()
export class ChronologyValidatorService {
  /**
   * Walks the ledger in row order and reports the first event dated before
   * an event already seen. Equal dates are in order.
   */
  check(ledger: SecurityLedger): ChronologyCheck {
    let latest: Date | null = null;

    for (const event of ledger.events) {
      const date = eventDate(event);
      if (latest && date.getTime() < latest.getTime()) {
        return {
          inOrder: false,
          violation: { row: eventPosition(event) + 1, eventDate: date, previousDate: latest },
        };
      }
      if (!latest || date.getTime() > latest.getTime()) {
        latest = date;
      }
    }

    return { inOrder: true };
  }

  /**
   * Order in which the matcher consumes events: row order, except that
   * within a run of consecutive same-date events, lots come before sells.
   */
  sequence(ledger: SecurityLedger): LedgerEvent[] {
    const ordered: LedgerEvent[] = [];
    let run: LedgerEvent[] = [];

    const flush = () => {
      ordered.push(...run.filter((event) => event.type === 'lot'));
      ordered.push(...run.filter((event) => event.type === 'sell'));
      run = [];
    };

    for (const event of ledger.events) {
      if (run.length > 0 && eventDate(run[0]).getTime() !== eventDate(event).getTime()) {
        flush();
      }
      run.push(event);
    }
    flush();

    return ordered;
  }
}
