// Row numbers are 1-based data rows (the CSV header is not counted).

export interface MalformedRowIssue {
  row: number;
  reason: string;
}

export interface OutOfOrderWarning {
  security: string;
  row: number;              // first row whose date goes backwards
  eventDate: string;        // dd/MM/yyyy
  previousDate: string;     // latest date seen before it
  excluded: boolean;        // false under the "warn" policy
}

export interface OverSellWarning {
  security: string;
  row: number;
  date: string;
  requestedQty: number;
  shortfallQty: number;
}

/**
 * Collects non-fatal problems for a single processing run.
 * Created by the caller and passed through every stage.
 */
export class Diagnostics {
  readonly malformedRows: MalformedRowIssue[] = [];
  readonly outOfOrder: OutOfOrderWarning[] = [];
  readonly overSells: OverSellWarning[] = [];
  private noops = 0;

  recordMalformed(issue: MalformedRowIssue): void {
    this.malformedRows.push(issue);
  }

  recordNoop(): void {
    this.noops += 1;
  }

  recordOutOfOrder(warning: OutOfOrderWarning): void {
    this.outOfOrder.push(warning);
  }

  recordOverSell(warning: OverSellWarning): void {
    this.overSells.push(warning);
  }

  get droppedCount(): number {
    return this.malformedRows.length;
  }

  get noopCount(): number {
    return this.noops;
  }
}
