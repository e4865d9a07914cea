import { MalformedRowIssue, OutOfOrderWarning, OverSellWarning } from '../entities/diagnostics.entity';

// One unsold lot
export interface RemainingLotDto {
  scripName: string;
  segment: string;
  tradeDate: string;               // dd/MM/yyyy
  buyQty: number;                  // original quantity
  buyPrice: number;                // weighted average when aggregated
  remainingQty: number;
  remainingCost: number;
  clientCode: string;
  orderNo: string;                 // "Aggregated-{yyyy-MM-dd}" for aggregated lots
  numTrades: number;
}

// Per-security totals over remaining lots
export interface SummaryRowDto {
  scripName: string;
  totalRemainingShares: number;
  totalRemainingCost: number;
  earliestPurchase: string | null;
  latestPurchase: string | null;
  purchasesCount: number;
  avgCostPerShare: number;         // 2 dp, 0 when no shares
}

export interface DiagnosticsDto {
  droppedRows: number;
  malformedRows: MalformedRowIssue[];
  noopRows: number;
  outOfOrder: OutOfOrderWarning[];
  overSells: OverSellWarning[];
}

export interface FifoReportDto {
  runId: string;
  generatedAt: string;             // ISO timestamp
  remainingLots: RemainingLotDto[];
  summary: SummaryRowDto[];
  excludedSecurities: string[];    // skipped as out of order
  diagnostics: DiagnosticsDto;
}
