import { Injectable } from '@nestjs/common';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { InvalidTradeFileException } from '../common/exceptions/invalid-trade-file.exception';
import { RawTradeRow } from '../fifo/entities/trade-record.entity';
import { RemainingLotDto, SummaryRowDto } from '../fifo/dto/fifo-report.dto';

/**
 * Trade file layout:
 *   ClientCode,TradeDate,Segment,ScripName,BuyQty,BuyPrice,BuyAmount,SellQty,SellPrice,SellAmount,OrderNo
 *   C001,01/01/2023,EQ,ACME,10,100.00,1000.00,0,0,0,ORD-1
 *
 * - TradeDate: DD/MM/YYYY
 * - Numbers may carry thousands separators or currency symbols
 * - Older exports name the first column "Client Code"
 */
export const REQUIRED_COLUMNS = ['TradeDate', 'ScripName', 'BuyQty', 'BuyPrice', 'SellQty'];

const REMAINING_LOT_COLUMNS: { key: keyof RemainingLotDto; header: string }[] = [
  { key: 'scripName', header: 'ScripName' },
  { key: 'segment', header: 'Segment' },
  { key: 'tradeDate', header: 'TradeDate' },
  { key: 'buyQty', header: 'BuyQty' },
  { key: 'buyPrice', header: 'BuyPrice' },
  { key: 'remainingQty', header: 'RemainingQty' },
  { key: 'remainingCost', header: 'RemainingCost' },
  { key: 'clientCode', header: 'ClientCode' },
  { key: 'orderNo', header: 'OrderNo' },
  { key: 'numTrades', header: 'NumTrades' },
];

const SUMMARY_COLUMNS: { key: keyof SummaryRowDto; header: string }[] = [
  { key: 'scripName', header: 'ScripName' },
  { key: 'totalRemainingShares', header: 'Total_Remaining_Shares' },
  { key: 'totalRemainingCost', header: 'Total_Remaining_Cost' },
  { key: 'earliestPurchase', header: 'Earliest_Purchase' },
  { key: 'latestPurchase', header: 'Latest_Purchase' },
  { key: 'purchasesCount', header: 'Purchases_Count' },
  { key: 'avgCostPerShare', header: 'Avg_Cost_Per_Share' },
];

function isRowArray(value: unknown): value is RawTradeRow[] {
  return Array.isArray(value) && value.every((row) => typeof row === 'object' && row !== null);
}

@Injectable()
export class TradeCsvService {
  /**
   * Reads a trade CSV into raw rows keyed by header.
   * @throws InvalidTradeFileException for unreadable CSV, no header, or missing required columns
   */
  parseTrades(content: string): RawTradeRow[] {
    let header: string[] = [];
    let records: unknown;

    try {
      records = parse(content, {
        columns: (columns: string[]) => {
          header = columns.map((column) => column.trim());
          return header;
        },
        bom: true,
        skip_empty_lines: true,
        trim: true,
        relax_column_count: true,
      });
    } catch (err) {
      throw new InvalidTradeFileException(
        `CSV parse error: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    if (header.length === 0) {
      throw new InvalidTradeFileException('Trade file is empty or has no header row');
    }

    const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
    if (missing.length > 0) {
      throw new InvalidTradeFileException(`Missing required columns: ${missing.join(', ')}`);
    }

    if (!isRowArray(records)) {
      throw new InvalidTradeFileException('Trade file did not parse into rows');
    }
    return records;
  }

  /** Remaining lots in the column layout of remaining_purchases.csv */
  formatRemainingLots(lots: RemainingLotDto[]): string {
    return stringify(lots, { header: true, columns: REMAINING_LOT_COLUMNS });
  }

  /** Per-security summary in the column layout of remaining_summary.csv */
  formatSummary(rows: SummaryRowDto[]): string {
    return stringify(rows, { header: true, columns: SUMMARY_COLUMNS });
  }
}
