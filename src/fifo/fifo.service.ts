import { Inject, Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { TradeNormalizerService, ClassifiedTrade } from './trade-normalizer.service';
import { SameDayAggregatorService } from './same-day-aggregator.service';
import { ChronologyValidatorService } from './chronology-validator.service';
import { FifoMatcherService } from './fifo-matcher.service';
import { SummaryBuilderService } from './summary-builder.service';
import { RawTradeRow, TradeKind, TradeRecord } from './entities/trade-record.entity';
import { Lot, SellEvent } from './entities/lot.entity';
import { LedgerEvent, SecurityLedger, SecurityResult, eventPosition } from './entities/security-ledger.entity';
import { SecuritySummary } from './entities/security-summary.entity';
import { Diagnostics } from './entities/diagnostics.entity';
import { DiagnosticsDto, FifoReportDto, RemainingLotDto, SummaryRowDto } from './dto/fifo-report.dto';
import { APP_CONFIG, AppConfig, FifoOptions } from '../config/app.config';
import { round, toNumber } from '../common/utils/decimal.util';
import { formatTradeDate } from '../common/utils/date.util';

const AVERAGE_COST_PLACES = 2;

// Runs the whole pipeline for one input table:
// normalize → aggregate buys → validate order → FIFO match → summarize.
// Pure in-memory; every call builds fresh lots and its own diagnostics.
@Injectable()
export class FifoService {
  constructor(
    private readonly normalizer: TradeNormalizerService,
    private readonly aggregator: SameDayAggregatorService,
    private readonly validator: ChronologyValidatorService,
    private readonly matcher: FifoMatcherService,
    private readonly summaryBuilder: SummaryBuilderService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /**
   * Remaining lots, per-security summary and diagnostics for a trade table.
   *
   * @param overrides - Options for this run only; unset fields use the configuration
   */
  process(rows: RawTradeRow[], overrides: Partial<FifoOptions> = {}): FifoReportDto {
    const options = this.resolveOptions(overrides);
    const diagnostics = new Diagnostics();
    const results = this.matchSecurities(rows, options, diagnostics);

    const remainingLots = results
      .flatMap((result) => (result.status === 'processed' ? result.lots : []))
      .filter((lot) => lot.remainingQty > 0)
      .sort((a, b) => a.position - b.position);

    const summary = this.summaryBuilder.build(remainingLots);

    return {
      runId: uuidv4(),
      generatedAt: new Date().toISOString(),
      remainingLots: remainingLots.map((lot) => this.toLotDto(lot, options)),
      summary: summary.map((row) => this.toSummaryDto(row, options)),
      excludedSecurities: results
        .filter((result) => result.status === 'skipped')
        .map((result) => result.security),
      diagnostics: this.toDiagnosticsDto(diagnostics),
    };
  }

  /**
   * Per-security results in order of first appearance.
   * Out-of-order securities are skipped or matched depending on the policy.
   */
  matchSecurities(rows: RawTradeRow[], options: FifoOptions, diagnostics: Diagnostics): SecurityResult[] {
    const trades = this.normalizer.normalizeAll(rows, diagnostics);
    const results: SecurityResult[] = [];

    for (const [security, securityTrades] of this.groupBySecurity(trades)) {
      const buys = securityTrades.filter((trade) => trade.kind === TradeKind.BUY).map((trade) => trade.record);
      const sells = securityTrades.filter((trade) => trade.kind === TradeKind.SELL).map((trade) => trade.record);

      const lots = this.aggregator.aggregate(buys, options.costBasis);
      const ledger = this.buildLedger(security, lots, sells);
      const check = this.validator.check(ledger);

      if (!check.inOrder) {
        const excluded = options.outOfOrderPolicy === 'skip';
        const warning = {
          security,
          row: check.violation.row,
          eventDate: formatTradeDate(check.violation.eventDate),
          previousDate: formatTradeDate(check.violation.previousDate),
          excluded,
        };
        diagnostics.recordOutOfOrder(warning);

        if (excluded) {
          results.push({ status: 'skipped', security, reason: warning });
          continue;
        }
      }

      results.push(
        this.matcher.match(security, this.validator.sequence(ledger), diagnostics, options.costPrecision),
      );
    }

    return results;
  }

  private resolveOptions(overrides: Partial<FifoOptions>): FifoOptions {
    const defaults = this.config.fifo;
    return {
      outOfOrderPolicy: overrides.outOfOrderPolicy ?? defaults.outOfOrderPolicy,
      costBasis: overrides.costBasis ?? defaults.costBasis,
      costPrecision: overrides.costPrecision ?? defaults.costPrecision,
    };
  }

  private groupBySecurity(trades: ClassifiedTrade[]): Map<string, ClassifiedTrade[]> {
    const groups = new Map<string, ClassifiedTrade[]>();
    for (const trade of trades) {
      const group = groups.get(trade.record.security);
      if (group) {
        group.push(trade);
      } else {
        groups.set(trade.record.security, [trade]);
      }
    }
    return groups;
  }

  private buildLedger(security: string, lots: Lot[], sells: TradeRecord[]): SecurityLedger {
    const events: LedgerEvent[] = [
      ...lots.map((lot): LedgerEvent => ({ type: 'lot', lot })),
      ...sells.map((record): LedgerEvent => ({ type: 'sell', sell: this.toSellEvent(record) })),
    ];
    events.sort((a, b) => eventPosition(a) - eventPosition(b));
    return { security, events };
  }

  private toSellEvent(record: TradeRecord): SellEvent {
    return {
      security: record.security,
      tradeDate: record.tradeDate,
      quantity: record.sellQty,
      price: record.sellPrice,
      amount: record.sellAmount,
      orderRef: record.orderRef,
      position: record.position,
    };
  }

  private toLotDto(lot: Lot, options: FifoOptions): RemainingLotDto {
    return {
      scripName: lot.security,
      segment: lot.segment,
      tradeDate: formatTradeDate(lot.tradeDate),
      buyQty: lot.originalQty,
      buyPrice: toNumber(lot.price),
      remainingQty: lot.remainingQty,
      remainingCost: toNumber(round(lot.remainingCost, options.costPrecision)),
      clientCode: lot.clientCode,
      orderNo: lot.orderRef,
      numTrades: lot.tradeCount,
    };
  }

  private toSummaryDto(summary: SecuritySummary, options: FifoOptions): SummaryRowDto {
    return {
      scripName: summary.security,
      totalRemainingShares: summary.totalShares,
      totalRemainingCost: toNumber(round(summary.totalCost, options.costPrecision)),
      earliestPurchase: summary.earliestPurchase ? formatTradeDate(summary.earliestPurchase) : null,
      latestPurchase: summary.latestPurchase ? formatTradeDate(summary.latestPurchase) : null,
      purchasesCount: summary.lotCount,
      avgCostPerShare: toNumber(round(summary.averageCost, AVERAGE_COST_PLACES)),
    };
  }

  private toDiagnosticsDto(diagnostics: Diagnostics): DiagnosticsDto {
    return {
      droppedRows: diagnostics.droppedCount,
      malformedRows: [...diagnostics.malformedRows],
      noopRows: diagnostics.noopCount,
      outOfOrder: [...diagnostics.outOfOrder],
      overSells: [...diagnostics.overSells],
    };
  }
}
