import { Test, TestingModule } from '@nestjs/testing';
import { FifoService } from './fifo.service';
import { TradeNormalizerService } from './trade-normalizer.service';
import { SameDayAggregatorService } from './same-day-aggregator.service';
import { ChronologyValidatorService } from './chronology-validator.service';
import { FifoMatcherService } from './fifo-matcher.service';
import { SummaryBuilderService } from './summary-builder.service';
import { RawTradeRow } from './entities/trade-record.entity';
import { Diagnostics } from './entities/diagnostics.entity';
import { APP_CONFIG, AppConfig } from '../config/app.config';

describe('FifoService', () => {
  let service: FifoService;

  const config: AppConfig = {
    port: 3000,
    fifo: { outOfOrderPolicy: 'skip', costBasis: 'price', costPrecision: 4 },
    output: { lotsFile: 'remaining_purchases.csv', summaryFile: 'remaining_summary.csv' },
  };

  const createRow = (overrides: RawTradeRow): RawTradeRow => ({
    ClientCode: 'C001',
    TradeDate: '01/01/2023',
    Segment: 'EQ',
    ScripName: 'ACME',
    BuyQty: '0',
    BuyPrice: '0',
    BuyAmount: '',
    SellQty: '0',
    SellPrice: '0',
    SellAmount: '',
    OrderNo: '',
    ...overrides,
  });

  const buy = (date: string, qty: number, price: number, overrides: RawTradeRow = {}): RawTradeRow =>
    createRow({ TradeDate: date, BuyQty: String(qty), BuyPrice: String(price), ...overrides });

  const sell = (date: string, qty: number, overrides: RawTradeRow = {}): RawTradeRow =>
    createRow({ TradeDate: date, SellQty: String(qty), SellPrice: '150', ...overrides });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TradeNormalizerService,
        SameDayAggregatorService,
        ChronologyValidatorService,
        FifoMatcherService,
        SummaryBuilderService,
        FifoService,
        { provide: APP_CONFIG, useValue: config },
      ],
    }).compile();

    service = module.get<FifoService>(FifoService);
  });

  describe('process', () => {
    it('should aggregate same-day buys and match a later sell', () => {
      const report = service.process([
        buy('01/01/2023', 10, 100, { OrderNo: 'A1' }),
        buy('01/01/2023', 20, 130, { OrderNo: 'A2' }),
        sell('01/02/2023', 15, { OrderNo: 'S1' }),
      ]);

      expect(report.remainingLots).toEqual([
        {
          scripName: 'ACME',
          segment: 'EQ',
          tradeDate: '01/01/2023',
          buyQty: 30,
          buyPrice: 120,
          remainingQty: 15,
          remainingCost: 1800,
          clientCode: 'C001',
          orderNo: 'Aggregated-2023-01-01',
          numTrades: 2,
        },
      ]);
      expect(report.summary).toEqual([
        {
          scripName: 'ACME',
          totalRemainingShares: 15,
          totalRemainingCost: 1800,
          earliestPurchase: '01/01/2023',
          latestPurchase: '01/01/2023',
          purchasesCount: 1,
          avgCostPerShare: 120,
        },
      ]);
      expect(report.excludedSecurities).toEqual([]);
      expect(report.diagnostics).toEqual({
        droppedRows: 0,
        malformedRows: [],
        noopRows: 0,
        outOfOrder: [],
        overSells: [],
      });
    });

    it('should leave the newer lot untouched when the older lot covers the sell', () => {
      const report = service.process([
        buy('01/01/2023', 10, 100, { OrderNo: 'OLD' }),
        buy('01/02/2023', 10, 200, { OrderNo: 'NEW' }),
        sell('01/03/2023', 10),
      ]);

      expect(report.remainingLots).toHaveLength(1);
      expect(report.remainingLots[0]).toMatchObject({ orderNo: 'NEW', buyQty: 10, remainingQty: 10, remainingCost: 2000 });
    });

    it('should match a same-day sell against same-day buys listed after it', () => {
      const report = service.process([sell('01/01/2023', 5), buy('01/01/2023', 10, 100)]);

      expect(report.remainingLots[0]).toMatchObject({ remainingQty: 5, remainingCost: 500 });
      expect(report.diagnostics.overSells).toEqual([]);
      expect(report.diagnostics.outOfOrder).toEqual([]);
    });

    it('should exclude an out-of-order security and report it once', () => {
      const report = service.process([
        buy('01/01/2023', 10, 100),
        buy('01/03/2023', 10, 50, { ScripName: 'BETA' }),
        sell('15/01/2023', 4, { ScripName: 'BETA' }),
      ]);

      expect(report.remainingLots.map((lot) => lot.scripName)).toEqual(['ACME']);
      expect(report.summary.map((row) => row.scripName)).toEqual(['ACME']);
      expect(report.excludedSecurities).toEqual(['BETA']);
      expect(report.diagnostics.outOfOrder).toEqual([
        { security: 'BETA', row: 3, eventDate: '15/01/2023', previousDate: '01/03/2023', excluded: true },
      ]);
    });

    it('should match an out-of-order security in row order under the warn policy', () => {
      const report = service.process(
        [buy('01/03/2023', 10, 50, { ScripName: 'BETA' }), sell('15/01/2023', 4, { ScripName: 'BETA' })],
        { outOfOrderPolicy: 'warn' },
      );

      expect(report.excludedSecurities).toEqual([]);
      expect(report.remainingLots[0]).toMatchObject({ scripName: 'BETA', remainingQty: 6, remainingCost: 300 });
      expect(report.diagnostics.outOfOrder).toEqual([
        { security: 'BETA', row: 2, eventDate: '15/01/2023', previousDate: '01/03/2023', excluded: false },
      ]);
    });

    it('should keep remaining cost consistent with a repeating average price', () => {
      const report = service.process([
        buy('01/01/2023', 1, 100),
        buy('01/01/2023', 1, 101),
        buy('01/01/2023', 1, 101),
        sell('02/01/2023', 1),
        sell('03/01/2023', 1),
      ]);

      expect(report.remainingLots[0]).toMatchObject({ buyPrice: 100.66666667, remainingQty: 1, remainingCost: 100.6667 });
      expect(report.summary[0]).toMatchObject({ totalRemainingCost: 100.6667, avgCostPerShare: 100.67 });
    });

    it('should still consume a sell whose audit price is negative', () => {
      const report = service.process([buy('01/01/2023', 10, 100), sell('02/01/2023', 3, { SellPrice: '-1' })]);

      expect(report.diagnostics.malformedRows).toEqual([]);
      expect(report.remainingLots[0]).toMatchObject({ remainingQty: 7, remainingCost: 700 });
    });

    it('should report over-sells without negative inventory', () => {
      const report = service.process([buy('01/01/2023', 10, 100), sell('01/02/2023', 12)]);

      expect(report.remainingLots).toEqual([]);
      expect(report.summary).toEqual([]);
      expect(report.diagnostics.overSells).toEqual([
        { security: 'ACME', row: 2, date: '01/02/2023', requestedQty: 12, shortfallQty: 2 },
      ]);
    });

    it('should drop malformed rows and count empty rows', () => {
      const report = service.process([
        buy('01/01/2023', 10, 100),
        buy('not-a-date', 10, 100),
        createRow({}),
      ]);

      expect(report.remainingLots).toHaveLength(1);
      expect(report.diagnostics.droppedRows).toBe(1);
      expect(report.diagnostics.malformedRows).toEqual([{ row: 2, reason: 'unparseable TradeDate "not-a-date"' }]);
      expect(report.diagnostics.noopRows).toBe(1);
    });

    it('should list lots in row order and the summary by security', () => {
      const report = service.process([
        buy('01/01/2023', 1, 10, { ScripName: 'ZEN' }),
        buy('01/01/2023', 2, 20, { ScripName: 'ACME' }),
      ]);

      expect(report.remainingLots.map((lot) => lot.scripName)).toEqual(['ZEN', 'ACME']);
      expect(report.summary.map((row) => row.scripName)).toEqual(['ACME', 'ZEN']);
    });

    it('should price lots from broker amounts under the amount cost basis', () => {
      const report = service.process(
        [
          buy('01/01/2023', 10, 100, { BuyAmount: '1,010' }),
          buy('01/01/2023', 20, 130, { BuyAmount: '2,620' }),
        ],
        { costBasis: 'amount' },
      );

      expect(report.remainingLots[0]).toMatchObject({ buyPrice: 121, remainingCost: 3630 });
      expect(report.summary[0].avgCostPerShare).toBe(121);
    });

    it('should produce identical results when run twice on the same input', () => {
      const rows = [
        buy('01/01/2023', 10, 100),
        buy('01/01/2023', 20, 130),
        buy('05/01/2023', 7, 101.5, { ScripName: 'BETA' }),
        sell('01/02/2023', 15),
        sell('02/02/2023', 9, { ScripName: 'BETA' }),
      ];

      const first = service.process(rows);
      const second = service.process(rows);

      expect(second.remainingLots).toEqual(first.remainingLots);
      expect(second.summary).toEqual(first.summary);
      expect(second.diagnostics).toEqual(first.diagnostics);
      expect(second.runId).not.toBe(first.runId);
    });
  });

  describe('matchSecurities', () => {
    it('should conserve quantity for every processed security', () => {
      const rows = [
        buy('01/01/2023', 10, 100),
        buy('02/01/2023', 20, 110),
        sell('03/01/2023', 12),
        buy('03/01/2023', 5, 90, { ScripName: 'BETA' }),
        sell('04/01/2023', 8, { ScripName: 'BETA' }),
        buy('05/01/2023', 6, 120),
        sell('06/01/2023', 30),
      ];
      const soldBySecurity: Record<string, number> = { ACME: 42, BETA: 8 };

      const results = service.matchSecurities(rows, config.fifo, new Diagnostics());

      expect(results.map((result) => result.status)).toEqual(['processed', 'processed']);
      for (const result of results) {
        if (result.status !== 'processed') continue;
        const original = result.lots.reduce((sum, lot) => sum + lot.originalQty, 0);
        const remaining = result.lots.reduce((sum, lot) => sum + lot.remainingQty, 0);

        expect(original).toBe(remaining + result.consumedQty);
        expect(result.consumedQty).toBe(soldBySecurity[result.security] - result.shortfallQty);
      }
    });

    it('should return a skipped result for an out-of-order security', () => {
      const results = service.matchSecurities(
        [buy('01/03/2023', 10, 50), sell('15/01/2023', 4)],
        config.fifo,
        new Diagnostics(),
      );

      expect(results).toHaveLength(1);
      expect(results[0].status).toBe('skipped');
    });
  });
});
