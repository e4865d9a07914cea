import { Test, TestingModule } from '@nestjs/testing';
import { TradeCsvService } from './trade-csv.service';
import { InvalidTradeFileException } from '../common/exceptions/invalid-trade-file.exception';
import { RemainingLotDto, SummaryRowDto } from '../fifo/dto/fifo-report.dto';

describe('TradeCsvService', () => {
  let service: TradeCsvService;

  const header = 'ClientCode,TradeDate,Segment,ScripName,BuyQty,BuyPrice,BuyAmount,SellQty,SellPrice,SellAmount,OrderNo';

  const lot: RemainingLotDto = {
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
  };

  const summaryRow: SummaryRowDto = {
    scripName: 'ACME',
    totalRemainingShares: 15,
    totalRemainingCost: 1800,
    earliestPurchase: '01/01/2023',
    latestPurchase: '01/01/2023',
    purchasesCount: 1,
    avgCostPerShare: 120,
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [TradeCsvService],
    }).compile();

    service = module.get<TradeCsvService>(TradeCsvService);
  });

  describe('parseTrades', () => {
    it('should read rows keyed by header', () => {
      const rows = service.parseTrades(`${header}\nC001,01/01/2023,EQ,ACME,10,100.00,1000.00,0,0,0,ORD-1\n`);

      expect(rows).toEqual([
        {
          ClientCode: 'C001',
          TradeDate: '01/01/2023',
          Segment: 'EQ',
          ScripName: 'ACME',
          BuyQty: '10',
          BuyPrice: '100.00',
          BuyAmount: '1000.00',
          SellQty: '0',
          SellPrice: '0',
          SellAmount: '0',
          OrderNo: 'ORD-1',
        },
      ]);
    });

    it('should strip a byte order mark and accept the spaced client column', () => {
      const rows = service.parseTrades(
        '\uFEFFClient Code,TradeDate,ScripName,BuyQty,BuyPrice,SellQty\nC002,02/01/2023,BETA,5,50,0',
      );

      expect(rows[0]['Client Code']).toBe('C002');
      expect(rows[0].TradeDate).toBe('02/01/2023');
    });

    it('should skip blank lines', () => {
      const rows = service.parseTrades('TradeDate,ScripName,BuyQty,BuyPrice,SellQty\n\n01/01/2023,ACME,1,10,0\n\n');

      expect(rows).toHaveLength(1);
    });

    it('should reject missing required columns', () => {
      expect(() => service.parseTrades('TradeDate,ScripName,BuyQty\n01/01/2023,ACME,1')).toThrow(
        'Missing required columns: BuyPrice, SellQty',
      );
    });

    it('should reject an empty file', () => {
      expect(() => service.parseTrades('')).toThrow('Trade file is empty or has no header row');
    });

    it('should reject unreadable CSV', () => {
      expect(() => service.parseTrades('TradeDate,ScripName\n"01/01/2023,ACME')).toThrow(InvalidTradeFileException);
    });
  });

  describe('formatRemainingLots', () => {
    it('should write the remaining purchases layout', () => {
      const lines = service.formatRemainingLots([lot]).trim().split('\n');

      expect(lines).toEqual([
        'ScripName,Segment,TradeDate,BuyQty,BuyPrice,RemainingQty,RemainingCost,ClientCode,OrderNo,NumTrades',
        'ACME,EQ,01/01/2023,30,120,15,1800,C001,Aggregated-2023-01-01,2',
      ]);
    });

    it('should quote names containing a comma', () => {
      const lines = service.formatRemainingLots([{ ...lot, scripName: 'ACME, LTD' }]).trim().split('\n');

      expect(lines[1]).toBe('"ACME, LTD",EQ,01/01/2023,30,120,15,1800,C001,Aggregated-2023-01-01,2');
    });
  });

  describe('formatSummary', () => {
    it('should write the summary layout', () => {
      const lines = service.formatSummary([summaryRow]).trim().split('\n');

      expect(lines).toEqual([
        'ScripName,Total_Remaining_Shares,Total_Remaining_Cost,Earliest_Purchase,Latest_Purchase,Purchases_Count,Avg_Cost_Per_Share',
        'ACME,15,1800,01/01/2023,01/01/2023,1,120',
      ]);
    });
  });
});
