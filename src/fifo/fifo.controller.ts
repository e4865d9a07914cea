import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { FifoService } from './fifo.service';
import { DiagnosticsReporter } from './diagnostics-reporter.service';
import { TradeCsvService } from '../csv/trade-csv.service';
import { FifoOptionsDto, ProcessCsvDto, ProcessTradesDto } from './dto/process-trades.dto';
import { FifoReportDto } from './dto/fifo-report.dto';

@Controller('fifo')
export class FifoController {
  constructor(
    private readonly fifoService: FifoService,
    private readonly csvService: TradeCsvService,
    private readonly reporter: DiagnosticsReporter,
  ) {}

  /**
   * Matches sells against purchase lots for a batch of trade rows.
   * Malformed rows are dropped and reported in diagnostics, never rejected.
   *
   * POST /fifo/process
   * @returns 200 with remaining lots, per-security summary and diagnostics
   */
  @Post('process')
  @HttpCode(HttpStatus.OK)
  process(@Body() dto: ProcessTradesDto): FifoReportDto {
    return this.run(dto.trades, dto);
  }

  /**
   * Same as /fifo/process for a whole CSV trade file.
   *
   * POST /fifo/process-csv
   * @returns 400 when required columns are missing
   */
  @Post('process-csv')
  @HttpCode(HttpStatus.OK)
  processCsv(@Body() dto: ProcessCsvDto): FifoReportDto {
    return this.run(this.csvService.parseTrades(dto.csv), dto);
  }

  private run(rows: ProcessTradesDto['trades'], options: FifoOptionsDto): FifoReportDto {
    const report = this.fifoService.process(rows, {
      outOfOrderPolicy: options.outOfOrderPolicy,
      costBasis: options.costBasis,
    });
    this.reporter.report(report);
    return report;
  }
}
