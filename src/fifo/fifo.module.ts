import { Module } from '@nestjs/common';
import { FifoController } from './fifo.controller';
import { FifoService } from './fifo.service';
import { TradeNormalizerService } from './trade-normalizer.service';
import { SameDayAggregatorService } from './same-day-aggregator.service';
import { ChronologyValidatorService } from './chronology-validator.service';
import { FifoMatcherService } from './fifo-matcher.service';
import { SummaryBuilderService } from './summary-builder.service';
import { DiagnosticsReporter } from './diagnostics-reporter.service';
import { CsvModule } from '../csv/csv.module';

@Module({
  imports: [CsvModule], // TradeCsvService for /fifo/process-csv
  controllers: [FifoController],
  providers: [
    TradeNormalizerService,
    SameDayAggregatorService,
    ChronologyValidatorService,
    FifoMatcherService,
    SummaryBuilderService,
    FifoService,         // pipeline entry point
    DiagnosticsReporter, // logging at the boundary
  ],
  exports: [FifoService, DiagnosticsReporter],
})
export class FifoModule {}
