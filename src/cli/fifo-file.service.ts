import { Inject, Injectable, Logger } from '@nestjs/common';
import { mkdir, readFile, writeFile } from 'fs/promises';
import * as path from 'path';
import { FifoService } from '../fifo/fifo.service';
import { DiagnosticsReporter } from '../fifo/diagnostics-reporter.service';
import { TradeCsvService } from '../csv/trade-csv.service';
import { FifoReportDto } from '../fifo/dto/fifo-report.dto';
import { APP_CONFIG, AppConfig, FifoOptions } from '../config/app.config';

export interface FileRunResult {
  report: FifoReportDto;
  lotsPath: string | null;       // null when nothing remains
  summaryPath: string | null;
}

// File-to-file run: trade CSV in, remaining purchases and summary CSVs out.
@Injectable()
export class FifoFileService {
  private readonly logger = new Logger(FifoFileService.name);

  constructor(
    private readonly fifoService: FifoService,
    private readonly csvService: TradeCsvService,
    private readonly reporter: DiagnosticsReporter,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async run(inputPath: string, outDir: string, overrides: Partial<FifoOptions> = {}): Promise<FileRunResult> {
    this.logger.log(`Reading trade data from ${inputPath}`);
    const content = await readFile(inputPath, 'utf8');
    const rows = this.csvService.parseTrades(content);

    const report = this.fifoService.process(rows, overrides);
    this.reporter.report(report);

    if (report.remainingLots.length === 0) {
      this.logger.log('No remaining purchases found');
      return { report, lotsPath: null, summaryPath: null };
    }

    await mkdir(outDir, { recursive: true });
    const lotsPath = path.join(outDir, this.config.output.lotsFile);
    const summaryPath = path.join(outDir, this.config.output.summaryFile);

    await writeFile(lotsPath, this.csvService.formatRemainingLots(report.remainingLots), 'utf8');
    this.logger.log(`Remaining purchases saved to ${lotsPath}`);

    for (const row of report.summary) {
      this.logger.log(
        `${row.scripName}: ${row.totalRemainingShares} shares, cost ${row.totalRemainingCost}, ` +
          `avg ${row.avgCostPerShare} (${row.purchasesCount} lots, ${row.earliestPurchase} - ${row.latestPurchase})`,
      );
    }

    await writeFile(summaryPath, this.csvService.formatSummary(report.summary), 'utf8');
    this.logger.log(`Summary information saved to ${summaryPath}`);

    return { report, lotsPath, summaryPath };
  }
}
