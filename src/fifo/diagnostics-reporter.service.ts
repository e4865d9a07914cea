import { Injectable, Logger } from '@nestjs/common';
import { FifoReportDto } from './dto/fifo-report.dto';

// Logs the diagnostics of a finished run. Used by the HTTP and CLI boundaries;
// the matching services themselves never log.
@Injectable()
export class DiagnosticsReporter {
  private readonly logger = new Logger(DiagnosticsReporter.name);

  report(report: FifoReportDto): void {
    const { diagnostics } = report;

    for (const issue of diagnostics.malformedRows) {
      this.logger.warn(`Dropped row ${issue.row}: ${issue.reason}`);
    }
    for (const warning of diagnostics.outOfOrder) {
      const action = warning.excluded ? 'excluded from FIFO output' : 'matched in file order';
      this.logger.warn(
        `Trades for ${warning.security} are not in chronological order ` +
          `(row ${warning.row} dated ${warning.eventDate} after ${warning.previousDate}); ${action}`,
      );
    }
    for (const warning of diagnostics.overSells) {
      this.logger.warn(
        `Could not match ${warning.shortfallQty} of ${warning.requestedQty} shares sold in ` +
          `${warning.security} on ${warning.date} (row ${warning.row})`,
      );
    }

    this.logger.log(
      `Run ${report.runId}: ${report.remainingLots.length} remaining lots across ` +
        `${report.summary.length} securities, ${diagnostics.droppedRows} dropped rows, ` +
        `${diagnostics.noopRows} empty rows`,
    );
  }
}
