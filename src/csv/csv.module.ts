import { Module } from '@nestjs/common';
import { TradeCsvService } from './trade-csv.service';

@Module({
  providers: [TradeCsvService],
  exports: [TradeCsvService],
})
export class CsvModule {}
