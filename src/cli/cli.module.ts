import { Module } from '@nestjs/common';
import { AppConfigModule } from '../config/app-config.module';
import { FifoModule } from '../fifo/fifo.module';
import { CsvModule } from '../csv/csv.module';
import { FifoFileService } from './fifo-file.service';

@Module({
  imports: [AppConfigModule, FifoModule, CsvModule],
  providers: [FifoFileService],
})
export class CliModule {}
