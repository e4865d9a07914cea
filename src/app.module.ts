import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AppConfigModule } from './config/app-config.module';
import { FifoModule } from './fifo/fifo.module';

@Module({
  imports: [AppConfigModule, FifoModule],
  controllers: [AppController],
})
export class AppModule {}
