import { Controller, Get } from '@nestjs/common';
import { HealthResponse, ServiceInfoResponse } from './common/interfaces/health.interface';

@Controller()
export class AppController {
  /**
   * Liveness probe.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'fifo-lot-tracker',
    };
  }

  /**
   * API root - returns service info and available endpoints.
   *
   * GET /
   */
  @Get()
  getRoot(): ServiceInfoResponse {
    return {
      message: 'FIFO Lot Tracker API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        process: '/fifo/process',
        processCsv: '/fifo/process-csv',
      },
    };
  }
}
