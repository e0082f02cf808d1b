import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';

@Controller()
export class AppController {
  /**
   * Health check for load balancers and monitoring.
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'option-payoff-engine',
    };
  }

  /**
   * Service info and available endpoints.
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Option Payoff Engine API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        payoff: '/options/payoff',
        symbols: '/options/symbols',
        query: '/options/query',
        quotes: '/market-data/quotes',
      },
    };
  }
}
