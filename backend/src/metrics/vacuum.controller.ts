import { Controller, Get, Logger, Query } from '@nestjs/common';
import { parseNumberParam } from '../common/query-params';
import { DailyTrend } from './daily-trends';
import { LeakAlert } from './leak-detection';
import { MetricResult } from './metric-result';
import { MetricsService } from './metrics.service';
import { SensorStatus } from './vacuum-status';

const DEFAULT_TREND_DAYS = 7;

/**
 * VacuumController
 *
 * Endpoints:
 * - GET /vacuum/status - latest reading per sensor with its status
 * - GET /vacuum/trends?days=7 - daily statistics
 * - GET /vacuum/leaks - sudden and gradual vacuum loss
 */
@Controller('vacuum')
export class VacuumController {
  private readonly logger = new Logger(VacuumController.name);

  constructor(private readonly metricsService: MetricsService) {}

  @Get('status')
  status(): Promise<MetricResult<SensorStatus[]>> {
    return this.metricsService.vacuumStatus();
  }

  @Get('trends')
  trends(@Query('days') days?: string): Promise<MetricResult<DailyTrend[]>> {
    const window = parseNumberParam('days', days, DEFAULT_TREND_DAYS, {
      min: 1,
      max: 365,
      integer: true,
    });
    this.logger.log(`GET /vacuum/trends over ${window} day(s)`);
    return this.metricsService.dailyTrends(window);
  }

  @Get('leaks')
  leaks(): Promise<MetricResult<LeakAlert[]>> {
    return this.metricsService.leaks();
  }
}
