import { Controller, Get, Query } from '@nestjs/common';
import { parseNumberParam } from '../common/query-params';
import { DataQualityAlert } from './data-quality';
import { MetricResult } from './metric-result';
import { MetricsService } from './metrics.service';
import { TapProgressReport } from './tap-progress';

/**
 * QualityController
 *
 * Endpoints:
 * - GET /quality/alerts - data-quality alerts, most severe first
 * - GET /taps/progress?season=2026 - taps per mainline against last season
 */
@Controller()
export class QualityController {
  constructor(private readonly metricsService: MetricsService) {}

  @Get('quality/alerts')
  alerts(): Promise<MetricResult<DataQualityAlert[]>> {
    return this.metricsService.qualityAlerts();
  }

  @Get('taps/progress')
  tapProgress(@Query('season') season?: string): Promise<MetricResult<TapProgressReport>> {
    const year =
      season === undefined || season === ''
        ? undefined
        : parseNumberParam('season', season, 0, { min: 2000, max: 2100, integer: true });
    return this.metricsService.tapProgress(year);
  }
}
