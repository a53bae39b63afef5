import { Controller, Get } from '@nestjs/common';
import { MainlineSummary } from './mainline-summary';
import { MetricResult } from './metric-result';
import { MetricsService } from './metrics.service';
import { OverviewMetrics } from './overview';
import { ProblemArea } from './problem-areas';

/**
 * Headline numbers for the dashboard landing view.
 */
@Controller('metrics')
export class DashboardController {
  constructor(private readonly metricsService: MetricsService) {}

  @Get('overview')
  overview(): Promise<MetricResult<OverviewMetrics>> {
    return this.metricsService.overview();
  }

  @Get('mainlines')
  mainlines(): Promise<MetricResult<MainlineSummary[]>> {
    return this.metricsService.mainlines();
  }

  @Get('problem-areas')
  problemAreas(): Promise<MetricResult<ProblemArea[]>> {
    return this.metricsService.problemAreas();
  }
}
