import { Controller, Get, Query } from '@nestjs/common';
import { DASHBOARD_CONFIG } from '../config/dashboard.config';
import { parseNumberParam } from '../common/query-params';
import { MetricResult } from '../metrics/metric-result';
import { ClusteringService } from './clustering.service';
import { ClusterReport } from './problem-clusters';

/**
 * ClusteringController
 *
 * @example
 * GET /clusters?radius=300&minSensors=3&threshold=14
 */
@Controller('clusters')
export class ClusteringController {
  constructor(private readonly clusteringService: ClusteringService) {}

  @Get()
  clusters(
    @Query('radius') radius?: string,
    @Query('minSensors') minSensors?: string,
    @Query('threshold') threshold?: string,
  ): Promise<MetricResult<ClusterReport>> {
    const defaults = DASHBOARD_CONFIG.clustering;
    return this.clusteringService.problemClusters({
      radiusMeters: parseNumberParam('radius', radius, defaults.radiusMeters, {
        min: 1,
        max: 10000,
      }),
      minSensors: parseNumberParam('minSensors', minSensors, defaults.minSensors, {
        min: 1,
        max: 100,
        integer: true,
      }),
      threshold: parseNumberParam('threshold', threshold, DASHBOARD_CONFIG.vacuum.fair, {
        min: 0,
        max: 30,
      }),
    });
  }
}
