import { Injectable, Logger } from '@nestjs/common';
import { DataLoaderService } from '../sources/data-loader.service';
import { MetricResult, missingFields, ok, skipped } from '../metrics/metric-result';
import { ClusterOptions, ClusterReport, findProblemClusters } from './problem-clusters';

/**
 * Geographic clusters of problem sensors from the cached snapshot.
 */
@Injectable()
export class ClusteringService {
  private readonly logger = new Logger(ClusteringService.name);

  constructor(private readonly dataLoader: DataLoaderService) {}

  async problemClusters(options: ClusterOptions): Promise<MetricResult<ClusterReport>> {
    const snapshot = await this.dataLoader.getSnapshot();
    const missing = missingFields(snapshot, {
      vacuum: ['sensor_name', 'vacuum_reading', 'latitude', 'longitude'],
    });
    if (missing.length > 0) {
      return skipped('Problem clusters', missing);
    }

    const report = findProblemClusters(snapshot.vacuum, options);
    this.logger.log(
      `Found ${report.clusters.length} cluster(s) and ${report.noise.length} isolated problem sensor(s) ` +
        `(radius ${options.radiusMeters}m, min ${options.minSensors}, below ${options.threshold}")`,
    );
    return ok(report);
  }
}
