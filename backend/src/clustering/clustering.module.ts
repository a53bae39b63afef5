import { Module } from '@nestjs/common';
import { SourcesModule } from '../sources/sources.module';
import { ClusteringController } from './clustering.controller';
import { ClusteringService } from './clustering.service';

/**
 * ClusteringModule
 *
 * Components:
 * - ClusteringService: DBSCAN over problem sensor positions
 * - ClusteringController: GET /clusters
 */
@Module({
  imports: [SourcesModule],
  controllers: [ClusteringController],
  providers: [ClusteringService],
})
export class ClusteringModule {}
