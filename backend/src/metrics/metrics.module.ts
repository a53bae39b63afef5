import { Module } from '@nestjs/common';
import { SourcesModule } from '../sources/sources.module';
import { DashboardController } from './dashboard.controller';
import { MetricsService } from './metrics.service';
import { PersonnelController } from './personnel.controller';
import { QualityController } from './quality.controller';
import { RepairsController } from './repairs.controller';
import { VacuumController } from './vacuum.controller';

/**
 * MetricsModule
 *
 * Read endpoints computed from the cached snapshot.
 *
 * Components:
 * - MetricsService: column checks and metric dispatch
 * - VacuumController: sensor status, trends and leaks
 * - DashboardController: overview, mainline summary, problem areas
 * - PersonnelController: hours, taps, overtime, performance, approvals
 * - RepairsController: effectiveness, parsed notes, costs
 * - QualityController: data-quality alerts and tap progress
 */
@Module({
  imports: [SourcesModule],
  controllers: [
    VacuumController,
    DashboardController,
    PersonnelController,
    RepairsController,
    QualityController,
  ],
  providers: [MetricsService],
})
export class MetricsModule {}
