import { Controller, Get } from '@nestjs/common';
import { MetricResult } from './metric-result';
import { MetricsService } from './metrics.service';
import { RepairCost } from './repair-costs';
import { EffectivenessReport } from './repair-effectiveness';
import { RepairNoteEntry } from './repair-notes';

@Controller('repairs')
export class RepairsController {
  constructor(private readonly metricsService: MetricsService) {}

  /** Vacuum before and after each work session on a mainline */
  @Get('effectiveness')
  effectiveness(): Promise<MetricResult<EffectivenessReport>> {
    return this.metricsService.effectiveness();
  }

  @Get('notes')
  notes(): Promise<MetricResult<RepairNoteEntry[]>> {
    return this.metricsService.repairNotes();
  }

  @Get('costs')
  costs(): Promise<MetricResult<RepairCost[]>> {
    return this.metricsService.repairCosts();
  }
}
