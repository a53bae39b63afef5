import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  Post,
  Query,
} from '@nestjs/common';
import { z } from 'zod';
import { parseChoiceParam } from '../common/query-params';
import { ApprovalRow } from '../sources/approval-overlay';
import { MetricResult } from './metric-result';
import {
  ApprovalsReport,
  MetricsService,
  OvertimeReport,
  PerformanceReport,
} from './metrics.service';
import { DailyTaps, HOURS_GROUPINGS, HoursGroup } from './personnel-hours';

const PrepareApprovalsSchema = z.object({
  approvedBy: z.string().trim().min(1),
  /** Record keys to approve; every unapproved record when omitted */
  keys: z.array(z.string()).optional(),
});

/**
 * PersonnelController
 *
 * Endpoints:
 * - GET  /personnel/hours?groupBy=employee|day|site
 * - GET  /personnel/taps - taps per day for tapping jobs
 * - GET  /personnel/overtime - weekly hours against the overtime threshold
 * - GET  /personnel/performance - per-employee totals and rankings
 * - GET  /personnel/approvals - records with their approval status
 * - POST /personnel/approvals/prepare - rows to append to the approvals tab
 */
@Controller('personnel')
export class PersonnelController {
  constructor(private readonly metricsService: MetricsService) {}

  @Get('hours')
  hours(@Query('groupBy') groupBy?: string): Promise<MetricResult<HoursGroup[]>> {
    return this.metricsService.hours(
      parseChoiceParam('groupBy', groupBy, HOURS_GROUPINGS, 'employee'),
    );
  }

  @Get('taps')
  taps(): Promise<MetricResult<DailyTaps[]>> {
    return this.metricsService.tapsPerDay();
  }

  @Get('overtime')
  overtime(): Promise<MetricResult<OvertimeReport>> {
    return this.metricsService.overtime();
  }

  @Get('performance')
  performance(): Promise<MetricResult<PerformanceReport>> {
    return this.metricsService.performance();
  }

  @Get('approvals')
  approvals(): Promise<MetricResult<ApprovalsReport>> {
    return this.metricsService.approvals();
  }

  @Post('approvals/prepare')
  @HttpCode(200)
  prepareApprovals(@Body() body: unknown): Promise<MetricResult<ApprovalRow[]>> {
    const parsed = PrepareApprovalsSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(
        parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
      );
    }
    return this.metricsService.prepareApprovals(parsed.data.approvedBy, parsed.data.keys);
  }
}
