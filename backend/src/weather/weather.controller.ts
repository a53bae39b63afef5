import { Controller, Get, Query } from '@nestjs/common';
import { DASHBOARD_CONFIG } from '../config/dashboard.config';
import { parseChoiceParam, parseNumberParam } from '../common/query-params';
import { MetricResult } from '../metrics/metric-result';
import { FreezeThawStatus } from './freeze-thaw';
import { FreezeDropReport, WeatherService } from './weather.service';

const SITES = Object.keys(DASHBOARD_CONFIG.siteCoordinates);

/**
 * WeatherController
 *
 * Endpoints:
 * - GET /weather/freeze-thaw?site=NY
 * - GET /weather/freeze-drops?site=NY&days=14
 */
@Controller('weather')
export class WeatherController {
  constructor(private readonly weatherService: WeatherService) {}

  @Get('freeze-thaw')
  freezeThaw(@Query('site') site?: string): Promise<FreezeThawStatus> {
    return this.weatherService.freezeThaw(parseSite(site));
  }

  @Get('freeze-drops')
  freezeDrops(
    @Query('site') site?: string,
    @Query('days') days?: string,
  ): Promise<MetricResult<FreezeDropReport>> {
    return this.weatherService.freezeDrops(
      parseSite(site),
      parseNumberParam('days', days, 14, { min: 2, max: 92, integer: true }),
    );
  }
}

function parseSite(site: string | undefined): string {
  return parseChoiceParam('site', site?.toUpperCase(), SITES, 'NY');
}
