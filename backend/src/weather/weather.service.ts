import { Injectable, Logger } from '@nestjs/common';
import { DataLoaderService } from '../sources/data-loader.service';
import { SourceUnavailableError } from '../sources/interfaces/table-source.interface';
import { MetricResult, missingFields, ok, skipped } from '../metrics/metric-result';
import { addDays, getCurrentDate } from '../common/date-utils';
import { FreezeDrop, FreezeThawStatus, freezeEventDrops, freezeThawStatus, isFreezeThawDay } from './freeze-thaw';
import { DailyWeather, WeatherClient } from './weather.client';

export interface FreezeDropReport {
  site: string;
  days: number;
  /** False when the forecast could not be fetched; sensors is then empty */
  weatherAvailable: boolean;
  freezeThawDays: string[];
  sensors: FreezeDrop[];
}

/**
 * WeatherService
 *
 * Weather failures never fail a request: status falls back to UNKNOWN and
 * freeze drops report weatherAvailable: false.
 */
@Injectable()
export class WeatherService {
  private readonly logger = new Logger(WeatherService.name);

  constructor(
    private readonly weatherClient: WeatherClient,
    private readonly dataLoader: DataLoaderService,
  ) {}

  async freezeThaw(site: string): Promise<FreezeThawStatus> {
    const days = await this.fetchDays(site, 0, 2);
    if (days === null) return freezeThawStatus(null, null);
    return freezeThawStatus(days[0] ?? null, days[1] ?? null);
  }

  async freezeDrops(site: string, days: number): Promise<MetricResult<FreezeDropReport>> {
    const snapshot = await this.dataLoader.getSnapshot();
    const missing = missingFields(snapshot, {
      vacuum: ['sensor_name', 'vacuum_reading', 'timestamp'],
    });
    if (missing.length > 0) {
      return skipped('Freeze-event drops', missing);
    }

    const weather = await this.fetchDays(site, days, 1);
    if (weather === null) {
      return ok({ site, days, weatherAvailable: false, freezeThawDays: [], sensors: [] });
    }

    const since = addDays(getCurrentDate(), -days);
    const readings = snapshot.vacuum.filter(
      (r) => r.site.toUpperCase() === site.toUpperCase() && r.timestamp >= since,
    );
    const sensors = freezeEventDrops(readings, weather);
    const freezeThawDays = weather.filter(isFreezeThawDay).map((d) => d.date);

    this.logger.log(
      `${site}: ${freezeThawDays.length} freeze/thaw day(s) in ${days} day(s), ` +
        `${sensors.filter((s) => s.status !== 'OK').length} sensor(s) flagged`,
    );
    return ok({ site, days, weatherAvailable: true, freezeThawDays, sensors });
  }

  private async fetchDays(
    site: string,
    pastDays: number,
    forecastDays: number,
  ): Promise<DailyWeather[] | null> {
    try {
      return await this.weatherClient.dailyWeather(site, { pastDays, forecastDays });
    } catch (error) {
      if (error instanceof SourceUnavailableError) {
        this.logger.warn(`Weather unavailable for ${site}: ${error.message}`);
        return null;
      }
      throw error;
    }
  }
}
