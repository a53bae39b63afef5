import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { DASHBOARD_CONFIG, SiteCoordinates } from '../config/dashboard.config';
import { SourceUnavailableError } from '../sources/interfaces/table-source.interface';
import { formatError } from '../sources/reference-reader';

const DEFAULT_WEATHER_URL = 'https://api.open-meteo.com/v1/forecast';
const SOURCE_NAME = 'open-meteo';

const nullableSeries = z.array(z.number().nullable());

const DailyForecastSchema = z.object({
  daily: z.object({
    time: z.array(z.string()),
    temperature_2m_max: nullableSeries,
    temperature_2m_min: nullableSeries,
    precipitation_sum: nullableSeries.optional(),
  }),
});

/** One day of weather, temperatures in °F and precipitation in inches */
export interface DailyWeather {
  /** YYYY-MM-DD in America/New_York */
  date: string;
  high: number;
  low: number;
  precipitation: number;
}

export interface ForecastWindow {
  pastDays: number;
  forecastDays: number;
}

/**
 * WeatherClient - daily temperatures from Open-Meteo
 *
 * One request per call, no retries. Any failure (network, HTTP status, or a
 * body that is not JSON or does not match the expected shape) surfaces as a
 * SourceUnavailableError.
 */
@Injectable()
export class WeatherClient {
  private readonly logger = new Logger(WeatherClient.name);
  private readonly baseUrl: string;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService.get<string>('WEATHER_API_URL', DEFAULT_WEATHER_URL);
  }

  buildUrl(coordinates: SiteCoordinates, window: ForecastWindow): string {
    const params = new URLSearchParams({
      latitude: String(coordinates.latitude),
      longitude: String(coordinates.longitude),
      daily: 'temperature_2m_max,temperature_2m_min,precipitation_sum',
      temperature_unit: 'fahrenheit',
      precipitation_unit: 'inch',
      timezone: 'America/New_York',
      past_days: String(window.pastDays),
      forecast_days: String(window.forecastDays),
    });
    return `${this.baseUrl}?${params.toString()}`;
  }

  async dailyWeather(site: string, window: ForecastWindow): Promise<DailyWeather[]> {
    const coordinates = siteCoordinates(site);
    const url = this.buildUrl(coordinates, window);
    this.logger.debug(`Fetching weather for ${site}`);

    let response: Response;
    try {
      response = await fetch(url);
    } catch (error) {
      throw new SourceUnavailableError(
        SOURCE_NAME,
        url,
        `Request failed: ${formatError(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
    if (!response.ok) {
      throw new SourceUnavailableError(SOURCE_NAME, url, `HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new SourceUnavailableError(
        SOURCE_NAME,
        url,
        `Unreadable response: ${formatError(error)}`,
        error instanceof Error ? error : undefined,
      );
    }

    const parsed = DailyForecastSchema.safeParse(body);
    if (!parsed.success) {
      throw new SourceUnavailableError(
        SOURCE_NAME,
        url,
        `Unexpected response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
      );
    }

    const { time, temperature_2m_max, temperature_2m_min, precipitation_sum } =
      parsed.data.daily;
    const days: DailyWeather[] = [];
    time.forEach((date, i) => {
      const high = temperature_2m_max[i];
      const low = temperature_2m_min[i];
      if (high === null || high === undefined || low === null || low === undefined) return;
      days.push({ date, high, low, precipitation: precipitation_sum?.[i] ?? 0 });
    });
    return days;
  }
}

/**
 * Coordinates for a site code; unknown sites use the first configured site.
 */
export function siteCoordinates(site: string): SiteCoordinates {
  const sites: Record<string, SiteCoordinates> = DASHBOARD_CONFIG.siteCoordinates;
  return sites[site.toUpperCase()] ?? DASHBOARD_CONFIG.siteCoordinates.NY;
}
