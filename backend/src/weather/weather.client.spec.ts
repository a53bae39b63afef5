import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { WeatherClient, siteCoordinates } from './weather.client';
import { SourceUnavailableError } from '../sources/interfaces/table-source.interface';

// Mock global fetch
const mockFetch = jest.fn();
global.fetch = mockFetch;

const FORECAST_URL = 'http://weather.test/v1/forecast';

describe('WeatherClient', () => {
  let client: WeatherClient;

  beforeEach(async () => {
    mockFetch.mockReset();

    const configService = {
      get: jest.fn((key: string, defaultValue?: string) => {
        const config: Record<string, string> = {
          WEATHER_API_URL: FORECAST_URL,
        };
        return config[key] ?? defaultValue;
      }),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [WeatherClient, { provide: ConfigService, useValue: configService }],
    }).compile();

    client = module.get<WeatherClient>(WeatherClient);
  });

  describe('buildUrl', () => {
    it('should ask for daily Fahrenheit values in Eastern time', () => {
      expect(
        client.buildUrl(siteCoordinates('NY'), { pastDays: 0, forecastDays: 2 }),
      ).toBe(
        `${FORECAST_URL}?latitude=43.4267&longitude=-73.7123` +
          '&daily=temperature_2m_max%2Ctemperature_2m_min%2Cprecipitation_sum' +
          '&temperature_unit=fahrenheit&precipitation_unit=inch' +
          '&timezone=America%2FNew_York&past_days=0&forecast_days=2',
      );
    });
  });

  describe('dailyWeather', () => {
    it('should return one entry per day with both temperatures', async () => {
      mockFetch.mockResolvedValueOnce({
        ok: true,
        json: () =>
          Promise.resolve({
            daily: {
              time: ['2025-03-05', '2025-03-06', '2025-03-07'],
              temperature_2m_max: [41.2, null, 38],
              temperature_2m_min: [22.5, 20, 30.1],
              precipitation_sum: [0, 0.1, null],
            },
          }),
      });

      const days = await client.dailyWeather('vt', { pastDays: 0, forecastDays: 3 });

      expect(mockFetch).toHaveBeenCalledWith(expect.stringContaining('latitude=44.5588'));
      expect(days).toEqual([
        { date: '2025-03-05', high: 41.2, low: 22.5, precipitation: 0 },
        { date: '2025-03-07', high: 38, low: 30.1, precipitation: 0 },
      ]);
    });

    it('should throw SourceUnavailableError on HTTP error', async () => {
      mockFetch.mockResolvedValueOnce({ ok: false, status: 503, json: () => Promise.resolve({}) });

      await expect(
        client.dailyWeather('NY', { pastDays: 0, forecastDays: 2 }),
      ).rejects.toThrow('[open-meteo] HTTP 503');
    });

    it('should throw SourceUnavailableError on network error', async () => {
      mockFetch.mockRejectedValueOnce(new Error('Network error'));

      await expect(
        client.dailyWeather('NY', { pastDays: 0, forecastDays: 2 }),
      ).rejects.toBeInstanceOf(SourceUnavailableError);
    });

    it('should throw SourceUnavailableError when the body is not JSON', async () => {
      mockFetch.mockResolvedValueOnce({
        ok: true,
        json: () => Promise.reject(new SyntaxError('Unexpected token < in JSON at position 0')),
      });

      const result = client.dailyWeather('NY', { pastDays: 0, forecastDays: 2 });

      await expect(result).rejects.toBeInstanceOf(SourceUnavailableError);
      await expect(result).rejects.toThrow(
        '[open-meteo] Unreadable response: Unexpected token < in JSON at position 0',
      );
    });

    it('should reject a body without daily values', async () => {
      mockFetch.mockResolvedValueOnce({
        ok: true,
        json: () => Promise.resolve({ error: true, reason: 'Invalid coordinates' }),
      });

      await expect(
        client.dailyWeather('NY', { pastDays: 0, forecastDays: 2 }),
      ).rejects.toThrow('Unexpected response');
    });
  });

  describe('siteCoordinates', () => {
    it('should fall back to the NY site for unknown codes', () => {
      expect(siteCoordinates('UNKNOWN')).toEqual({ latitude: 43.4267, longitude: -73.7123 });
    });
  });
});
