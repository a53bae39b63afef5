import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { DataLoaderService } from '../sources/data-loader.service';
import { SourceUnavailableError } from '../sources/interfaces/table-source.interface';
import { WeatherClient } from './weather.client';
import { WeatherService } from './weather.service';
import { makeReading, makeSnapshot } from '../../test/utils/mock-data';

describe('WeatherService', () => {
  let service: WeatherService;
  const mockWeatherClient = { dailyWeather: jest.fn() };
  const mockDataLoader = { getSnapshot: jest.fn() };
  const originalDemoDate = process.env.DEMO_DATE;

  beforeAll(() => {
    process.env.DEMO_DATE = '2025-03-05T15:00:00';
  });

  afterAll(() => {
    if (originalDemoDate === undefined) {
      delete process.env.DEMO_DATE;
    } else {
      process.env.DEMO_DATE = originalDemoDate;
    }
  });

  beforeEach(async () => {
    jest.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        WeatherService,
        { provide: WeatherClient, useValue: mockWeatherClient },
        { provide: DataLoaderService, useValue: mockDataLoader },
      ],
    }).compile();

    service = module.get<WeatherService>(WeatherService);
  });

  describe('freezeThaw', () => {
    it('should use today and tomorrow from the forecast', async () => {
      mockWeatherClient.dailyWeather.mockResolvedValue([
        { date: '2025-03-05', high: 50, low: 35, precipitation: 0 },
        { date: '2025-03-06', high: 41, low: 22, precipitation: 0 },
      ]);

      const status = await service.freezeThaw('NY');

      expect(mockWeatherClient.dailyWeather).toHaveBeenCalledWith('NY', {
        pastDays: 0,
        forecastDays: 2,
      });
      expect(status.status).toBe('UPCOMING');
    });

    it('should report UNKNOWN when the weather source is unavailable', async () => {
      mockWeatherClient.dailyWeather.mockRejectedValue(
        new SourceUnavailableError('open-meteo', 'http://weather.test', 'HTTP 503'),
      );

      const status = await service.freezeThaw('NY');

      expect(status.status).toBe('UNKNOWN');
      expect(status.today).toBeNull();
    });

    it('should rethrow unexpected errors', async () => {
      mockWeatherClient.dailyWeather.mockRejectedValue(new TypeError('boom'));

      await expect(service.freezeThaw('NY')).rejects.toThrow('boom');
    });
  });

  describe('freezeDrops', () => {
    it('should compare readings from the site inside the window', async () => {
      mockDataLoader.getSnapshot.mockResolvedValue(
        makeSnapshot({
          vacuum: [
            makeReading({ sensorName: 'RHAS1', vacuumInches: 20, timestamp: '2025-03-03T08:00:00Z' }),
            makeReading({ sensorName: 'RHAS1', vacuumInches: 16, timestamp: '2025-03-04T08:00:00Z' }),
            makeReading({ sensorName: 'VT1', vacuumInches: 20, timestamp: '2025-03-03T08:00:00Z', site: 'VT' }),
            makeReading({ sensorName: 'VT1', vacuumInches: 10, timestamp: '2025-03-04T08:00:00Z', site: 'VT' }),
            makeReading({ sensorName: 'OLD1', vacuumInches: 20, timestamp: '2025-02-01T08:00:00Z' }),
            makeReading({ sensorName: 'OLD1', vacuumInches: 10, timestamp: '2025-02-02T08:00:00Z' }),
          ],
        }),
      );
      mockWeatherClient.dailyWeather.mockResolvedValue([
        { date: '2025-03-03', high: 45, low: 35, precipitation: 0 },
        { date: '2025-03-04', high: 40, low: 20, precipitation: 0 },
        { date: '2025-03-05', high: 42, low: 25, precipitation: 0 },
      ]);

      const result = await service.freezeDrops('NY', 7);

      expect(mockWeatherClient.dailyWeather).toHaveBeenCalledWith('NY', {
        pastDays: 7,
        forecastDays: 1,
      });
      expect(result).toEqual({
        status: 'ok',
        data: {
          site: 'NY',
          days: 7,
          weatherAvailable: true,
          freezeThawDays: ['2025-03-04', '2025-03-05'],
          sensors: [
            {
              sensorName: 'RHAS1',
              averageDrop: 4,
              freezeDaysWithDrop: 1,
              totalFreezeDays: 1,
              dropRate: 1,
              latestVacuum: 16,
              status: 'LIKELY LEAK',
            },
          ],
        },
      });
    });

    it('should degrade when the weather source is unavailable', async () => {
      mockDataLoader.getSnapshot.mockResolvedValue(makeSnapshot());
      mockWeatherClient.dailyWeather.mockRejectedValue(
        new SourceUnavailableError('open-meteo', 'http://weather.test', 'HTTP 503'),
      );

      await expect(service.freezeDrops('NY', 7)).resolves.toEqual({
        status: 'ok',
        data: { site: 'NY', days: 7, weatherAvailable: false, freezeThawDays: [], sensors: [] },
      });
    });
  });

  describe('with the real client', () => {
    const mockFetch = jest.fn();
    const originalFetch = global.fetch;

    beforeAll(() => {
      global.fetch = mockFetch;
    });

    afterAll(() => {
      global.fetch = originalFetch;
    });

    it('should report UNKNOWN when the forecast body is not JSON', async () => {
      mockFetch.mockResolvedValueOnce({
        ok: true,
        json: () => Promise.reject(new SyntaxError('Unexpected token < in JSON at position 0')),
      });
      const module: TestingModule = await Test.createTestingModule({
        providers: [
          WeatherService,
          WeatherClient,
          { provide: ConfigService, useValue: { get: jest.fn((_key: string, def?: string) => def) } },
          { provide: DataLoaderService, useValue: mockDataLoader },
        ],
      }).compile();

      const status = await module.get<WeatherService>(WeatherService).freezeThaw('NY');

      expect(status.status).toBe('UNKNOWN');
      expect(status.description).toBe('Weather data unavailable');
    });
  });
});
