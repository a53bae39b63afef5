import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { App } from 'supertest/types';
import { AppModule } from '../src/app.module';
import { TABLE_SOURCES } from '../src/sources/interfaces/table-source.interface';
import { InMemoryTableSource } from './utils/in-memory-source';
import { createSheet } from './utils/sheet-builder';
import { PERSONNEL_HEADER, VACUUM_HEADER } from './utils/mock-data';

/**
 * E2E tests for the dashboard API
 *
 * Uses the real AppModule with the spreadsheet sources replaced by an
 * in-memory workbook, so no file or network access happens.
 */
describe('Dashboard API (e2e)', () => {
  let app: INestApplication<App>;
  const originalEnv = { ...process.env };

  beforeEach(async () => {
    process.env.VACUUM_SOURCES = 'NY=memory://ny';
    process.env.PERSONNEL_SOURCE = 'memory://crew';
    process.env.DEMO_DATE = '2025-03-05T15:00:00';

    const source = new InMemoryTableSource({
      ny: [
        createSheet('2025-03', VACUUM_HEADER, [
          ['RHAS13', 21, '2025-03-05 08:00', 43.4267, -73.7123],
          ['MPC2', 13, '2025-03-05 09:00', 43.4268, -73.7124],
        ]),
      ],
      crew: [
        createSheet('Mar_2025', PERSONNEL_HEADER, [
          ['Alex', 'Tapper', '2025-03-05', 'Leak check', '8', '20', 'RHAS13', '0', '', 'NY'],
        ]),
      ],
    });

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(TABLE_SOURCES)
      .useValue([source])
      .compile();

    app = moduleFixture.createNestApplication();
    await app.init();
  });

  afterEach(async () => {
    await app.close();
    process.env = { ...originalEnv };
  });

  it('GET /health should report ok', async () => {
    const response = await request(app.getHttpServer()).get('/health').expect(200);

    expect(response.body.status).toBe('ok');
  });

  it('GET /snapshot should summarize the loaded tables', async () => {
    const response = await request(app.getHttpServer()).get('/snapshot').expect(200);

    expect(response.body.counts).toEqual({ vacuum: 2, personnel: 1, repairs: 0 });
    expect(response.body.failures).toEqual([]);
  });

  it('GET /metrics/overview should compute from the snapshot', async () => {
    const response = await request(app.getHttpServer())
      .get('/metrics/overview')
      .expect(200);

    expect(response.body).toEqual({
      status: 'ok',
      data: {
        averageVacuum: 17,
        activeSensors: 2,
        problemSensors: 1,
        employeesToday: 1,
        hoursToday: 8,
        repairsToday: 0,
      },
    });
  });

  it('GET /vacuum/trends should reject an out-of-range window', async () => {
    const response = await request(app.getHttpServer())
      .get('/vacuum/trends?days=0')
      .expect(400);

    expect(response.body.message).toBe('Invalid days: 0 (expected 1 to 365)');
  });

  it('GET /weather/freeze-thaw should reject an unknown site', async () => {
    const response = await request(app.getHttpServer())
      .get('/weather/freeze-thaw?site=zz')
      .expect(400);

    expect(response.body.message).toBe('Invalid site: ZZ (expected one of NY, VT)');
  });
});
