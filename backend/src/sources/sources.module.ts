import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DASHBOARD_CONFIG } from '../config/dashboard.config';
import { DataLoaderService } from './data-loader.service';
import { DashboardSnapshot } from './dto/dashboard-snapshot.dto';
import { TABLE_SOURCES, TableSource } from './interfaces/table-source.interface';
import { ReferenceReader } from './reference-reader';
import { SNAPSHOT_CACHE, SnapshotCache } from './snapshot-cache';
import { SnapshotController } from './snapshot.controller';
import { CsvTableSource } from './strategies/csv.source';
import { XlsxWorkbookSource } from './strategies/xlsx-workbook.source';

/**
 * SourcesModule
 *
 * Loads the spreadsheets behind the dashboard and caches the result.
 *
 * Components:
 * - DataLoaderService: builds the cached DashboardSnapshot
 * - CsvTableSource: strategy for CSV files and CSV exports
 * - XlsxWorkbookSource: strategy for workbooks and Google Sheets
 * - SnapshotController: load summary and manual refresh
 */
@Module({
  controllers: [SnapshotController],
  providers: [
    ReferenceReader,
    CsvTableSource,
    XlsxWorkbookSource,
    {
      provide: TABLE_SOURCES,
      // Order matters: csv claims `format=csv` exports before the workbook source sees them
      useFactory: (csv: CsvTableSource, xlsx: XlsxWorkbookSource): TableSource[] => [
        csv,
        xlsx,
      ],
      inject: [CsvTableSource, XlsxWorkbookSource],
    },
    {
      provide: SNAPSHOT_CACHE,
      useFactory: (configService: ConfigService) =>
        new SnapshotCache<DashboardSnapshot>(
          configService.get<number>('CACHE_TTL_SECONDS', DASHBOARD_CONFIG.cacheTtlSeconds) *
            1000,
        ),
      inject: [ConfigService],
    },
    DataLoaderService,
  ],
  exports: [DataLoaderService],
})
export class SourcesModule {}
