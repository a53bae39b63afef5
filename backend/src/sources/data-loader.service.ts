import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DASHBOARD_CONFIG } from '../config/dashboard.config';
import { parseSiteSources } from '../config/env.validation';
import { LogicalField } from '../schema/schema-mapper';
import { mergeApprovals } from './approval-overlay';
import {
  DashboardSnapshot,
  SnapshotSummary,
  SourceFailure,
  TableName,
} from './dto/dashboard-snapshot.dto';
import { PersonnelRecord } from './dto/personnel-record.dto';
import { RepairTicket } from './dto/repair-ticket.dto';
import { VacuumReading } from './dto/vacuum-reading.dto';
import {
  RawSheet,
  SourceUnavailableError,
  TABLE_SOURCES,
  TableSource,
} from './interfaces/table-source.interface';
import { findApprovalsSheet, selectDataSheets } from './month-tabs';
import { NormalizedTable } from './normalizers/normalized-table';
import {
  normalizeApprovalSheet,
  normalizePersonnelSheet,
} from './normalizers/personnel.normalizer';
import { normalizeRepairsSheet } from './normalizers/repairs.normalizer';
import { normalizeVacuumSheet } from './normalizers/vacuum.normalizer';
import { SNAPSHOT_CACHE, SnapshotCache } from './snapshot-cache';

const SNAPSHOT_KEY = 'dashboard';

interface TableLoad<T> {
  records: T[];
  fields: LogicalField[];
  warnings: string[];
}

function combine<T>(tables: readonly NormalizedTable<T>[]): TableLoad<T> {
  const fields = new Set<LogicalField>();
  const load: TableLoad<T> = { records: [], fields: [], warnings: [] };
  for (const table of tables) {
    load.records.push(...table.records);
    load.warnings.push(...table.warnings);
    table.fields.forEach((field) => fields.add(field));
  }
  load.fields = [...fields];
  return load;
}

export function summarizeSnapshot(snapshot: DashboardSnapshot): SnapshotSummary {
  return {
    loadedAt: snapshot.loadedAt.toISOString(),
    counts: {
      vacuum: snapshot.vacuum.length,
      personnel: snapshot.personnel.length,
      repairs: snapshot.repairs.length,
    },
    fields: snapshot.fields,
    warnings: snapshot.warnings,
    failures: snapshot.failures,
  };
}

/**
 * DataLoaderService - builds and caches the dashboard snapshot
 *
 * Responsibilities:
 * 1. Source Selection: first registered TableSource accepting a reference
 * 2. Sheet Selection: month tabs only; the approvals tab is read separately
 * 3. Normalization: typed vacuum, personnel and repair tables
 * 4. Approval Overlay: approved personnel rows replace raw ones
 * 5. Caching: snapshots are cached for CACHE_TTL_SECONDS unless a source failed
 *
 * Sources are loaded in parallel. An unreachable source degrades the snapshot
 * (empty table, failure recorded) instead of failing it.
 */
@Injectable()
export class DataLoaderService {
  private readonly logger = new Logger(DataLoaderService.name);

  constructor(
    @Inject(TABLE_SOURCES) private readonly sources: TableSource[],
    @Inject(SNAPSHOT_CACHE)
    private readonly cache: SnapshotCache<DashboardSnapshot>,
    private readonly configService: ConfigService,
  ) {
    this.logger.log(
      `Initialized with ${this.sources.length} source(s): ${this.sources.map((s) => s.name).join(', ')}`,
    );
  }

  getSnapshot(): Promise<DashboardSnapshot> {
    return this.cache.getOrLoad(SNAPSHOT_KEY, () => this.loadSnapshot(), {
      shouldCache: (snapshot) => snapshot.failures.length === 0,
    });
  }

  /**
   * Drop every cached snapshot and load a fresh one.
   */
  refresh(): Promise<DashboardSnapshot> {
    this.logger.log('Snapshot cache invalidated');
    this.cache.invalidateAll();
    return this.getSnapshot();
  }

  private get approvalsTab(): string {
    return this.configService.get<string>(
      'APPROVALS_TAB',
      DASHBOARD_CONFIG.approvalsTab,
    );
  }

  private async loadSnapshot(): Promise<DashboardSnapshot> {
    const startTime = Date.now();
    const failures: SourceFailure[] = [];

    const [vacuum, personnel, repairs] = await Promise.all([
      this.loadVacuum(failures),
      this.loadPersonnel(failures),
      this.loadRepairs(failures),
    ]);

    const snapshot: DashboardSnapshot = {
      loadedAt: new Date(),
      vacuum: vacuum.records,
      personnel: personnel.records,
      repairs: repairs.records,
      fields: {
        vacuum: vacuum.fields,
        personnel: personnel.fields,
        repairs: repairs.fields,
      },
      warnings: [
        ...vacuum.warnings,
        ...personnel.warnings,
        ...repairs.warnings,
        ...failures.map(
          (failure) => `Source unavailable for ${failure.table}: ${failure.message}`,
        ),
      ],
      failures,
    };

    this.logger.log(
      `Snapshot loaded in ${Date.now() - startTime}ms: ${snapshot.vacuum.length} vacuum readings, ` +
        `${snapshot.personnel.length} personnel records, ${snapshot.repairs.length} repair tickets ` +
        `(${snapshot.warnings.length} warning(s), ${failures.length} failure(s))`,
    );
    return snapshot;
  }

  private async loadVacuum(
    failures: SourceFailure[],
  ): Promise<TableLoad<VacuumReading>> {
    const references = parseSiteSources(
      this.configService.get<string>('VACUUM_SOURCES', ''),
    );
    if (references.length === 0) {
      return this.unconfigured('vacuum', 'VACUUM_SOURCES');
    }

    const perSource = await Promise.all(
      references.map(async ({ site, reference }) => {
        const sheets = await this.readSheets('vacuum', reference, failures);
        return selectDataSheets(sheets, this.approvalsTab).map((sheet) =>
          normalizeVacuumSheet(sheet, site),
        );
      }),
    );
    return this.report('vacuum', combine(perSource.flat()));
  }

  private async loadPersonnel(
    failures: SourceFailure[],
  ): Promise<TableLoad<PersonnelRecord>> {
    const reference = this.configService.get<string>('PERSONNEL_SOURCE', '');
    if (reference === '') {
      return this.unconfigured('personnel', 'PERSONNEL_SOURCE');
    }

    const sheets = await this.readSheets('personnel', reference, failures);
    const raw = combine(
      selectDataSheets(sheets, this.approvalsTab).map(normalizePersonnelSheet),
    );

    const approvalsSheet = findApprovalsSheet(sheets, this.approvalsTab);
    if (!approvalsSheet) {
      return this.report('personnel', raw);
    }

    const approved = normalizeApprovalSheet(approvalsSheet);
    this.logger.log(
      `Applying ${approved.records.length} approved row(s) from '${approvalsSheet.title}'`,
    );
    return this.report('personnel', {
      records: mergeApprovals(raw.records, approved.records),
      fields: raw.fields,
      warnings: [...raw.warnings, ...approved.warnings],
    });
  }

  /**
   * The repairs tracker is a single table: only its first sheet is read.
   */
  private async loadRepairs(
    failures: SourceFailure[],
  ): Promise<TableLoad<RepairTicket>> {
    const reference = this.configService.get<string>('REPAIRS_SOURCE', '');
    if (reference === '') {
      this.logger.debug('No repairs tracker configured');
      return { records: [], fields: [], warnings: [] };
    }

    const sheets = await this.readSheets('repairs', reference, failures);
    return this.report('repairs', combine(sheets.slice(0, 1).map(normalizeRepairsSheet)));
  }

  private async readSheets(
    table: TableName,
    reference: string,
    failures: SourceFailure[],
  ): Promise<RawSheet[]> {
    try {
      return await this.sourceFor(reference).load(reference);
    } catch (error) {
      if (!(error instanceof SourceUnavailableError)) {
        throw error;
      }
      this.logger.error(`Failed to load ${table} source: ${error.message}`);
      failures.push({ table, reference, message: error.message });
      return [];
    }
  }

  private sourceFor(reference: string): TableSource {
    const source = this.sources.find((s) => s.canHandle(reference));
    if (!source) {
      throw new SourceUnavailableError(
        'loader',
        reference,
        `No source can read '${reference}'. Supported formats: ${this.sources.map((s) => s.name).join(', ')}`,
      );
    }
    this.logger.debug(`Using source '${source.name}' for ${reference}`);
    return source;
  }

  private unconfigured<T>(table: TableName, variable: string): TableLoad<T> {
    const warning = `No ${table} source configured (${variable})`;
    this.logger.warn(warning);
    return { records: [], fields: [], warnings: [warning] };
  }

  private report<T>(table: TableName, load: TableLoad<T>): TableLoad<T> {
    for (const warning of load.warnings) {
      this.logger.warn(warning);
    }
    this.logger.debug(`${table} columns resolved: ${load.fields.join(', ') || 'none'}`);
    return load;
  }
}
