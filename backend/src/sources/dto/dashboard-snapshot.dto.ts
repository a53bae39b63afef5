import { LogicalField } from '../../schema/schema-mapper';
import { PersonnelRecord } from './personnel-record.dto';
import { RepairTicket } from './repair-ticket.dto';
import { VacuumReading } from './vacuum-reading.dto';

export type TableName = 'vacuum' | 'personnel' | 'repairs';

export interface SourceFailure {
  table: TableName;
  reference: string;
  message: string;
}

/**
 * Everything loaded in one cache cycle.
 */
export interface DashboardSnapshot {
  loadedAt: Date;
  vacuum: VacuumReading[];
  personnel: PersonnelRecord[];
  repairs: RepairTicket[];
  /** Logical fields resolved in at least one sheet of each table */
  fields: Record<TableName, LogicalField[]>;
  warnings: string[];
  /** Sources that could not be read; a snapshot with failures is never cached */
  failures: SourceFailure[];
}

export interface SnapshotSummary {
  loadedAt: string;
  counts: Record<TableName, number>;
  fields: Record<TableName, LogicalField[]>;
  warnings: string[];
  failures: SourceFailure[];
}
