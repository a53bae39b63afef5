import { createHash } from 'node:crypto';
import { RawRow, cellText } from '../../common/cell-value';
import {
  dayKey,
  parseClockValue,
  parseDateValue,
  startOfUtcDay,
} from '../../common/date-utils';
import { toNumber } from '../../common/number-utils';
import { normalizeSite } from '../../classifiers/site.classifier';
import { LogicalField, SchemaMapper } from '../../schema/schema-mapper';
import {
  ApprovedPersonnelRecord,
  PersonnelRecord,
} from '../dto/personnel-record.dto';
import { RawSheet } from '../interfaces/table-source.interface';
import {
  NormalizedTable,
  droppedRowsWarning,
  missingColumnsResult,
  presentFields,
} from './normalized-table';

const PERSONNEL_FIELDS: readonly LogicalField[] = [
  'employee_name',
  'employee_first',
  'employee_last',
  'employee_id',
  'date',
  'job_code',
  'hours',
  'rate',
  'mainline',
  'taps_put_in',
  'taps_removed',
  'taps_capped',
  'repairs_needed',
  'notes',
  'site',
  'clock_in',
  'clock_out',
];

const REQUIRED_FIELDS: readonly LogicalField[] = ['date', 'hours'];

/**
 * Overlay key shared by a raw timesheet row and its approved copy.
 */
export function approvalKey(
  employeeName: string,
  date: Date,
  jobCode: string,
): string {
  const norm = (text: string) => text.trim().toLowerCase().replace(/\s+/g, ' ');
  return `${norm(employeeName)}|${dayKey(date)}|${norm(jobCode)}`;
}

/**
 * SHA-1 over the canonical fields of a record. Two rows with the same
 * fingerprint carry the same timesheet data.
 */
export function fingerprintRecord(
  record: Omit<PersonnelRecord, 'key' | 'sourceHash' | 'approval'>,
): string {
  const canonical = JSON.stringify([
    record.employeeName,
    record.employeeId,
    dayKey(record.date),
    record.jobCode,
    record.hours,
    record.rate,
    record.mainline,
    record.tapsPutIn,
    record.tapsRemoved,
    record.tapsCapped,
    record.repairsNeeded,
    record.notes,
    record.site,
  ]);
  return createHash('sha1').update(canonical).digest('hex');
}

function employeeName(mapper: SchemaMapper, row: RawRow): string {
  const full = cellText(mapper.value(row, 'employee_name'));
  if (full !== '') return full;

  const first = cellText(mapper.value(row, 'employee_first'));
  const last = cellText(mapper.value(row, 'employee_last'));
  return `${first} ${last}`.trim() || 'Unknown';
}

/**
 * Build a record from one row; null when the row has no valid date.
 */
function buildRecord(mapper: SchemaMapper, row: RawRow): PersonnelRecord | null {
  const parsedDate = parseDateValue(mapper.value(row, 'date'));
  if (!parsedDate) return null;
  const date = startOfUtcDay(parsedDate);

  const fields = {
    employeeName: employeeName(mapper, row),
    employeeId: cellText(mapper.value(row, 'employee_id')),
    date,
    hours: Math.max(0, toNumber(mapper.value(row, 'hours'))),
    rate: Math.max(0, toNumber(mapper.value(row, 'rate'))),
    mainline: cellText(mapper.value(row, 'mainline')).toUpperCase(),
    jobCode: cellText(mapper.value(row, 'job_code')),
    tapsPutIn: toNumber(mapper.value(row, 'taps_put_in')),
    tapsRemoved: toNumber(mapper.value(row, 'taps_removed')),
    tapsCapped: toNumber(mapper.value(row, 'taps_capped')),
    repairsNeeded: cellText(mapper.value(row, 'repairs_needed')),
    notes: cellText(mapper.value(row, 'notes')),
    site: normalizeSite(cellText(mapper.value(row, 'site'))),
    clockIn: parseClockValue(mapper.value(row, 'clock_in'), date),
    clockOut: parseClockValue(mapper.value(row, 'clock_out'), date),
  };

  return {
    ...fields,
    key: approvalKey(fields.employeeName, date, fields.jobCode),
    sourceHash: fingerprintRecord(fields),
    approval: 'pending',
  };
}

function hasEmployeeColumn(mapper: SchemaMapper): boolean {
  return (
    mapper.has('employee_name') ||
    mapper.has('employee_first') ||
    mapper.has('employee_last')
  );
}

function normalizeRows<T>(
  sheet: RawSheet,
  extraFields: readonly LogicalField[],
  build: (mapper: SchemaMapper, row: RawRow) => T | null,
): NormalizedTable<T> {
  const mapper = new SchemaMapper(sheet.header);
  const fields = presentFields(mapper, [...PERSONNEL_FIELDS, ...extraFields]);

  const { missing } = mapper.validateRequired(REQUIRED_FIELDS);
  if (!hasEmployeeColumn(mapper)) {
    missing.push('employee_name');
  }
  if (missing.length > 0) {
    return missingColumnsResult(sheet, fields, missing);
  }

  const records: T[] = [];
  let dropped = 0;
  for (const row of sheet.rows) {
    const record = build(mapper, row);
    if (record) {
      records.push(record);
    } else {
      dropped++;
    }
  }

  return {
    records,
    fields,
    warnings: droppedRowsWarning(sheet, dropped, 'without a valid date'),
    droppedRows: dropped,
  };
}

/**
 * Normalize one timesheet sheet.
 *
 * Hours, rates and tap counts are coerced (unparseable or negative -> 0),
 * mainlines upper-cased, sites normalized. Employee names come from the name
 * column or from first + last name columns.
 */
export function normalizePersonnelSheet(
  sheet: RawSheet,
): NormalizedTable<PersonnelRecord> {
  return normalizeRows(sheet, [], buildRecord);
}

/**
 * Normalize the approvals tab: the same columns as a timesheet plus
 * Source Hash, Approved By and Approved Date.
 */
export function normalizeApprovalSheet(
  sheet: RawSheet,
): NormalizedTable<ApprovedPersonnelRecord> {
  return normalizeRows<ApprovedPersonnelRecord>(
    sheet,
    ['source_hash', 'approved_by', 'approved_date'],
    (mapper, row) => {
      const record = buildRecord(mapper, row);
      if (!record) return null;
      return {
        ...record,
        approval: 'approved',
        approvedSourceHash: cellText(mapper.value(row, 'source_hash')),
        approvedBy: cellText(mapper.value(row, 'approved_by')),
        approvedDate: parseDateValue(mapper.value(row, 'approved_date')),
      };
    },
  );
}
