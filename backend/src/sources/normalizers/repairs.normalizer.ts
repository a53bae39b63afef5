import { cellText } from '../../common/cell-value';
import { parseDateValue, startOfUtcDay } from '../../common/date-utils';
import { LogicalField, SchemaMapper } from '../../schema/schema-mapper';
import { RepairTicket } from '../dto/repair-ticket.dto';
import { RawSheet } from '../interfaces/table-source.interface';
import {
  NormalizedTable,
  droppedRowsWarning,
  missingColumnsResult,
  presentFields,
} from './normalized-table';

const REPAIR_FIELDS: readonly LogicalField[] = [
  'repair_id',
  'mainline',
  'date_found',
  'date_resolved',
  'description',
];

const REQUIRED_FIELDS: readonly LogicalField[] = ['mainline', 'date_found'];

/**
 * Normalize the repairs tracker. Rows with neither an id nor a mainline are
 * blank lines and are dropped; tickets without a found date are kept (their
 * cost is reported as 0).
 */
export function normalizeRepairsSheet(
  sheet: RawSheet,
): NormalizedTable<RepairTicket> {
  const mapper = new SchemaMapper(sheet.header);
  const fields = presentFields(mapper, REPAIR_FIELDS);
  const { missing } = mapper.validateRequired(REQUIRED_FIELDS);
  if (missing.length > 0) {
    return missingColumnsResult(sheet, fields, missing);
  }

  const records: RepairTicket[] = [];
  let dropped = 0;

  for (const row of sheet.rows) {
    const repairId = cellText(mapper.value(row, 'repair_id'));
    const mainline = cellText(mapper.value(row, 'mainline')).toUpperCase();
    if (repairId === '' && mainline === '') {
      dropped++;
      continue;
    }

    const found = parseDateValue(mapper.value(row, 'date_found'));
    const resolved = parseDateValue(mapper.value(row, 'date_resolved'));
    records.push({
      repairId,
      mainline,
      dateFound: found ? startOfUtcDay(found) : null,
      dateResolved: resolved ? startOfUtcDay(resolved) : null,
      description: cellText(mapper.value(row, 'description')),
    });
  }

  return {
    records,
    fields,
    warnings: droppedRowsWarning(sheet, dropped, 'without an id or mainline'),
    droppedRows: dropped,
  };
}
