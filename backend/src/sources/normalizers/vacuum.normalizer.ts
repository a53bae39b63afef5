import { cellText } from '../../common/cell-value';
import { parseDateValue } from '../../common/date-utils';
import { parseNumber } from '../../common/number-utils';
import { normalizeSite } from '../../classifiers/site.classifier';
import { LogicalField, SchemaMapper } from '../../schema/schema-mapper';
import { VacuumReading } from '../dto/vacuum-reading.dto';
import { RawSheet } from '../interfaces/table-source.interface';
import {
  NormalizedTable,
  droppedRowsWarning,
  missingColumnsResult,
  presentFields,
} from './normalized-table';

const VACUUM_FIELDS: readonly LogicalField[] = [
  'sensor_name',
  'vacuum_reading',
  'timestamp',
  'latitude',
  'longitude',
  'site',
  'releaser_differential',
];

const REQUIRED_FIELDS: readonly LogicalField[] = ['sensor_name', 'timestamp'];

/**
 * Normalize one vacuum sheet.
 *
 * Rows without a sensor name or a parseable timestamp are dropped. Missing
 * vacuum values stay null. The site column wins when it holds a known site;
 * otherwise the site of the source the sheet came from is used.
 *
 * @param defaultSite - Site key configured for the source (e.g. 'NY')
 */
export function normalizeVacuumSheet(
  sheet: RawSheet,
  defaultSite: string,
): NormalizedTable<VacuumReading> {
  const mapper = new SchemaMapper(sheet.header);
  const fields = presentFields(mapper, VACUUM_FIELDS);
  const { missing } = mapper.validateRequired(REQUIRED_FIELDS);
  if (missing.length > 0) {
    return missingColumnsResult(sheet, fields, missing);
  }

  const records: VacuumReading[] = [];
  let dropped = 0;

  for (const row of sheet.rows) {
    const sensorName = cellText(mapper.value(row, 'sensor_name'));
    const timestamp = parseDateValue(mapper.value(row, 'timestamp'));
    if (sensorName === '' || !timestamp) {
      dropped++;
      continue;
    }

    const rowSite = normalizeSite(cellText(mapper.value(row, 'site')));

    records.push({
      sensorName,
      timestamp,
      vacuumInches: parseNumber(mapper.value(row, 'vacuum_reading')),
      releaserDifferential: parseNumber(
        mapper.value(row, 'releaser_differential'),
      ),
      latitude: parseNumber(mapper.value(row, 'latitude')),
      longitude: parseNumber(mapper.value(row, 'longitude')),
      site: rowSite === 'UNKNOWN' ? defaultSite : rowSite,
    });
  }

  return {
    records,
    fields,
    warnings: droppedRowsWarning(
      sheet,
      dropped,
      'without a sensor name or valid timestamp',
    ),
    droppedRows: dropped,
  };
}
