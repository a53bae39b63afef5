import { RawSheet } from './interfaces/table-source.interface';

const YEAR_MONTH = /^\d{4}-\d{2}$/;
const MONTH_UNDERSCORE_YEAR = /^[A-Za-z]{3,}_\d{4}$/;
const SEASON_YEAR = /202[4-7]/;

/**
 * Month tabs are titled "2025-02", "Feb_2025", or carry a season year.
 */
export function isMonthTab(title: string): boolean {
  const trimmed = title.trim();
  return (
    YEAR_MONTH.test(trimmed) ||
    MONTH_UNDERSCORE_YEAR.test(trimmed) ||
    SEASON_YEAR.test(trimmed)
  );
}

/**
 * Pick the data sheets of a workbook.
 *
 * A single-sheet source is always used as-is. Multi-sheet workbooks contribute
 * only their month tabs. The approvals tab is never a data sheet.
 */
export function selectDataSheets(
  sheets: readonly RawSheet[],
  approvalsTab: string,
): RawSheet[] {
  const candidates = sheets.filter(
    (sheet) => sheet.title.trim().toLowerCase() !== approvalsTab.toLowerCase(),
  );
  if (sheets.length === 1) {
    return candidates;
  }
  return candidates.filter((sheet) => isMonthTab(sheet.title));
}

export function findApprovalsSheet(
  sheets: readonly RawSheet[],
  approvalsTab: string,
): RawSheet | undefined {
  return sheets.find(
    (sheet) => sheet.title.trim().toLowerCase() === approvalsTab.toLowerCase(),
  );
}
