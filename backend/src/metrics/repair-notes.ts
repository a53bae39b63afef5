import { dayKey } from '../common/date-utils';
import { ParsedRepairNote, parseRepairNote } from '../classifiers/repair-notes.parser';
import { PersonnelRecord } from '../sources/dto/personnel-record.dto';
import { hasRepairNote } from './metric-utils';

export interface RepairNoteEntry extends ParsedRepairNote {
  date: string;
  employeeName: string;
  mainline: string;
  site: string;
  /** Repairs-needed and notes text the entry was parsed from */
  text: string;
}

/**
 * Timesheet rows whose repairs-needed or notes text describes a repair,
 * newest first.
 */
export function repairNotes(personnel: readonly PersonnelRecord[]): RepairNoteEntry[] {
  const entries: RepairNoteEntry[] = [];
  for (const record of personnel) {
    const parts = [hasRepairNote(record) ? record.repairsNeeded.trim() : '', record.notes.trim()];
    const text = parts.filter((part) => part !== '').join(' ');
    const parsed = parseRepairNote(text);
    if (!parsed) continue;

    entries.push({
      date: dayKey(record.date),
      employeeName: record.employeeName,
      mainline: record.mainline,
      site: record.site,
      text,
      ...parsed,
    });
  }
  return entries.sort((a, b) => b.date.localeCompare(a.date));
}
