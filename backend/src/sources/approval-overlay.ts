import { dayKey } from '../common/date-utils';
import {
  ApprovalStatus,
  ApprovedPersonnelRecord,
  PersonnelRecord,
} from './dto/personnel-record.dto';

export type ApprovalCounts = Record<ApprovalStatus, number>;

function stripApproval(record: ApprovedPersonnelRecord): PersonnelRecord {
  const {
    approvedSourceHash: _hash,
    approvedBy: _by,
    approvedDate: _date,
    ...rest
  } = record;
  return rest;
}

/**
 * Overlay manager-approved rows on the raw timesheet.
 *
 * Pure and non-destructive: neither input is modified.
 * - raw row without an approved copy: raw values, `pending`
 * - approved copy made from this exact raw row: approved values, `approved`
 * - approved copy made from an earlier version of the row: approved values,
 *   `source-updated`
 * - approved rows whose raw row no longer exists: kept as `approved`
 *
 * When several approved rows share a key the last one wins.
 */
export function mergeApprovals(
  raw: readonly PersonnelRecord[],
  approved: readonly ApprovedPersonnelRecord[],
): PersonnelRecord[] {
  const approvedByKey = new Map<string, ApprovedPersonnelRecord>();
  for (const record of approved) {
    approvedByKey.set(record.key, record);
  }

  const used = new Set<string>();
  const merged = raw.map((record): PersonnelRecord => {
    const match = approvedByKey.get(record.key);
    if (!match) {
      return { ...record, approval: 'pending' };
    }
    used.add(record.key);
    return {
      ...stripApproval(match),
      approval:
        match.approvedSourceHash === record.sourceHash
          ? 'approved'
          : 'source-updated',
    };
  });

  for (const [key, record] of approvedByKey) {
    if (!used.has(key)) {
      merged.push({ ...stripApproval(record), approval: 'approved' });
    }
  }

  return merged;
}

export function countApprovals(records: readonly PersonnelRecord[]): ApprovalCounts {
  const counts: ApprovalCounts = { pending: 0, approved: 0, 'source-updated': 0 };
  for (const record of records) {
    counts[record.approval]++;
  }
  return counts;
}

export type ApprovalRow = Record<string, string | number>;

/**
 * Rows a manager appends to the approvals tab to approve `records`.
 * Column names round-trip through the timesheet normalizer.
 */
export function prepareApprovalRows(
  records: readonly PersonnelRecord[],
  approvedBy: string,
  approvedAt: Date,
): ApprovalRow[] {
  return records.map((record) => ({
    'Employee Name': record.employeeName,
    'Employee ID': record.employeeId,
    Date: dayKey(record.date),
    Job: record.jobCode,
    Hours: record.hours,
    Rate: record.rate,
    'mainline.': record.mainline,
    'Taps Put In': record.tapsPutIn,
    'Taps Removed': record.tapsRemoved,
    'Taps Capped': record.tapsCapped,
    'Repairs Needed': record.repairsNeeded,
    Notes: record.notes,
    Site: record.site,
    'Source Hash': record.sourceHash,
    'Approved Date': approvedAt.toISOString(),
    'Approved By': approvedBy,
  }));
}
