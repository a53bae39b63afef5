import { SiteCode } from '../../classifiers/site.classifier';

/**
 * Approval state of a timesheet row after the manager overlay is applied.
 * - pending: no approved copy exists
 * - approved: an approved copy exists and the raw row is unchanged since
 * - source-updated: an approved copy exists but the raw row has changed since
 */
export type ApprovalStatus = 'pending' | 'approved' | 'source-updated';

/**
 * PersonnelRecord
 *
 * One timesheet entry. Numeric fields are already coerced (unparseable -> 0).
 */
export interface PersonnelRecord {
  /** Approval overlay key: employee | date | job code */
  key: string;
  employeeName: string;
  employeeId: string;
  /** Work date (midnight UTC of the wall-clock day) */
  date: Date;
  hours: number;
  rate: number;
  /** Upper-cased mainline code, '' when not recorded */
  mainline: string;
  jobCode: string;
  tapsPutIn: number;
  tapsRemoved: number;
  tapsCapped: number;
  /** Free text from the repairs-needed column */
  repairsNeeded: string;
  notes: string;
  site: SiteCode;
  clockIn: Date | null;
  clockOut: Date | null;
  /** Fingerprint of the row's canonical fields */
  sourceHash: string;
  approval: ApprovalStatus;
}

/**
 * A row of the approvals tab: the corrected record plus approval metadata.
 */
export interface ApprovedPersonnelRecord extends PersonnelRecord {
  /** Fingerprint of the raw row this approval was made from */
  approvedSourceHash: string;
  approvedBy: string;
  approvedDate: Date | null;
}
