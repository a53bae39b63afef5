/**
 * A row of the repairs tracker.
 */
export interface RepairTicket {
  repairId: string;
  /** Upper-cased mainline code */
  mainline: string;
  dateFound: Date | null;
  /** Null while the repair is open */
  dateResolved: Date | null;
  description: string;
}
