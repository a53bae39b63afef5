/**
 * VacuumReading
 *
 * One sensor report from a site's vacuum monitoring export.
 */
export interface VacuumReading {
  /** Sensor / mainline name as it appears in the sheet, trimmed */
  sensorName: string;

  /** Wall-clock time of the report, stored as a UTC instant */
  timestamp: Date;

  /**
   * Vacuum in inches of mercury. Null when the cell was empty or unparseable;
   * consumers decide whether to treat that as 0 or leave it out.
   */
  vacuumInches: number | null;

  releaserDifferential: number | null;
  latitude: number | null;
  longitude: number | null;

  /** Site code (NY, VT, ...) */
  site: string;
}
