import { z } from 'zod';
import tables from './dashboard-tables.json';

/**
 * Lookup tables shipped beside this file, validated once at import.
 */
const aliasList = z.array(z.string().min(1)).min(1);

export const ColumnAliasesSchema = z.object({
  sensor_name: aliasList,
  vacuum_reading: aliasList,
  timestamp: aliasList,
  latitude: aliasList,
  longitude: aliasList,
  site: aliasList,
  releaser_differential: aliasList,
  employee_name: aliasList,
  employee_first: aliasList,
  employee_last: aliasList,
  employee_id: aliasList,
  date: aliasList,
  job_code: aliasList,
  hours: aliasList,
  rate: aliasList,
  mainline: aliasList,
  taps_put_in: aliasList,
  taps_removed: aliasList,
  taps_capped: aliasList,
  repairs_needed: aliasList,
  notes: aliasList,
  clock_in: aliasList,
  clock_out: aliasList,
  repair_id: aliasList,
  date_found: aliasList,
  date_resolved: aliasList,
  description: aliasList,
  source_hash: aliasList,
  approved_by: aliasList,
  approved_date: aliasList,
});

const DashboardTablesSchema = z.object({
  columnAliases: ColumnAliasesSchema,
  jobCodes: z.object({
    excluded: z.array(z.string()),
    tapping: z.array(z.string()),
    repair: z.array(z.string()),
  }),
  sugarbushMap: z.record(z.array(z.string())),
  excludedSensorPrefixes: z.record(z.enum(['birch', 'relay', 'inactive'])),
});

export type DashboardTables = z.infer<typeof DashboardTablesSchema>;
export type SensorExclusionReason = 'birch' | 'relay' | 'inactive';

const parsedTables: DashboardTables = DashboardTablesSchema.parse(tables);

export interface SiteCoordinates {
  latitude: number;
  longitude: number;
}

/**
 * Central dashboard configuration.
 *
 * Thresholds and lookups consulted by the classifiers, metrics and clustering.
 */
export const DASHBOARD_CONFIG = {
  vacuum: {
    /** Inches of mercury */
    excellent: 20,
    fair: 15,
    critical: 12,
    /** Readings at or below this are treated as sensor dropouts */
    validReadingFloor: 1,
  },
  statusColors: {
    Excellent: '#28a745',
    Fair: '#ffc107',
    Poor: '#fd7e14',
    Critical: '#dc3545',
  },
  personnel: {
    overtimeWeeklyHours: 52,
    excessiveDailyHours: 12,
    severeDailyHours: 16,
    minHoursForRanking: 5,
    efficiencyMultiplier: 10,
    topPerformersCount: 10,
  },
  effectiveness: {
    toleranceMinutes: 30,
    afterClockOutHours: 1,
    fallbackDays: 2,
  },
  leaks: {
    suddenWindowHours: 6,
    suddenDrop: 5,
    suddenCriticalDrop: 8,
    gradualWindowDays: 7,
    gradualMinReadings: 10,
    gradualDrop: 3,
    gradualHighDrop: 5,
  },
  quality: {
    rapidDropMargin: 3,
    rapidDropHighMargin: 5,
    rapidDropWindowHours: 24,
    zeroImpactMinHours: 4,
    zeroImpactMediumHours: 8,
  },
  clustering: {
    radiusMeters: 500,
    minSensors: 2,
    boundsPadding: 0.1,
    degenerateBoundsPadding: 0.01,
  },
  freezeThaw: {
    freezingF: 32,
    dropThreshold: 2,
    likelyLeakRate: 0.5,
    watchRate: 0.25,
  },
  seasonStartMonth: 12,
  cacheTtlSeconds: 300,
  approvalsTab: 'approved_personnel',
  siteCoordinates: {
    NY: { latitude: 43.4267, longitude: -73.7123 },
    VT: { latitude: 44.5588, longitude: -72.5778 },
  } satisfies Record<string, SiteCoordinates>,
  /** Plausible coordinate box for sensors; anything outside is a data-entry error */
  coordinateBounds: {
    minLatitude: 40,
    maxLatitude: 46,
    minLongitude: -80,
    maxLongitude: -71,
  },
  columnAliases: parsedTables.columnAliases,
  jobCodes: parsedTables.jobCodes,
  sugarbushMap: parsedTables.sugarbushMap,
  excludedSensorPrefixes: parsedTables.excludedSensorPrefixes,
};

export type DashboardConfig = typeof DASHBOARD_CONFIG;
