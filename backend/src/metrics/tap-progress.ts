import { DASHBOARD_CONFIG } from '../config/dashboard.config';
import { sum } from '../common/number-utils';
import { extractConductorSystem } from '../classifiers/conductor.classifier';
import { PersonnelRecord } from '../sources/dto/personnel-record.dto';
import { groupBy } from './metric-utils';

/** '' when the mainline has no taps in either season */
export type TapStatus =
  | 'Not started'
  | 'New tapping'
  | 'Significantly less'
  | 'On track'
  | 'On target'
  | 'Significantly more'
  | '';

export interface MainlineTapProgress {
  mainline: string;
  conductorSystem: string;
  previousTaps: number;
  tapsPutIn: number;
  tapsRemoved: number;
  /** Names of everyone who put taps in this season, sorted */
  tappers: string[];
  /** Current taps as a percentage of last season's, when both are present */
  percentOfPrevious: number | null;
  status: TapStatus;
}

export interface TapProgressReport {
  season: number;
  previousSeason: number;
  mainlines: MainlineTapProgress[];
  statusCounts: Partial<Record<TapStatus, number>>;
}

/**
 * Season a date belongs to. Seasons are named for the spring they end in and
 * start on the first day of the configured month of the year before.
 */
export function seasonFor(date: Date): number {
  const year = date.getUTCFullYear();
  return date.getUTCMonth() + 1 >= DASHBOARD_CONFIG.seasonStartMonth ? year + 1 : year;
}

function seasonRange(season: number): [number, number] {
  const month = DASHBOARD_CONFIG.seasonStartMonth - 1;
  return [Date.UTC(season - 1, month, 1), Date.UTC(season, month, 1)];
}

function inSeason(records: readonly PersonnelRecord[], season: number): PersonnelRecord[] {
  const [start, end] = seasonRange(season);
  return records.filter((r) => {
    const time = r.date.getTime();
    return r.mainline !== '' && time >= start && time < end;
  });
}

/**
 * Five-tier comparison of this season's taps against last season's.
 */
export function classifyTapProgress(previous: number, current: number): TapStatus {
  if (previous > 0 && current === 0) return 'Not started';
  if (previous === 0 && current > 0) return 'New tapping';
  if (previous <= 0 || current <= 0) return '';

  const percent = (current / previous) * 100;
  if (percent < 95) return 'Significantly less';
  if (percent < 99) return 'On track';
  if (percent <= 101) return 'On target';
  if (percent <= 105) return 'On track';
  return 'Significantly more';
}

/**
 * Taps put in per mainline during `season`, compared with the season before.
 * Mainlines worked in either season are listed, by conductor system then name.
 */
export function tapProgress(
  personnel: readonly PersonnelRecord[],
  season: number,
): TapProgressReport {
  const current = groupBy(inSeason(personnel, season), (r) => r.mainline);
  const previous = groupBy(inSeason(personnel, season - 1), (r) => r.mainline);
  const mainlineNames = [...new Set([...previous.keys(), ...current.keys()])];

  const mainlines = mainlineNames.map((mainline): MainlineTapProgress => {
    const records = current.get(mainline) ?? [];
    const previousTaps = sum((previous.get(mainline) ?? []).map((r) => r.tapsPutIn));
    const tapsPutIn = sum(records.map((r) => r.tapsPutIn));
    const tappers = [
      ...new Set(records.filter((r) => r.tapsPutIn > 0).map((r) => r.employeeName)),
    ].sort();

    return {
      mainline,
      conductorSystem: extractConductorSystem(mainline),
      previousTaps,
      tapsPutIn,
      tapsRemoved: sum(records.map((r) => r.tapsRemoved)),
      tappers,
      percentOfPrevious:
        previousTaps > 0 && tapsPutIn > 0
          ? Math.round((tapsPutIn / previousTaps) * 1000) / 10
          : null,
      status: classifyTapProgress(previousTaps, tapsPutIn),
    };
  });

  mainlines.sort(
    (a, b) =>
      a.conductorSystem.localeCompare(b.conductorSystem) ||
      a.mainline.localeCompare(b.mainline),
  );

  const statusCounts: Partial<Record<TapStatus, number>> = {};
  for (const { status } of mainlines) {
    if (status !== '') statusCounts[status] = (statusCounts[status] ?? 0) + 1;
  }

  return { season, previousSeason: season - 1, mainlines, statusCounts };
}
