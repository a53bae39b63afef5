import { DASHBOARD_CONFIG } from '../config/dashboard.config';
import { daysBetween } from '../common/date-utils';
import { round } from '../common/number-utils';
import { MainlineSummary } from './mainline-summary';

/** Days-since-activity stand-in for a line nobody has worked */
export const NEVER_WORKED_DAYS = 999;

export interface ProblemArea extends MainlineSummary {
  daysSinceActivity: number;
  urgencyScore: number;
}

/**
 * Mainlines averaging below Fair, most urgent first.
 * Urgency = (Fair - average) x 10 + days since the line was last worked.
 */
export function problemAreas(
  summaries: readonly MainlineSummary[],
  now: Date,
): ProblemArea[] {
  const fair = DASHBOARD_CONFIG.vacuum.fair;

  return summaries
    .filter((summary) => summary.averageVacuum < fair)
    .map((summary) => {
      const daysSinceActivity = summary.lastActivity
        ? daysBetween(summary.lastActivity, now)
        : NEVER_WORKED_DAYS;
      return {
        ...summary,
        daysSinceActivity,
        urgencyScore: round((fair - summary.averageVacuum) * 10 + daysSinceActivity),
      };
    })
    .sort((a, b) => b.urgencyScore - a.urgencyScore);
}
