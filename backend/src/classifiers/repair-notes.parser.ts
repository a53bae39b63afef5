export type CompletionStatus = 'Complete' | 'Not Complete';

export type RepairIssueType =
  | 'Tree Damage'
  | 'Spinseal Reweld'
  | 'Spinseal Broken'
  | 'Spinseal Issue'
  | 'Needs Stainless'
  | 'Monitor Antenna'
  | 'Broken Equipment'
  | 'General Repair';

export interface ParsedRepairNote {
  status: CompletionStatus | null;
  issues: RepairIssueType[];
  location: string | null;
}

/** Crew shorthand and misspellings seen in timesheet notes */
const SPINSEAL_SPELLINGS = ['SPINSEAL', 'SPENSEAL', 'SPIN SEAL', 'SPIN SL', 'SPN SL'];
const TREE_WORDS = ['TREE', 'CHAINSAW', 'CUT OFF'];
const REPAIR_NOTE_KEYWORDS = [
  'complete',
  'tree',
  'spinseal',
  'spenseal',
  'stainless',
  'broken',
  'reweld',
  'antenna',
  'repair',
  'fix',
  'need',
  'leak',
];

const containsAny = (text: string, words: readonly string[]): boolean =>
  words.some((word) => text.includes(word));

export function parseCompletionStatus(text: string): CompletionStatus | null {
  const upper = text.toUpperCase();
  if (upper.includes('NOT COMPLETE') || upper.includes('NOTCOMPLETE')) {
    return 'Not Complete';
  }
  if (upper.includes('COMPLETE')) {
    return 'Complete';
  }
  return null;
}

export function parseIssueTypes(text: string): RepairIssueType[] {
  const upper = text.toUpperCase();
  const issues: RepairIssueType[] = [];
  const mentionsSpinseal = containsAny(upper, SPINSEAL_SPELLINGS);

  if (containsAny(upper, TREE_WORDS)) {
    issues.push('Tree Damage');
  }
  if (mentionsSpinseal) {
    if (upper.includes('REWELD')) {
      issues.push('Spinseal Reweld');
    } else if (upper.includes('BROKEN')) {
      issues.push('Spinseal Broken');
    } else {
      issues.push('Spinseal Issue');
    }
  }
  if (upper.includes('STAINLESS')) {
    issues.push('Needs Stainless');
  }
  if (upper.includes('ANTENNA')) {
    issues.push('Monitor Antenna');
  }
  if (upper.includes('BROKEN') && !mentionsSpinseal) {
    issues.push('Broken Equipment');
  }

  return issues.length > 0 ? issues : ['General Repair'];
}

/**
 * Location hints, comma-joined in a fixed order ("Middle, Monitor").
 */
export function parseLocation(text: string): string | null {
  const upper = text.toUpperCase();
  const locations: string[] = [];

  if (containsAny(upper, ['@MID', '@ MID', 'MIDDLE'])) {
    locations.push('Middle');
  }
  if (containsAny(upper, ['@BTM', '@ BTM', 'BOTTOM'])) {
    locations.push('Bottom');
  }
  // "top need stainless" is not a position
  if (!upper.includes('STAINLESS') && containsAny(upper, ['AT TOP', 'THE TOP', '@TOP'])) {
    locations.push('Top');
  }
  if (upper.includes('MONITOR')) locations.push('Monitor');
  if (upper.includes('CONDUCTOR')) locations.push('Conductor');
  if (upper.includes('MAINLINE')) locations.push('Mainline');
  if (containsAny(upper, ['CLOSE TO END', 'AT THE END'])) {
    locations.push('Near End');
  }
  if (upper.includes('BEGINNING')) {
    locations.push('Beginning');
  }

  return locations.length > 0 ? locations.join(', ') : null;
}

export function isRepairNote(text: string): boolean {
  const lower = text.toLowerCase();
  return containsAny(lower, REPAIR_NOTE_KEYWORDS);
}

/**
 * Parse the combined repairs-needed and notes text of a timesheet row.
 * Returns null when the text carries no repair information.
 */
export function parseRepairNote(text: string): ParsedRepairNote | null {
  const combined = text.trim();
  if (combined === '' || !isRepairNote(combined)) {
    return null;
  }
  return {
    status: parseCompletionStatus(combined),
    issues: parseIssueTypes(combined),
    location: parseLocation(combined),
  };
}
