export type SiteCode = 'NY' | 'VT' | 'UNKNOWN';

const SITE_ALIASES = new Map<string, SiteCode>([
  ['ny', 'NY'],
  ['new york', 'NY'],
  ['vt', 'VT'],
  ['vermont', 'VT'],
]);

/**
 * Normalize a free-text site cell to a site code.
 */
export function normalizeSite(value: string | null | undefined): SiteCode {
  const key = (value ?? '')
    .toLowerCase()
    .replace(/[^a-z\s]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
  return SITE_ALIASES.get(key) ?? 'UNKNOWN';
}
