import { DASHBOARD_CONFIG } from '../config/dashboard.config';

export const UNKNOWN_CONDUCTOR = 'Unknown';
export const OTHER_SUGARBUSH = 'Other';

type SugarbushMap = Readonly<Record<string, readonly string[]>>;

/**
 * Known conductor prefixes, longest first so DMA wins over DM and RHAS over RH.
 * Ties are broken alphabetically to keep the order stable.
 */
function knownConductors(map: SugarbushMap): string[] {
  const known = new Set<string>();
  for (const conductors of Object.values(map)) {
    for (const conductor of conductors) {
      known.add(conductor.toUpperCase());
    }
  }
  return [...known].sort((a, b) => b.length - a.length || a.localeCompare(b));
}

/**
 * Conductor-system lookup for mainline and sensor names.
 *
 * The alphabetic lead of the name (up to 6 letters) is matched against the
 * configured conductors by longest prefix. Without a configured match the raw
 * lead (up to 4 letters) is the conductor system.
 */
export class ConductorResolver {
  private readonly conductors: string[];
  private readonly sugarbushByConductor = new Map<string, string>();

  constructor(private readonly map: SugarbushMap = DASHBOARD_CONFIG.sugarbushMap) {
    this.conductors = knownConductors(map);
    for (const [sugarbush, conductors] of Object.entries(map)) {
      for (const conductor of conductors) {
        this.sugarbushByConductor.set(conductor.toUpperCase(), sugarbush);
      }
    }
  }

  conductorSystem(name: string | null | undefined): string {
    const upper = (name ?? '').trim().toUpperCase();
    const lead = /^[A-Z]{1,6}/.exec(upper);
    if (!lead) {
      return UNKNOWN_CONDUCTOR;
    }

    const raw = lead[0];
    const known = this.conductors.find((conductor) => raw.startsWith(conductor));
    return known ?? raw.slice(0, 4);
  }

  sugarbush(name: string | null | undefined): string {
    const conductor = this.conductorSystem(name);
    return this.sugarbushByConductor.get(conductor) ?? OTHER_SUGARBUSH;
  }
}

const defaultResolver = new ConductorResolver();

export function extractConductorSystem(name: string | null | undefined): string {
  return defaultResolver.conductorSystem(name);
}

export function sugarbushFor(name: string | null | undefined): string {
  return defaultResolver.sugarbush(name);
}
