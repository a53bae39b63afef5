import { z } from 'zod';

export interface SiteSourceReference {
  site: string;
  reference: string;
}

/**
 * Parse `NY=https://...;VT=./data/vt.xlsx` into site/reference pairs.
 * Entries without a site prefix are assigned UNKNOWN.
 */
export function parseSiteSources(raw: string): SiteSourceReference[] {
  return raw
    .split(';')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const match = /^([A-Za-z]{2,8})=(.+)$/.exec(entry);
      if (!match) {
        return { site: 'UNKNOWN', reference: entry };
      }
      return { site: match[1].toUpperCase(), reference: match[2].trim() };
    });
}

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  CORS_ORIGIN: z.string().default('http://localhost:5173'),
  VACUUM_SOURCES: z.string().default(''),
  PERSONNEL_SOURCE: z.string().default(''),
  REPAIRS_SOURCE: z.string().default(''),
  APPROVALS_TAB: z.string().min(1).default('approved_personnel'),
  CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(300),
  WEATHER_API_URL: z
    .string()
    .url()
    .default('https://api.open-meteo.com/v1/forecast'),
  DEMO_DATE: z.string().optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * `ConfigModule.forRoot({ validate })` hook.
 * Throws on invalid values so a misconfigured deployment never starts.
 */
export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = EnvSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}
