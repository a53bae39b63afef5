import { DASHBOARD_CONFIG } from '../config/dashboard.config';

export type JobCategory = 'tapping' | 'repair' | 'excluded' | 'uncategorized';

export type JobClassification =
  | { kind: 'excluded' | 'tapping' | 'repair'; phrase: string }
  | { kind: 'uncategorized' };

export interface JobCodePhrases {
  excluded: readonly string[];
  tapping: readonly string[];
  repair: readonly string[];
}

interface CompiledPhrase {
  phrase: string;
  pattern: RegExp;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a phrase into a case-insensitive pattern that must not touch a word
 * character on either side. Inner whitespace matches any run of whitespace; a
 * trailing plural "s" is allowed.
 */
function compilePhrase(phrase: string): CompiledPhrase {
  const body = phrase
    .trim()
    .split(/\s+/)
    .map(escapeRegExp)
    .join('\\s+');
  return { phrase, pattern: new RegExp(`(?<!\\w)${body}s?(?!\\w)`, 'i') };
}

/**
 * Job-code rule engine.
 *
 * Precedence is fixed: an exclusion phrase always wins, then tapping, then
 * repair. Text matching none of the lists is `uncategorized`.
 */
export class JobCodeClassifier {
  private readonly excluded: CompiledPhrase[];
  private readonly tapping: CompiledPhrase[];
  private readonly repair: CompiledPhrase[];

  constructor(phrases: JobCodePhrases = DASHBOARD_CONFIG.jobCodes) {
    this.excluded = phrases.excluded.map(compilePhrase);
    this.tapping = phrases.tapping.map(compilePhrase);
    this.repair = phrases.repair.map(compilePhrase);
  }

  classify(text: string | null | undefined): JobClassification {
    const value = (text ?? '').trim();
    if (value === '') {
      return { kind: 'uncategorized' };
    }

    const ordered: Array<['excluded' | 'tapping' | 'repair', CompiledPhrase[]]> = [
      ['excluded', this.excluded],
      ['tapping', this.tapping],
      ['repair', this.repair],
    ];

    for (const [kind, phrases] of ordered) {
      const hit = phrases.find(({ pattern }) => pattern.test(value));
      if (hit) {
        return { kind, phrase: hit.phrase };
      }
    }
    return { kind: 'uncategorized' };
  }

  category(text: string | null | undefined): JobCategory {
    return this.classify(text).kind;
  }
}

const defaultClassifier = new JobCodeClassifier();

export function classifyJobCode(text: string | null | undefined): JobClassification {
  return defaultClassifier.classify(text);
}

export function isTappingJob(text: string | null | undefined): boolean {
  return defaultClassifier.category(text) === 'tapping';
}

export function isRepairJob(text: string | null | undefined): boolean {
  return defaultClassifier.category(text) === 'repair';
}
