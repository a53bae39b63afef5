import { BadRequestException } from '@nestjs/common';

interface NumberParamOptions {
  min?: number;
  max?: number;
  integer?: boolean;
}

/**
 * Parse an optional numeric query parameter.
 *
 * @throws BadRequestException when present but not a number in range
 */
export function parseNumberParam(
  name: string,
  value: string | undefined,
  fallback: number,
  { min = -Infinity, max = Infinity, integer = false }: NumberParamOptions = {},
): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || (integer && !Number.isInteger(parsed))) {
    throw new BadRequestException(
      `Invalid ${name}: ${value} (expected ${integer ? 'an integer' : 'a number'})`,
    );
  }
  if (parsed < min || parsed > max) {
    throw new BadRequestException(
      `Invalid ${name}: ${value} (expected ${min} to ${max})`,
    );
  }
  return parsed;
}

/**
 * Parse an optional query parameter restricted to a fixed set of values.
 */
export function parseChoiceParam<T extends string>(
  name: string,
  value: string | undefined,
  choices: readonly T[],
  fallback: T,
): T {
  if (value === undefined || value === '') {
    return fallback;
  }
  const choice = choices.find((c) => c === value);
  if (choice === undefined) {
    throw new BadRequestException(
      `Invalid ${name}: ${value} (expected one of ${choices.join(', ')})`,
    );
  }
  return choice;
}
