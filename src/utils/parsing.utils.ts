/**
 * Parsing utilities for command-line filter input.
 *
 * These helpers validate selectors before any data is loaded and report the
 * exact token that could not be parsed.
 */

import { ValidationException } from './exceptions';

const INTEGER_PATTERN = /^\d+$/;

function parseWeekToken(token: string, part: string): number {
  if (!INTEGER_PATTERN.test(token)) {
    throw new ValidationException(`Invalid week number: '${part}'`);
  }
  const week = parseInt(token, 10);
  if (week < 1) {
    throw new ValidationException(`Invalid week number: '${part}' (weeks start at 1)`);
  }
  return week;
}

/**
 * Parse a week selector into a sorted list of unique week numbers.
 *
 * Supports a single week ("11"), comma-separated weeks ("8,9,10"),
 * inclusive ranges ("8-10") and mixtures ("8,9,11-13").
 *
 * @returns Sorted week numbers, or undefined when the selector is blank
 * @throws ValidationException naming the offending token
 *
 * @example
 * parseWeekSpec('8,9,11-13'); // [8, 9, 11, 12, 13]
 */
export function parseWeekSpec(spec: string | undefined): number[] | undefined {
  if (spec === undefined || spec.trim() === '') {
    return undefined;
  }

  const weeks = new Set<number>();

  for (const rawPart of spec.split(',')) {
    const part = rawPart.trim();
    if (!part) continue;

    if (part.includes('-')) {
      const bounds = part.split('-');
      if (bounds.length !== 2) {
        throw new ValidationException(`Invalid week range format: '${part}'`);
      }
      const start = parseWeekToken(bounds[0].trim(), part);
      const end = parseWeekToken(bounds[1].trim(), part);
      if (end < start) {
        throw new ValidationException(`Invalid week range: '${part}' (end is before start)`);
      }
      for (let week = start; week <= end; week++) {
        weeks.add(week);
      }
    } else {
      weeks.add(parseWeekToken(part, part));
    }
  }

  if (weeks.size === 0) {
    return undefined;
  }

  return [...weeks].sort((a, b) => a - b);
}

/**
 * Parse comma-separated seasons ("2024,2025").
 *
 * @returns Sorted unique seasons, or undefined when the selector is blank
 * @throws ValidationException if a token is not a 4-digit year
 */
export function parseSeasonList(spec: string | undefined): number[] | undefined {
  if (spec === undefined || spec.trim() === '') {
    return undefined;
  }

  const seasons = new Set<number>();
  for (const rawPart of spec.split(',')) {
    const part = rawPart.trim();
    if (!part) continue;
    if (!/^\d{4}$/.test(part)) {
      throw new ValidationException(`Invalid season: '${part}'`);
    }
    seasons.add(parseInt(part, 10));
  }

  return seasons.size > 0 ? [...seasons].sort((a, b) => a - b) : undefined;
}

/**
 * Split a comma-separated list of names, trimming blanks away.
 */
export function parseNameList(spec: string | undefined): string[] {
  if (spec === undefined) {
    return [];
  }
  return spec
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

/**
 * Filename suffix describing an active week filter.
 *
 * @example
 * formatWeekSuffix([11]);        // '_week_11'
 * formatWeekSuffix([8, 9, 10]);  // '_week_8-10'
 * formatWeekSuffix([8, 9, 11]);  // '_week_8,9,11'
 */
export function formatWeekSuffix(weeks: readonly number[] | undefined): string {
  if (!weeks || weeks.length === 0) {
    return '';
  }
  if (weeks.length === 1) {
    return `_week_${weeks[0]}`;
  }

  const first = weeks[0];
  const last = weeks[weeks.length - 1];
  const consecutive = weeks.every((week, i) => week === first + i);
  return consecutive ? `_week_${first}-${last}` : `_week_${weeks.join(',')}`;
}
