import { metric, points } from './quality-score.js';
import type {
  CategoryResult,
  CompositionThresholds,
  FieldSpec,
  Frontmatter,
  GradeBand,
  Metric,
  SectionFallback,
  SectionSpec,
} from './types.js';

/**
 * A key counts as present when it holds a value other than null,
 * undefined or a blank string.
 */
export function hasField(frontmatter: Frontmatter, key: string): boolean {
  const value = frontmatter[key];
  if (value === undefined || value === null) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  return true;
}

/**
 * String value of a key; any other type reads as empty
 */
export function stringField(frontmatter: Frontmatter, key: string): string {
  const value = frontmatter[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Test a pattern against text. `search` ignores `lastIndex`, so shared
 * patterns stay safe to reuse even if one carries the global flag.
 */
export function matches(text: string, pattern: RegExp): boolean {
  return text.search(pattern) !== -1;
}

export function matchesAny(text: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((pattern) => matches(text, pattern));
}

/**
 * Award each field's points when the key is present
 */
export function scoreRequiredFields(
  frontmatter: Frontmatter,
  specs: readonly FieldSpec[]
): CategoryResult {
  let total = 0;
  const details: Metric[] = [];

  for (const field of specs) {
    const present = hasField(frontmatter, field.name);
    total += points(present, field.points);
    details.push(
      metric({
        category: 'structural',
        name: `Has ${field.name}`,
        points: points(present, field.points),
        maxPoints: field.points,
        passed: present,
      })
    );
  }

  return { points: total, details };
}

/**
 * Award each section's points when its pattern matches the body
 */
export function scoreSections(body: string, specs: readonly SectionSpec[]): CategoryResult {
  return scoreSectionsWithFallback(body, specs);
}

/**
 * Same as scoreSections, but a failed pattern gets a second chance through
 * `fallback`, which can accept an equivalent phrasing of the section.
 */
export function scoreSectionsWithFallback(
  body: string,
  specs: readonly SectionSpec[],
  fallback?: SectionFallback
): CategoryResult {
  let total = 0;
  const details: Metric[] = [];

  for (const section of specs) {
    let found = matches(body, section.pattern);
    if (!found && fallback) {
      found = fallback(body, section.name);
    }
    total += points(found, section.points);
    details.push(
      metric({
        category: 'structural',
        name: section.name,
        points: points(found, section.points),
        maxPoints: section.points,
        passed: found,
      })
    );
  }

  return { points: total, details };
}

/**
 * Grade a size (lines or bytes) on the 10/8/6/3/0 ladder
 */
export function scoreComposition(size: number, thresholds: CompositionThresholds): CategoryResult {
  let earned: number;
  let note: string;

  if (size <= thresholds.excellent) {
    earned = 10;
    note = thresholds.excellentNote;
  } else if (size <= thresholds.good) {
    earned = 8;
    note = thresholds.goodNote;
  } else if (size <= thresholds.ok) {
    earned = 6;
    note = thresholds.okNote;
  } else if (size <= thresholds.overLimit) {
    earned = 3;
    note = thresholds.overLimitNote;
  } else {
    earned = 0;
    note = thresholds.fatNote;
  }

  return {
    points: earned,
    details: [
      metric({
        category: 'composition',
        name: thresholds.metricName ?? 'Line count',
        points: earned,
        maxPoints: 10,
        passed: size <= thresholds.ok,
        note,
      }),
    ],
  };
}

/**
 * Pick the first band (highest first) whose minimum the value reaches
 */
export function gradeByBands(
  value: number,
  bands: readonly GradeBand[],
  fallbackNote: string
): { points: number; note: string } {
  for (const band of bands) {
    if (value >= band.min) {
      return { points: band.points, note: band.note };
    }
  }
  return { points: 0, note: fallbackNote };
}

/**
 * Length of a string field, 0 when missing or of another type
 */
export function fieldLength(frontmatter: Frontmatter, key: string): number {
  return stringField(frontmatter, key).length;
}

/**
 * Non-overlapping occurrences of a literal substring
 */
export function countOccurrences(text: string, needle: string): number {
  if (needle.length === 0) return 0;
  let count = 0;
  let index = text.indexOf(needle);
  while (index !== -1) {
    count++;
    index = text.indexOf(needle, index + needle.length);
  }
  return count;
}

/**
 * Pass/fail metric worth `maxPoints` when it passes
 */
export function check(
  category: Metric['category'],
  name: string,
  passed: boolean,
  maxPoints: number,
  note?: string
): Metric {
  return metric({
    category,
    name,
    points: points(passed, maxPoints),
    maxPoints,
    passed,
    ...(note === undefined ? {} : { note }),
  });
}

/**
 * Total a category's metrics
 */
export function tally(details: Metric[]): CategoryResult {
  return {
    points: details.reduce((sum, detail) => sum + detail.points, 0),
    details,
  };
}

/**
 * Merge category results, keeping metric order
 */
export function combine(...results: CategoryResult[]): CategoryResult {
  return tally(results.flatMap((result) => result.details));
}

/**
 * Metric graded on a band ladder. `passAt` is the value from which the
 * check counts as passed.
 */
export function graded(
  category: Metric['category'],
  name: string,
  value: number,
  bands: readonly GradeBand[],
  fallbackNote: string,
  passAt: number
): Metric {
  const grade = gradeByBands(value, bands, fallbackNote);
  const maxPoints = bands.reduce((max, band) => Math.max(max, band.points), 0);
  return metric({
    category,
    name,
    points: grade.points,
    maxPoints,
    passed: value >= passAt,
    note: grade.note,
  });
}

/** Description ladder shared by agents and skills */
export const LONG_DESCRIPTION_BANDS: readonly GradeBand[] = [
  { min: 200, points: 5, note: 'Comprehensive' },
  { min: 100, points: 3, note: 'Adequate' },
  { min: 1, points: 1, note: 'Brief' },
];
