import type {
  Frontmatter,
  Metric,
  QualityScore,
  ScorerComponent,
  ScoringContext,
  Tier,
} from './types.js';

/**
 * Map an overall score to its letter grade
 */
export function tierFromScore(score: number): Tier {
  if (score >= 85) return 'A';
  if (score >= 70) return 'B';
  if (score >= 50) return 'C';
  if (score >= 30) return 'D';
  return 'F';
}

/**
 * Build a score from its category totals
 */
export function newQualityScore(
  structural: number,
  practices: number,
  composition: number,
  documentation: number,
  details: Metric[]
): QualityScore {
  const overall = structural + practices + composition + documentation;
  return {
    overall,
    tier: tierFromScore(overall),
    structural,
    practices,
    composition,
    documentation,
    details,
  };
}

/**
 * Count lines the way editors do: a trailing newline opens one more (empty) line
 */
export function lineCount(content: string): number {
  let count = 1;
  for (let i = 0; i < content.length; i++) {
    if (content.charCodeAt(i) === 10) count++;
  }
  return count;
}

/**
 * Full points when the check passed, zero otherwise
 */
export function points(passed: boolean, max: number): number {
  return passed ? max : 0;
}

/**
 * Create an immutable metric
 */
export function metric(fields: Metric): Metric {
  return Object.freeze({ ...fields });
}

/**
 * Shared aggregation used by every component variant.
 *
 * Runs the four category methods in order (structural, practices,
 * composition, documentation) and concatenates their metrics, so the
 * overall score always equals the sum of the detail points.
 */
export function computeCombinedScore(
  content: string,
  frontmatter: Frontmatter,
  body: string,
  component: ScorerComponent
): QualityScore {
  const ctx: ScoringContext = { content, lineCount: lineCount(content) };

  const structural = component.scoreStructural(frontmatter, body, ctx);
  const practices = component.scorePractices(frontmatter, body, ctx);
  const composition = component.scoreComposition(ctx);
  const documentation = component.scoreDocumentation(frontmatter, body, ctx);

  return newQualityScore(
    structural.points,
    practices.points,
    composition.points,
    documentation.points,
    [
      ...structural.details,
      ...practices.details,
      ...composition.details,
      ...documentation.details,
    ]
  );
}
