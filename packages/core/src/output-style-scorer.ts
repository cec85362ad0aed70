import { computeCombinedScore } from './quality-score.js';
import {
  check,
  fieldLength,
  graded,
  hasField,
  scoreComposition,
  stringField,
  tally,
} from './primitives.js';
import type {
  CategoryResult,
  CompositionThresholds,
  Frontmatter,
  GradeBand,
  QualityScore,
  Scorer,
  ScorerComponent,
  ScoringContext,
} from './types.js';

const OUTPUT_STYLE_THRESHOLDS: CompositionThresholds = {
  excellent: 50,
  excellentNote: 'Concise: <=50 lines',
  good: 100,
  goodNote: 'Good: <=100 lines',
  ok: 200,
  okNote: 'OK: <=200 lines',
  overLimit: 500,
  overLimitNote: 'Large: <=500 lines',
  fatNote: 'Too large: >500 lines',
  metricName: 'File size',
};

const DESCRIPTION_BANDS: readonly GradeBand[] = [
  { min: 100, points: 5, note: 'Comprehensive' },
  { min: 50, points: 3, note: 'Adequate' },
  { min: 1, points: 1, note: 'Brief' },
];

const SUBSTANTIAL_BODY_CHARS = 50;
const RICH_BODY_CHARS = 200;

function hasText(frontmatter: Frontmatter, key: string): boolean {
  return stringField(frontmatter, key).trim().length > 0;
}

/**
 * Note for the substantial-content check, by trimmed body length
 */
export function bodyLengthNote(length: number): string {
  if (length >= RICH_BODY_CHARS) return 'Rich content';
  if (length >= SUBSTANTIAL_BODY_CHARS) return 'Adequate content';
  if (length > 0) return 'Minimal content';
  return 'No content';
}

/**
 * Headings, list items or code fences anywhere in the body
 */
export function hasMarkdownFormatting(body: string): boolean {
  return body.includes('#') || body.includes('- ') || body.includes('```');
}

/**
 * Scores output style definitions (.claude/output-styles/*.md)
 */
export class OutputStyleScorer implements Scorer, ScorerComponent {
  score(content: string, frontmatter: Frontmatter, body: string): QualityScore {
    return computeCombinedScore(content, frontmatter, body, this);
  }

  scoreStructural(frontmatter: Frontmatter, _body: string, ctx: ScoringContext): CategoryResult {
    return tally([
      check('structural', 'Has frontmatter', ctx.content.trim().startsWith('---'), 10),
      check('structural', 'Has name', hasText(frontmatter, 'name'), 15),
      check('structural', 'Has description', hasText(frontmatter, 'description'), 15),
    ]);
  }

  scorePractices(frontmatter: Frontmatter, body: string): CategoryResult {
    const bodyLength = body.trim().length;

    return tally([
      check('practices', 'Has body content', bodyLength > 0, 20),
      // false is a deliberate setting and still counts
      check('practices', 'Has keep-coding-instructions', hasField(frontmatter, 'keep-coding-instructions'), 10),
      check(
        'practices',
        'Substantial body content',
        bodyLength >= SUBSTANTIAL_BODY_CHARS,
        10,
        bodyLengthNote(bodyLength)
      ),
    ]);
  }

  scoreComposition(ctx: ScoringContext): CategoryResult {
    return scoreComposition(ctx.lineCount, OUTPUT_STYLE_THRESHOLDS);
  }

  scoreDocumentation(frontmatter: Frontmatter, body: string): CategoryResult {
    return tally([
      graded(
        'documentation',
        'Description quality',
        fieldLength(frontmatter, 'description'),
        DESCRIPTION_BANDS,
        'Missing',
        50
      ),
      check('documentation', 'Uses markdown formatting', hasMarkdownFormatting(body), 5),
    ]);
  }
}
