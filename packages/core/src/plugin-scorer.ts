import { computeCombinedScore } from './quality-score.js';
import { check, fieldLength, graded, scoreComposition, stringField, tally } from './primitives.js';
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

// Graded on the manifest's byte size rather than its line count
const PLUGIN_THRESHOLDS: CompositionThresholds = {
  excellent: 1000,
  excellentNote: 'Excellent: ≤1KB',
  good: 2000,
  goodNote: 'Good: ≤2KB',
  ok: 5000,
  okNote: 'OK: ≤5KB',
  overLimit: 10000,
  overLimitNote: 'Large: ≤10KB',
  fatNote: 'Too large: >10KB',
  metricName: 'File size',
};

const DESCRIPTION_BANDS: readonly GradeBand[] = [
  { min: 100, points: 5, note: 'Comprehensive' },
  { min: 50, points: 3, note: 'Adequate' },
  { min: 20, points: 1, note: 'Brief' },
];

const encoder = new TextEncoder();

function hasText(manifest: Frontmatter, key: string): boolean {
  return stringField(manifest, key).trim().length > 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Byte length of the manifest as stored on disk (UTF-8)
 */
export function byteSize(content: string): number {
  return encoder.encode(content).length;
}

/**
 * Scores plugin manifests (.claude-plugin/plugin.json). The frontmatter is
 * the decoded JSON document and the body is not used.
 */
export class PluginScorer implements Scorer, ScorerComponent {
  score(content: string, manifest: Frontmatter, body: string): QualityScore {
    return computeCombinedScore(content, manifest, body, this);
  }

  scoreStructural(manifest: Frontmatter): CategoryResult {
    const author = manifest.author;
    const hasAuthorName = isRecord(author) && hasText(author, 'name');

    return tally([
      check('structural', 'Has name', hasText(manifest, 'name'), 10),
      check('structural', 'Has description', hasText(manifest, 'description'), 10),
      check('structural', 'Has version', hasText(manifest, 'version'), 10),
      check('structural', 'Has author.name', hasAuthorName, 10),
    ]);
  }

  scorePractices(manifest: Frontmatter): CategoryResult {
    const keywords = manifest.keywords;

    return tally([
      check('practices', 'Has homepage', hasText(manifest, 'homepage'), 10),
      check('practices', 'Has repository', hasText(manifest, 'repository'), 10),
      check('practices', 'Has license', hasText(manifest, 'license'), 10),
      check('practices', 'Has keywords', Array.isArray(keywords) && keywords.length > 0, 10),
    ]);
  }

  scoreComposition(ctx: ScoringContext): CategoryResult {
    return scoreComposition(byteSize(ctx.content), PLUGIN_THRESHOLDS);
  }

  scoreDocumentation(manifest: Frontmatter): CategoryResult {
    return tally([
      graded(
        'documentation',
        'Description quality',
        fieldLength(manifest, 'description'),
        DESCRIPTION_BANDS,
        'Too short',
        50
      ),
      check('documentation', 'Has readme', hasText(manifest, 'readme'), 5),
    ]);
  }
}
