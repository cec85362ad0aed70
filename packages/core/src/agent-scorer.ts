import { computeCombinedScore } from './quality-score.js';
import {
  LONG_DESCRIPTION_BANDS,
  check,
  combine,
  countOccurrences,
  fieldLength,
  graded,
  matches,
  matchesAny,
  scoreComposition,
  scoreRequiredFields,
  scoreSections,
  stringField,
  tally,
} from './primitives.js';
import type {
  CategoryResult,
  CompositionThresholds,
  FieldSpec,
  Frontmatter,
  GradeBand,
  QualityScore,
  Scorer,
  ScorerComponent,
  ScoringContext,
  SectionSpec,
} from './types.js';

const AGENT_FIELDS: readonly FieldSpec[] = [
  { name: 'name', points: 5 },
  { name: 'description', points: 5 },
  { name: 'model', points: 5 },
  { name: 'tools', points: 5 },
];

const AGENT_SECTIONS: readonly SectionSpec[] = [
  { pattern: /## Foundation/i, name: 'Foundation section', points: 5 },
  { pattern: /### Phase/i, name: 'Phase workflow', points: 4 },
  { pattern: /## Success Criteria/i, name: 'Success Criteria', points: 3 },
  { pattern: /## Edge Cases/i, name: 'Edge Cases', points: 3 },
];

// Skill: foo, **Skill**: foo, Skill(foo), or a "Skills:" list
const SKILL_REFERENCE_PATTERNS: readonly RegExp[] = [
  /Skill:\s*\S+/i,
  /\*\*Skill\*\*:\s*\S+/i,
  /Skill\(\s*["']?[a-z0-9-]+/i,
  /Skills:\s*\n/i,
];

const ANTI_PATTERNS = /## Anti-Patterns/i;
const EXPECTED_OUTPUT = /## Expected Output/i;
const HARD_GATE = /HARD GATE/i;

// 200 line target, OK band carries the 10% tolerance
const AGENT_THRESHOLDS: CompositionThresholds = {
  excellent: 120,
  excellentNote: 'Excellent: ≤120 lines',
  good: 180,
  goodNote: 'Good: ≤180 lines',
  ok: 220,
  okNote: 'OK: ≤220 lines (200±10%)',
  overLimit: 275,
  overLimitNote: 'Over limit: >220 lines',
  fatNote: 'Fat agent: >275 lines',
};

const HEADING_BANDS: readonly GradeBand[] = [
  { min: 6, points: 5, note: 'Well-structured' },
  { min: 4, points: 3, note: 'Adequate structure' },
  { min: 2, points: 1, note: 'Minimal structure' },
];

/**
 * Scores agent definitions (.claude/agents/*.md).
 * Structural 35, practices 35, composition 10, documentation 10.
 */
export class AgentScorer implements Scorer, ScorerComponent {
  score(content: string, frontmatter: Frontmatter, body: string): QualityScore {
    return computeCombinedScore(content, frontmatter, body, this);
  }

  scoreStructural(frontmatter: Frontmatter, body: string): CategoryResult {
    return combine(scoreRequiredFields(frontmatter, AGENT_FIELDS), scoreSections(body, AGENT_SECTIONS));
  }

  scorePractices(frontmatter: Frontmatter, body: string): CategoryResult {
    const description = stringField(frontmatter, 'description');
    const trimmed = description.trim();
    const thirdPerson = trimmed.length > 0 && !trimmed.startsWith('I ');
    const lower = description.toLowerCase();
    const hasTriggers =
      description.toUpperCase().includes('PROACTIVELY') ||
      lower.includes('use when') ||
      lower.includes('when user');

    return tally([
      check('practices', 'Skill: reference', matchesAny(body, SKILL_REFERENCE_PATTERNS), 10),
      check('practices', 'Anti-Patterns section', matches(body, ANTI_PATTERNS), 5),
      check('practices', 'Expected Output section', matches(body, EXPECTED_OUTPUT), 5),
      check('practices', 'HARD GATE markers', matches(body, HARD_GATE), 5),
      check('practices', 'Third-person description', thirdPerson, 5),
      check('practices', 'WHEN triggers in description', hasTriggers, 5),
    ]);
  }

  scoreComposition(ctx: ScoringContext): CategoryResult {
    return scoreComposition(ctx.lineCount, AGENT_THRESHOLDS);
  }

  scoreDocumentation(frontmatter: Frontmatter, body: string): CategoryResult {
    // "### " headings contain "## " and count too
    const headings = countOccurrences(body, '## ');

    return tally([
      graded(
        'documentation',
        'Description quality',
        fieldLength(frontmatter, 'description'),
        LONG_DESCRIPTION_BANDS,
        'Missing',
        100
      ),
      graded('documentation', 'Section structure', headings, HEADING_BANDS, 'Poor structure', 4),
    ]);
  }
}
