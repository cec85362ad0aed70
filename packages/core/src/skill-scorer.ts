import { computeCombinedScore, lineCount } from './quality-score.js';
import {
  LONG_DESCRIPTION_BANDS,
  check,
  combine,
  countOccurrences,
  fieldLength,
  graded,
  matches,
  scoreComposition,
  scoreRequiredFields,
  scoreSectionsWithFallback,
  tally,
} from './primitives.js';
import { DEGENERALIZATION, isMethodologySkill, isThinRouter } from './skill-classifier.js';
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
  SectionFallback,
  SectionSpec,
} from './types.js';

const SKILL_FIELDS: readonly FieldSpec[] = [
  { name: 'name', points: 10 },
  { name: 'description', points: 10 },
];

const ANTI_PATTERNS_SECTION = 'Anti-Patterns section';
const ANTI_PATTERNS = /(## Anti-Patterns?|### Anti-Patterns?|\| Anti-Pattern)/i;

const METHODOLOGY_SECTIONS: readonly SectionSpec[] = [
  { pattern: /## Quick Reference/i, name: 'Quick Reference', points: 8 },
  { pattern: /## Workflow/i, name: 'Workflow section', points: 6 },
  { pattern: ANTI_PATTERNS, name: ANTI_PATTERNS_SECTION, points: 4 },
  { pattern: /## Success Criteria/i, name: 'Success Criteria', points: 2 },
];

// Pattern libraries: no success criteria expected, quick reference weighs more
const REFERENCE_SECTIONS: readonly SectionSpec[] = [
  { pattern: /## Quick Reference/i, name: 'Quick Reference', points: 10 },
  { pattern: /(## Patterns?|## Templates?|## Examples?)/i, name: 'Pattern/Template section', points: 6 },
  { pattern: ANTI_PATTERNS, name: ANTI_PATTERNS_SECTION, points: 4 },
];

/** "## Best Practices" with a "### Don't" subsection stands in for anti-patterns */
const antiPatternsFallback: SectionFallback = (body, sectionName) =>
  sectionName === ANTI_PATTERNS_SECTION &&
  body.includes('## Best Practices') &&
  body.toLowerCase().includes("### don't");

const SEMANTIC_ROUTING_TABLE = /\|.*User Question.*\|.*Action.*\|/;
const PHASE_HEADING = /### Phase \d/i;
const ANTI_PATTERN_TABLE = /\|.*Anti-Pattern.*\|.*Problem.*\|.*Fix.*\|/;
const HARD_GATE = /HARD GATE/i;
const REFERENCE_FILE = /references\/\w+\.md/;
const SCORING_FORMULA = /(score\s*=|scoring formula)/i;

const ROUTING_TABLE_ROW = /^\s*\|.*references\//m;
const REFERENCE_PATHS = /references\/[\w-]+(?:\.[\w-]+)*/g;
const DECISION_TABLE_HEADER =
  /^\s*\|\s*(User Question|Intent|When|If|Scenario|Situation|Need|Task)\s*\|/im;
const READ_REFERENCE = /Read\(references\//;
const RELATED_SKILLS = /(## Related Skills|See also:|Related:)/i;
const BRIEF_ANTI_PATTERNS = /(#{2,3} Anti-Patterns?|\| Anti-Pattern)/i;
const BRIEF_SUCCESS_CRITERIA = /(## Success Criteria|- \[ \])/i;

// 500 line target, OK band carries the 10% tolerance
const SKILL_THRESHOLDS: CompositionThresholds = {
  excellent: 250,
  excellentNote: 'Excellent: ≤250 lines',
  good: 400,
  goodNote: 'Good: ≤400 lines',
  ok: 550,
  okNote: 'OK: ≤550 lines (500±10%)',
  overLimit: 660,
  overLimitNote: 'Over limit: >550 lines',
  fatNote: 'Fat skill: >660 lines',
};

const CODE_FENCE_BANDS: readonly GradeBand[] = [
  { min: 6, points: 5, note: 'Rich examples' },
  { min: 3, points: 3, note: 'Adequate examples' },
  { min: 1, points: 1, note: 'Few examples' },
];

/**
 * Distinct files referenced under references/
 */
export function referencedFiles(body: string): string[] {
  return [...new Set(body.match(REFERENCE_PATHS) ?? [])];
}

/**
 * Composition and documentation are the same whichever strategy applies
 */
abstract class SkillStrategy implements ScorerComponent {
  abstract scoreStructural(frontmatter: Frontmatter, body: string, ctx: ScoringContext): CategoryResult;
  abstract scorePractices(frontmatter: Frontmatter, body: string, ctx: ScoringContext): CategoryResult;

  scoreComposition(ctx: ScoringContext): CategoryResult {
    return scoreComposition(ctx.lineCount, SKILL_THRESHOLDS);
  }

  scoreDocumentation(frontmatter: Frontmatter, body: string): CategoryResult {
    return tally([
      graded(
        'documentation',
        'Description quality',
        fieldLength(frontmatter, 'description'),
        LONG_DESCRIPTION_BANDS,
        'Missing',
        100
      ),
      // Counts fence markers, so one block contributes two
      graded('documentation', 'Code examples', countOccurrences(body, '```'), CODE_FENCE_BANDS, 'No examples', 3),
    ]);
  }
}

/**
 * Skills that carry their methodology or pattern library inline
 */
class StandardSkillStrategy extends SkillStrategy {
  scoreStructural(frontmatter: Frontmatter, body: string): CategoryResult {
    const sections = isMethodologySkill(body) ? METHODOLOGY_SECTIONS : REFERENCE_SECTIONS;
    return combine(
      scoreRequiredFields(frontmatter, SKILL_FIELDS),
      scoreSectionsWithFallback(body, sections, antiPatternsFallback)
    );
  }

  scorePractices(_frontmatter: Frontmatter, body: string): CategoryResult {
    return tally([
      check('practices', 'Semantic routing table', matches(body, SEMANTIC_ROUTING_TABLE), 10),
      check('practices', 'Phase-based workflow', matches(body, PHASE_HEADING), 8),
      check('practices', 'Anti-patterns table format', matches(body, ANTI_PATTERN_TABLE), 6),
      check('practices', 'HARD GATE markers', matches(body, HARD_GATE), 4),
      check('practices', 'Success criteria checkboxes', body.includes('- [ ]'), 4),
      check('practices', 'References to references/', matches(body, REFERENCE_FILE), 4),
      check('practices', 'Scoring formula', matches(body, SCORING_FORMULA), 4),
    ]);
  }
}

/**
 * Skills that dispatch to reference files. Same 20/40 budgets as the
 * standard path so scores compare across skill kinds.
 */
class ThinRouterSkillStrategy extends SkillStrategy {
  scoreStructural(frontmatter: Frontmatter, body: string): CategoryResult {
    const files = referencedFiles(body);

    return combine(
      scoreRequiredFields(frontmatter, SKILL_FIELDS),
      tally([
        check('structural', 'Routing table to references', matches(body, ROUTING_TABLE_ROW), 10),
        check(
          'structural',
          'Reference file mentions',
          files.length >= 2,
          5,
          `${files.length} reference ${files.length === 1 ? 'file' : 'files'}`
        ),
        check('structural', 'Decision/intent table', matches(body, DECISION_TABLE_HEADER), 5),
      ])
    );
  }

  scorePractices(_frontmatter: Frontmatter, body: string): CategoryResult {
    return tally([
      check('practices', 'Reference routing pattern', matches(body, READ_REFERENCE), 15),
      check('practices', 'Related skills / cross-links', matches(body, RELATED_SKILLS), 10),
      check('practices', 'Degeneralization notes', matches(body, DEGENERALIZATION), 5),
      check('practices', ANTI_PATTERNS_SECTION, matches(body, BRIEF_ANTI_PATTERNS), 5),
      check('practices', 'Success criteria', matches(body, BRIEF_SUCCESS_CRITERIA), 5),
    ]);
  }
}

const standardStrategy = new StandardSkillStrategy();
const thinRouterStrategy = new ThinRouterSkillStrategy();

/**
 * Scores skill definitions (SKILL.md). The body is classified first and the
 * thin-router strategy replaces structural and practices rules when it applies.
 */
export class SkillScorer implements Scorer {
  score(content: string, frontmatter: Frontmatter, body: string): QualityScore {
    const strategy = isThinRouter(body, lineCount(content)) ? thinRouterStrategy : standardStrategy;
    return computeCombinedScore(content, frontmatter, body, strategy);
  }
}
