import { computeCombinedScore } from './quality-score.js';
import {
  check,
  combine,
  countOccurrences,
  fieldLength,
  graded,
  matches,
  scoreComposition,
  scoreRequiredFields,
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
} from './types.js';

const COMMAND_FIELDS: readonly FieldSpec[] = [
  { name: 'allowed-tools', points: 10 },
  { name: 'description', points: 10 },
  { name: 'argument-hint', points: 10 },
];

const TASK_DELEGATION = /Task\([^)]+\)/;
const SUCCESS_CRITERIA = /Success criteria|^\s*- \[ \]/im;
const FLAGS = /## Flags|--\w+/i;

// Commands should stay thin: 50 line target
const COMMAND_THRESHOLDS: CompositionThresholds = {
  excellent: 30,
  excellentNote: 'Excellent: ≤30 lines',
  good: 45,
  goodNote: 'Good: ≤45 lines',
  ok: 55,
  okNote: 'OK: ≤55 lines (50±10%)',
  overLimit: 65,
  overLimitNote: 'Over limit: >55 lines',
  fatNote: 'Fat command: >65 lines',
};

const DESCRIPTION_BANDS: readonly GradeBand[] = [
  { min: 50, points: 5, note: 'Clear' },
  { min: 20, points: 3, note: 'Brief' },
  { min: 1, points: 1, note: 'Minimal' },
];

/**
 * Scores slash-command definitions (.claude/commands/*.md)
 */
export class CommandScorer implements Scorer, ScorerComponent {
  score(content: string, frontmatter: Frontmatter, body: string): QualityScore {
    return computeCombinedScore(content, frontmatter, body, this);
  }

  scoreStructural(frontmatter: Frontmatter, body: string): CategoryResult {
    return combine(
      scoreRequiredFields(frontmatter, COMMAND_FIELDS),
      tally([check('structural', 'Task() delegation', matches(body, TASK_DELEGATION), 10)])
    );
  }

  scorePractices(_frontmatter: Frontmatter, body: string): CategoryResult {
    const taskCalls = countOccurrences(body, 'Task(');

    return tally([
      check('practices', 'Success criteria', matches(body, SUCCESS_CRITERIA), 15),
      check(
        'practices',
        'Task delegation',
        taskCalls >= 1,
        15,
        `${taskCalls} Task() ${taskCalls === 1 ? 'call' : 'calls'}`
      ),
      check('practices', 'Flags documented', matches(body, FLAGS), 10),
    ]);
  }

  scoreComposition(ctx: ScoringContext): CategoryResult {
    return scoreComposition(ctx.lineCount, COMMAND_THRESHOLDS);
  }

  scoreDocumentation(frontmatter: Frontmatter, body: string): CategoryResult {
    return tally([
      graded(
        'documentation',
        'Description quality',
        fieldLength(frontmatter, 'description'),
        DESCRIPTION_BANDS,
        'Missing',
        20
      ),
      check('documentation', 'Code examples', body.includes('```'), 5),
    ]);
  }
}
