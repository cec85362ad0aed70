// Types
export type {
  ComponentType,
  ComponentTypePattern,
  Frontmatter,
  MetricCategory,
  Tier,
  Metric,
  QualityScore,
  FieldSpec,
  SectionSpec,
  SectionFallback,
  CompositionThresholds,
  GradeBand,
  CategoryResult,
  ScoringContext,
  ScorerComponent,
  Scorer,
  ParseError,
  ParsedDocument,
  ScoredComponent,
} from './types.js';

// Score model & aggregation
export {
  tierFromScore,
  newQualityScore,
  computeCombinedScore,
  lineCount,
} from './quality-score.js';

// Scoring primitives
export {
  scoreRequiredFields,
  scoreSections,
  scoreSectionsWithFallback,
  scoreComposition,
  gradeByBands,
  hasField,
  stringField,
} from './primitives.js';

// Component scorers
export { AgentScorer } from './agent-scorer.js';
export { CommandScorer } from './command-scorer.js';
export { SkillScorer, referencedFiles } from './skill-scorer.js';
export { PluginScorer, byteSize } from './plugin-scorer.js';
export { OutputStyleScorer, hasMarkdownFormatting } from './output-style-scorer.js';
export {
  isThinRouter,
  isMethodologySkill,
  thinRouterIndicators,
  type ThinRouterIndicators,
} from './skill-classifier.js';
export { getScorer, scoreComponent } from './scorers.js';

// Parsing & type detection
export { parseDocument, parseManifest, parseComponent } from './parser.js';
export {
  COMPONENT_TYPES,
  COMPONENT_LABELS,
  COMPONENT_TYPE_PATTERNS,
  detectComponentType,
  isComponentType,
} from './component-types.js';

// Reporting
export {
  getTierColor,
  getTierLabel,
  formatScoreSummary,
  formatMarkdownReport,
  formatJsonReport,
  summarizeScores,
  type ScoreReportEntry,
  type ScoreSummary,
  type SummaryOptions,
} from './report.js';
