/**
 * Component kinds the scorer knows how to grade
 */
export type ComponentType = 'agent' | 'command' | 'skill' | 'plugin' | 'output-style';

/**
 * Decoded metadata block: YAML frontmatter, or the whole JSON manifest for plugins
 */
export type Frontmatter = Record<string, unknown>;

/**
 * Score categories, in the order their metrics are emitted
 */
export type MetricCategory = 'structural' | 'practices' | 'composition' | 'documentation';

/**
 * Letter grade derived from the overall score
 */
export type Tier = 'A' | 'B' | 'C' | 'D' | 'F';

/**
 * A single graded check
 */
export interface Metric {
  readonly category: MetricCategory;
  /** Human-readable check label, e.g. "Has description" */
  readonly name: string;
  readonly points: number;
  readonly maxPoints: number;
  readonly passed: boolean;
  /** Graded label such as "Comprehensive" */
  readonly note?: string;
}

/**
 * Overall quality score for one component file
 */
export interface QualityScore {
  /** 0-100, always the sum of the four categories */
  overall: number;
  tier: Tier;
  /** 0-40 */
  structural: number;
  /** 0-40 */
  practices: number;
  /** 0-10 */
  composition: number;
  /** 0-10 */
  documentation: number;
  details: Metric[];
}

/**
 * Required frontmatter key rule
 */
export interface FieldSpec {
  name: string;
  points: number;
}

/**
 * Required body pattern rule
 */
export interface SectionSpec {
  pattern: RegExp;
  name: string;
  points: number;
}

/**
 * Alternate check consulted when a section's primary pattern does not match
 */
export type SectionFallback = (body: string, sectionName: string) => boolean;

/**
 * Size breakpoints for the 10/8/6/3/0 composition ladder.
 * A value at or below a breakpoint earns that band's points.
 */
export interface CompositionThresholds {
  excellent: number;
  excellentNote: string;
  good: number;
  goodNote: string;
  ok: number;
  okNote: string;
  overLimit: number;
  overLimitNote: string;
  fatNote: string;
  /** Defaults to "Line count" */
  metricName?: string;
}

/**
 * One rung of a graded ladder (description length, heading count, ...)
 */
export interface GradeBand {
  /** Lower bound; a value must be >= min to land in the band */
  min: number;
  points: number;
  note: string;
}

/**
 * Points and metrics produced by one category method
 */
export interface CategoryResult {
  points: number;
  details: Metric[];
}

/**
 * Document-wide facts computed once per scoring call
 */
export interface ScoringContext {
  /** Raw file content, metadata block included */
  content: string;
  lineCount: number;
}

/**
 * Category methods a component variant implements.
 * The shared combiner calls them in category order.
 */
export interface ScorerComponent {
  scoreStructural(frontmatter: Frontmatter, body: string, ctx: ScoringContext): CategoryResult;
  scorePractices(frontmatter: Frontmatter, body: string, ctx: ScoringContext): CategoryResult;
  scoreComposition(ctx: ScoringContext): CategoryResult;
  scoreDocumentation(frontmatter: Frontmatter, body: string, ctx: ScoringContext): CategoryResult;
}

/**
 * Public entry point of every variant
 */
export interface Scorer {
  score(content: string, frontmatter: Frontmatter, body: string): QualityScore;
}

/**
 * Problem found while splitting a file into metadata and body
 */
export interface ParseError {
  code: 'INVALID_FRONTMATTER' | 'INVALID_JSON';
  message: string;
}

/**
 * File content split into its metadata block and body
 */
export interface ParsedDocument {
  frontmatter: Frontmatter;
  body: string;
  errors: ParseError[];
}

/**
 * Parsed and scored component
 */
export interface ScoredComponent {
  type: ComponentType;
  score: QualityScore;
  parseErrors: ParseError[];
}

/**
 * Glob pattern used to infer a component type from its path
 */
export interface ComponentTypePattern {
  pattern: string;
  type: ComponentType;
}
