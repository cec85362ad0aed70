import { COMPONENT_LABELS } from './component-types.js';
import type { ComponentType, MetricCategory, QualityScore, Tier } from './types.js';

/**
 * One scored file in a report
 */
export interface ScoreReportEntry {
  file: string;
  type: ComponentType;
  score: QualityScore;
}

export interface ScoreSummary {
  count: number;
  /** Mean overall score, rounded; 0 for an empty report */
  average: number;
  tiers: Record<Tier, number>;
}

export interface SummaryOptions {
  verbose?: boolean;
}

const TIERS: readonly Tier[] = ['A', 'B', 'C', 'D', 'F'];

const CATEGORY_MAX: Record<MetricCategory, number> = {
  structural: 40,
  practices: 40,
  composition: 10,
  documentation: 10,
};

/**
 * Get tier color for display
 */
export function getTierColor(tier: Tier): 'green' | 'yellow' | 'orange' | 'red' {
  switch (tier) {
    case 'A':
    case 'B':
      return 'green';
    case 'C':
      return 'yellow';
    case 'D':
      return 'orange';
    case 'F':
      return 'red';
  }
}

/**
 * Get display label for tier
 */
export function getTierLabel(tier: Tier): string {
  switch (tier) {
    case 'A':
      return 'Excellent';
    case 'B':
      return 'Good';
    case 'C':
      return 'Fair';
    case 'D':
      return 'Poor';
    case 'F':
      return 'Failing';
  }
}

/**
 * Human-readable breakdown of one score
 */
export function formatScoreSummary(score: QualityScore, options: SummaryOptions = {}): string {
  const lines: string[] = [
    `Score: ${score.overall}/100 (${score.tier})`,
    `  Structural: ${score.structural}/${CATEGORY_MAX.structural}`,
    `  Practices: ${score.practices}/${CATEGORY_MAX.practices}`,
    `  Composition: ${score.composition}/${CATEGORY_MAX.composition}`,
    `  Documentation: ${score.documentation}/${CATEGORY_MAX.documentation}`,
  ];

  if (options.verbose) {
    for (const detail of score.details) {
      const mark = detail.passed ? '✓' : '✗';
      const note = detail.note ? ` (${detail.note})` : '';
      lines.push(`    [${mark}] ${detail.name}: ${detail.points}/${detail.maxPoints}${note}`);
    }
  }

  return lines.join('\n');
}

export function summarizeScores(entries: readonly ScoreReportEntry[]): ScoreSummary {
  const tiers: Record<Tier, number> = { A: 0, B: 0, C: 0, D: 0, F: 0 };
  let total = 0;

  for (const entry of entries) {
    tiers[entry.score.tier]++;
    total += entry.score.overall;
  }

  return {
    count: entries.length,
    average: entries.length === 0 ? 0 : Math.round(total / entries.length),
    tiers,
  };
}

export function formatMarkdownReport(entries: readonly ScoreReportEntry[]): string {
  const summary = summarizeScores(entries);
  const lines: string[] = [
    '# Quality Report',
    '',
    '| File | Type | Score | Tier |',
    '|------|------|-------|------|',
  ];

  for (const entry of entries) {
    lines.push(
      `| ${entry.file} | ${COMPONENT_LABELS[entry.type]} | ${entry.score.overall} | ${entry.score.tier} |`
    );
  }

  const distribution = TIERS.map((tier) => `${tier}: ${summary.tiers[tier]}`).join(', ');
  lines.push('', `Average: ${summary.average}/100 across ${summary.count} file(s)`, `Tiers: ${distribution}`);

  return lines.join('\n') + '\n';
}

export function formatJsonReport(entries: readonly ScoreReportEntry[]): string {
  return JSON.stringify({ results: entries, summary: summarizeScores(entries) }, null, 2);
}
