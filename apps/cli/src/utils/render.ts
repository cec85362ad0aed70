import chalk from 'chalk';
import {
  getTierColor,
  getTierLabel,
  summarizeScores,
  tierFromScore,
  type ScoreReportEntry,
  type Tier,
} from 'docscore-core';

const TIERS: readonly Tier[] = ['A', 'B', 'C', 'D', 'F'];

/**
 * Color text by tier
 */
export function colorByTier(tier: Tier, text: string): string {
  switch (getTierColor(tier)) {
    case 'green':
      return chalk.green(text);
    case 'yellow':
      return chalk.yellow(text);
    case 'orange':
      return chalk.hex('#FF8C00')(text);
    case 'red':
      return chalk.red(text);
  }
}

/**
 * One line per scored file: `<tier> <overall> <file>`
 */
export function formatResultLine(entry: ScoreReportEntry): string {
  return `${entry.score.tier} ${entry.score.overall} ${entry.file}`;
}

export function formatSummaryLines(entries: readonly ScoreReportEntry[]): string[] {
  const summary = summarizeScores(entries);
  const distribution = TIERS.map((tier) => `${tier}: ${summary.tiers[tier]}`).join(', ');
  const label = getTierLabel(tierFromScore(summary.average));
  return [
    `Scored ${summary.count} file(s), average ${summary.average}/100 (${label})`,
    `Tiers: ${distribution}`,
  ];
}

/**
 * Uncolored console report, used when it is written to a file
 */
export function formatConsoleReport(entries: readonly ScoreReportEntry[]): string {
  return [...entries.map(formatResultLine), '', ...formatSummaryLines(entries)].join('\n') + '\n';
}
