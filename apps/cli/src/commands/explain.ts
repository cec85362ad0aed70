import chalk from 'chalk';
import {
  COMPONENT_LABELS,
  COMPONENT_TYPES,
  getScorer,
  isComponentType,
  type ComponentType,
  type Metric,
  type MetricCategory,
} from 'docscore-core';

const CATEGORIES: readonly MetricCategory[] = ['structural', 'practices', 'composition', 'documentation'];

/**
 * Rule table for a component type, taken from scoring an empty document
 */
export function ruleTable(type: ComponentType): Metric[] {
  const content = type === 'plugin' ? '{}' : '';
  return getScorer(type).score(content, {}, '').details;
}

export function formatRule(rule: Metric): string {
  return `  ${rule.category.padEnd(14)} ${rule.name.padEnd(32)} ${rule.maxPoints}`;
}

function printRules(type: ComponentType): void {
  const rules = ruleTable(type);
  console.log(chalk.bold(`${COMPONENT_LABELS[type]} rules:\n`));

  for (const category of CATEGORIES) {
    for (const rule of rules.filter((r) => r.category === category)) {
      console.log(chalk.cyan(formatRule(rule)));
    }
  }

  const maximum = rules.reduce((sum, rule) => sum + rule.maxPoints, 0);
  console.log(chalk.dim(`\nMaximum: ${maximum}/100`));

  if (type === 'skill') {
    console.log(chalk.dim('Methodology skills and thin routers swap in their own structural and practices checks.'));
  }
}

/**
 * Print the checks and point values used for a component type
 */
export function explain(typeName: string): void {
  if (isComponentType(typeName)) {
    printRules(typeName);
    return;
  }

  console.error(chalk.red(`Unknown component type '${typeName}'. Use one of: ${COMPONENT_TYPES.join(', ')}`));
  process.exit(1);
}
