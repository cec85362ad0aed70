import fs from 'fs-extra';
import chalk from 'chalk';
import ora from 'ora';
import {
  COMPONENT_TYPES,
  formatJsonReport,
  formatMarkdownReport,
  formatScoreSummary,
  isComponentType,
  scoreComponent,
  type ComponentType,
  type ParseError,
  type ScoreReportEntry,
} from 'docscore-core';
import { CONFIG_FILE, loadConfig, resolveOptions, validateConfig, type ResolvedOptions } from '../utils/config.js';
import { discoverFiles, readComponentFile } from '../utils/discovery.js';
import { errorMessage, log, setVerbose } from '../utils/log.js';
import { colorByTier, formatConsoleReport, formatResultLine, formatSummaryLines } from '../utils/render.js';

export interface ScoreOptions {
  type?: string;
  format?: string;
  output?: string;
  verbose?: boolean;
  minScore?: string;
}

interface ScoredFile extends ScoreReportEntry {
  parseErrors: ParseError[];
}

function parseType(value: string | undefined): ComponentType | undefined {
  if (value === undefined) return undefined;
  if (!isComponentType(value)) {
    throw new Error(`Unknown component type '${value}'. Use one of: ${COMPONENT_TYPES.join(', ')}`);
  }
  return value;
}

async function resolveSettings(options: ScoreOptions): Promise<ResolvedOptions> {
  const fileConfig = await loadConfig();
  const problems = validateConfig(fileConfig);
  if (problems.length > 0) {
    throw new Error(`Invalid ${CONFIG_FILE}: ${problems.join('; ')}`);
  }
  return resolveOptions(options, fileConfig);
}

function printConsoleReport(results: readonly ScoredFile[], verbose: boolean): void {
  for (const result of results) {
    console.log(colorByTier(result.score.tier, formatResultLine(result)));
    for (const parseError of result.parseErrors) {
      console.log(chalk.yellow(`  ! ${parseError.message}`));
    }
    if (verbose) {
      console.log(chalk.dim(formatScoreSummary(result.score, { verbose: true })));
    }
  }

  console.log();
  for (const line of formatSummaryLines(results)) {
    console.log(chalk.dim(line));
  }
}

function renderReport(results: readonly ScoredFile[], settings: ResolvedOptions): string {
  switch (settings.format) {
    case 'json':
      return formatJsonReport(results) + '\n';
    case 'markdown':
      return formatMarkdownReport(results);
    case 'console':
      return formatConsoleReport(results);
  }
}

/**
 * Score component files and report the results
 */
export async function score(paths: string[], options: ScoreOptions): Promise<void> {
  const spinner = ora('Finding component files...');

  try {
    const settings = await resolveSettings(options);
    const type = parseType(options.type);
    setVerbose(settings.verbose);
    log(`Format: ${settings.format}, minimum score: ${settings.minScore}`);

    spinner.start();
    const targets = paths.length > 0 ? paths : ['.'];
    const files = await discoverFiles(targets, { type, exclude: settings.exclude });

    if (files.length === 0) {
      throw new Error(`No component files found in ${targets.join(', ')}`);
    }

    spinner.text = `Scoring ${files.length} file(s)...`;
    const results: ScoredFile[] = [];
    const unreadable: string[] = [];

    for (const file of files) {
      let content: string;
      try {
        content = await readComponentFile(file.path);
      } catch (error) {
        unreadable.push(`Could not read ${file.displayPath}: ${errorMessage(error)}`);
        continue;
      }

      const scored = scoreComponent(file.type, content);
      log(`${file.displayPath}: ${file.type}, ${scored.score.overall}/100`);
      results.push({
        file: file.displayPath,
        type: file.type,
        score: scored.score,
        parseErrors: scored.parseErrors,
      });
    }

    spinner.stop();

    for (const message of unreadable) {
      console.error(chalk.red(message));
    }

    if (options.output) {
      await fs.outputFile(options.output, renderReport(results, settings));
      console.log(chalk.green(`Report written to ${options.output}`));
    } else if (settings.format === 'console') {
      printConsoleReport(results, settings.verbose);
    } else {
      console.log(renderReport(results, settings).trimEnd());
    }

    const failing = results.filter((result) => result.score.overall < settings.minScore);
    if (failing.length > 0) {
      console.error(chalk.red(`${failing.length} file(s) scored below the minimum of ${settings.minScore}`));
      process.exit(1);
    }
  } catch (error) {
    spinner.fail('Scoring failed');
    console.error(chalk.red(errorMessage(error)));
    if (error instanceof Error && error.stack) {
      log(error.stack);
    }
    process.exit(1);
  }
}
