#!/usr/bin/env node

import { Command } from 'commander';
import { createRequire } from 'module';
import { score, type ScoreOptions } from './commands/score.js';
import { config, type ConfigOptions } from './commands/config.js';
import { explain } from './commands/explain.js';

const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');
const VERSION = pkg.version;

const program = new Command();

program
  .name('docscore')
  .description('Quality scoring for agent, command, skill, plugin and output-style files')
  .version(VERSION);

// Score command
program
  .command('score [paths...]')
  .description('Score component files or every component found under a directory')
  .option('-t, --type <type>', 'Component type (agent, command, skill, plugin, output-style)')
  .option('-f, --format <format>', 'Output format: console, json, markdown')
  .option('-o, --output <file>', 'Write the report to a file')
  .option('-v, --verbose', 'Show every check')
  .option('--min-score <number>', 'Exit with code 1 when a file scores below this')
  .action(async (paths: string[], options: ScoreOptions) => {
    await score(paths, options);
  });

// Config command
program
  .command('config')
  .description('Manage project configuration (.docscorerc.json)')
  .option('--set <key=value>', 'Set a configuration value')
  .option('--get <key>', 'Get a configuration value')
  .option('--list', 'List all configuration values')
  .action(async (options: ConfigOptions) => {
    await config(options);
  });

// Explain command
program
  .command('explain <type>')
  .description('List the checks and points used for a component type')
  .action((type: string) => {
    explain(type);
  });

// Show help if no command
if (!process.argv.slice(2).length) {
  program.help();
}

await program.parseAsync();
