import chalk from 'chalk';
import {
  CONFIG_KEYS,
  getConfigPath,
  isConfigKey,
  loadConfig,
  parseConfigValue,
  saveConfig,
  validateConfig,
} from '../utils/config.js';
import { errorMessage } from '../utils/log.js';

export interface ConfigOptions {
  set?: string;
  get?: string;
  list?: boolean;
}

const SETTING_HELP: Record<(typeof CONFIG_KEYS)[number], string> = {
  format: 'Report format (console, json, markdown)',
  minScore: 'Exit with code 1 when a file scores below this (0-100)',
  verbose: 'Show every check in console reports (true, false)',
  exclude: 'Comma-separated glob patterns of files to skip',
};

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Manage the project's .docscorerc.json
 */
export async function config(options: ConfigOptions): Promise<void> {
  try {
    const currentConfig = await loadConfig();

    // List all config
    if (options.list || (!options.set && !options.get)) {
      console.log(chalk.bold('docscore configuration:\n'));
      console.log(chalk.dim(`Config file: ${getConfigPath()}\n`));

      if (Object.keys(currentConfig).length === 0) {
        console.log(chalk.yellow('No configuration set.'));
        console.log(chalk.dim('\nAvailable settings:'));
        for (const key of CONFIG_KEYS) {
          console.log(chalk.dim(`  ${key.padEnd(10)} - ${SETTING_HELP[key]}`));
        }
        return;
      }

      for (const [key, value] of Object.entries(currentConfig)) {
        console.log(`  ${chalk.cyan(key)}: ${formatValue(value)}`);
      }
      return;
    }

    // Get a config value
    if (options.get) {
      const value = currentConfig[options.get];
      if (value === undefined) {
        console.log(chalk.yellow(`Config '${options.get}' is not set.`));
        return;
      }
      console.log(formatValue(value));
      return;
    }

    // Set a config value
    if (options.set) {
      const [key, ...valueParts] = options.set.split('=');

      if (!key || valueParts.length === 0) {
        throw new Error('Invalid format. Use: --set key=value');
      }
      if (!isConfigKey(key)) {
        throw new Error(`Unknown setting '${key}'. Available: ${CONFIG_KEYS.join(', ')}`);
      }

      const updated = { ...currentConfig, [key]: parseConfigValue(key, valueParts.join('=')) };
      const problems = validateConfig(updated);
      if (problems.length > 0) {
        throw new Error(problems.join('; '));
      }

      await saveConfig(updated);
      console.log(chalk.green(`Set ${chalk.cyan(key)} = ${formatValue(updated[key])}`));
    }
  } catch (error) {
    console.error(chalk.red(errorMessage(error)));
    process.exit(1);
  }
}
