import * as path from 'path';
import fs from 'fs-extra';

export type OutputFormat = 'console' | 'json' | 'markdown';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['console', 'json', 'markdown'];

export const CONFIG_FILE = '.docscorerc.json';

/**
 * Settings accepted in .docscorerc.json
 */
export const CONFIG_KEYS = ['format', 'minScore', 'verbose', 'exclude'] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

/**
 * Raw flag values as commander hands them over
 */
export interface ScoreFlags {
  format?: string;
  minScore?: string;
  verbose?: boolean;
}

/**
 * Effective settings for a scoring run
 */
export interface ResolvedOptions {
  format: OutputFormat;
  minScore: number;
  verbose: boolean;
  exclude: string[];
}

type Env = Record<string, string | undefined>;

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && (OUTPUT_FORMATS as readonly string[]).includes(value);
}

export function isConfigKey(value: string): value is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isValidMinScore(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= 100;
}

/**
 * Get config file path
 */
export function getConfigPath(cwd: string = process.cwd()): string {
  return path.join(cwd, CONFIG_FILE);
}

/**
 * Load the project config. A missing file reads as an empty config.
 */
export async function loadConfig(): Promise<Record<string, unknown>> {
  const configPath = getConfigPath();

  if (await fs.pathExists(configPath)) {
    const data: unknown = await fs.readJson(configPath);
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      throw new Error(`${CONFIG_FILE} must contain a JSON object`);
    }
    return { ...data };
  }

  return {};
}

/**
 * Save the project config
 */
export async function saveConfig(config: Record<string, unknown>): Promise<void> {
  await fs.writeJson(getConfigPath(), config, { spaces: 2 });
}

/**
 * Check a config object, returning one message per problem
 */
export function validateConfig(config: Record<string, unknown>): string[] {
  const problems: string[] = [];

  for (const [key, value] of Object.entries(config)) {
    if (!isConfigKey(key)) {
      problems.push(`Unknown setting '${key}'`);
      continue;
    }

    switch (key) {
      case 'format':
        if (!isOutputFormat(value)) {
          problems.push(`format must be one of: ${OUTPUT_FORMATS.join(', ')}`);
        }
        break;
      case 'minScore':
        if (!isValidMinScore(value)) {
          problems.push('minScore must be a number between 0 and 100');
        }
        break;
      case 'verbose':
        if (typeof value !== 'boolean') {
          problems.push('verbose must be true or false');
        }
        break;
      case 'exclude':
        if (!isStringArray(value)) {
          problems.push('exclude must be a list of glob patterns');
        }
        break;
    }
  }

  return problems;
}

/**
 * Convert a `--set key=value` string to the type the key holds
 */
export function parseConfigValue(key: ConfigKey, raw: string): unknown {
  switch (key) {
    case 'minScore':
      return raw.trim() === '' ? Number.NaN : Number(raw);
    case 'verbose':
      return raw === 'true' ? true : raw === 'false' ? false : raw;
    case 'exclude':
      return raw
        .split(',')
        .map((pattern) => pattern.trim())
        .filter((pattern) => pattern.length > 0);
    case 'format':
      return raw;
  }
}

/**
 * Merge flags, environment and config file. Earlier sources win:
 * flag, then DOCSCORE_* variables, then the file, then defaults.
 */
export function resolveOptions(
  flags: ScoreFlags,
  fileConfig: Record<string, unknown>,
  env: Env = process.env
): ResolvedOptions {
  const format = flags.format ?? env.DOCSCORE_FORMAT ?? fileConfig.format ?? 'console';
  if (!isOutputFormat(format)) {
    throw new Error(`Unknown format '${String(format)}'. Use one of: ${OUTPUT_FORMATS.join(', ')}`);
  }

  const rawMinScore = flags.minScore ?? env.DOCSCORE_MIN_SCORE;
  const minScore = rawMinScore === undefined ? (fileConfig.minScore ?? 0) : Number(rawMinScore);
  if (!isValidMinScore(minScore)) {
    throw new Error(`Invalid minimum score '${String(rawMinScore ?? minScore)}'. Use a number between 0 and 100`);
  }

  const verbose = flags.verbose === true || env.DOCSCORE_DEBUG === '1' || fileConfig.verbose === true;
  const exclude = isStringArray(fileConfig.exclude) ? fileConfig.exclude : [];

  return { format, minScore, verbose, exclude };
}
