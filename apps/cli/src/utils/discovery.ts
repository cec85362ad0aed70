import * as path from 'path';
import fs from 'fs-extra';
import { minimatch } from 'minimatch';
import { detectComponentType, type ComponentType } from 'docscore-core';
import { log } from './log.js';

const SKIPPED_DIRECTORIES = new Set(['node_modules', '.git']);

export interface DiscoveredFile {
  /** Absolute path */
  path: string;
  /** Path relative to the working directory, with forward slashes */
  displayPath: string;
  type: ComponentType;
}

export interface DiscoverOptions {
  /** Force a component type instead of detecting it from the path */
  type?: ComponentType;
  /** Glob patterns of files to leave out */
  exclude?: readonly string[];
  cwd?: string;
}

function toPosix(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

function isExcluded(candidates: readonly string[], exclude: readonly string[]): boolean {
  return exclude.some((pattern) =>
    candidates.some((candidate) => minimatch(candidate, pattern, { dot: true }))
  );
}

/**
 * With a forced type, a directory walk only picks files of that type's format
 */
function hasTypeExtension(filePath: string, type: ComponentType): boolean {
  return filePath.endsWith(type === 'plugin' ? '.json' : '.md');
}

async function walk(root: string, prefix = ''): Promise<string[]> {
  const entries = await fs.readdir(path.join(root, prefix), { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      if (SKIPPED_DIRECTORIES.has(entry.name)) continue;
      files.push(...(await walk(root, relative)));
    } else if (entry.isFile()) {
      files.push(relative);
    }
  }

  return files;
}

/**
 * Expand files and directories into the component files to score.
 * Files with no detectable type are skipped. Results are sorted by path.
 */
export async function discoverFiles(
  targets: readonly string[],
  options: DiscoverOptions = {}
): Promise<DiscoveredFile[]> {
  const cwd = options.cwd ?? process.cwd();
  const exclude = options.exclude ?? [];
  const found = new Map<string, DiscoveredFile>();

  const consider = (absolute: string, rootRelative: string | null): void => {
    const displayPath = toPosix(path.relative(cwd, absolute));
    const candidates = rootRelative === null ? [displayPath] : [rootRelative, displayPath];

    if (isExcluded(candidates, exclude)) {
      log(`Excluded ${displayPath}`);
      return;
    }

    let type: ComponentType | null = null;
    if (options.type) {
      if (rootRelative === null || hasTypeExtension(rootRelative, options.type)) {
        type = options.type;
      }
    } else {
      for (const candidate of candidates) {
        type = detectComponentType(candidate);
        if (type) break;
      }
    }

    if (type) {
      found.set(absolute, { path: absolute, displayPath, type });
    } else {
      log(`Skipped ${displayPath}: not a component file`);
    }
  };

  for (const target of targets) {
    const absolute = path.resolve(cwd, target);
    const stats = await fs.stat(absolute);

    if (stats.isDirectory()) {
      for (const relative of await walk(absolute)) {
        consider(path.join(absolute, relative), relative);
      }
    } else {
      consider(absolute, null);
    }
  }

  return [...found.values()].sort((a, b) =>
    a.displayPath < b.displayPath ? -1 : a.displayPath > b.displayPath ? 1 : 0
  );
}

export async function readComponentFile(filePath: string): Promise<string> {
  return fs.readFile(filePath, 'utf-8');
}
