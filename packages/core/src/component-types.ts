import { minimatch } from 'minimatch';
import type { ComponentType, ComponentTypePattern } from './types.js';

export const COMPONENT_TYPES: readonly ComponentType[] = [
  'agent',
  'command',
  'skill',
  'plugin',
  'output-style',
];

export const COMPONENT_LABELS: Record<ComponentType, string> = {
  agent: 'Agent',
  command: 'Command',
  skill: 'Skill',
  plugin: 'Plugin',
  'output-style': 'Output Style',
};

/**
 * Path patterns used to infer a component type. First match wins, so the
 * more specific patterns come first.
 */
export const COMPONENT_TYPE_PATTERNS: readonly ComponentTypePattern[] = [
  { pattern: '.claude/skills/**/SKILL.md', type: 'skill' },
  { pattern: 'skills/**/SKILL.md', type: 'skill' },
  { pattern: '**/.claude-plugin/plugin.json', type: 'plugin' },
  { pattern: '.claude/agents/**/*.md', type: 'agent' },
  { pattern: 'agents/**/*.md', type: 'agent' },
  { pattern: '.claude/output-styles/**/*.md', type: 'output-style' },
  { pattern: 'output-styles/**/*.md', type: 'output-style' },
  { pattern: '.claude/commands/**/*.md', type: 'command' },
  { pattern: 'commands/**/*.md', type: 'command' },
];

export function isComponentType(value: string): value is ComponentType {
  return (COMPONENT_TYPES as readonly string[]).includes(value);
}

/**
 * Infer the component type of a file from its path relative to the scan root.
 * Returns null for files that are not components.
 */
export function detectComponentType(relativePath: string): ComponentType | null {
  const normalized = relativePath.replace(/\\/g, '/').replace(/^\.\//, '');

  for (const { pattern, type } of COMPONENT_TYPE_PATTERNS) {
    if (minimatch(normalized, pattern, { dot: true })) {
      return type;
    }
  }

  // Components kept outside the conventional directories
  const segments = normalized.split('/');
  const basename = segments[segments.length - 1];
  if (basename === 'SKILL.md') {
    return 'skill';
  }
  if (basename === 'plugin.json' && segments[segments.length - 2] === '.claude-plugin') {
    return 'plugin';
  }

  return null;
}
