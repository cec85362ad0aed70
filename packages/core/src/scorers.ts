import { AgentScorer } from './agent-scorer.js';
import { CommandScorer } from './command-scorer.js';
import { OutputStyleScorer } from './output-style-scorer.js';
import { parseComponent } from './parser.js';
import { PluginScorer } from './plugin-scorer.js';
import { SkillScorer } from './skill-scorer.js';
import type { ComponentType, ScoredComponent, Scorer } from './types.js';

// Scorers hold no state, one instance per type is shared by every caller
const SCORERS: Record<ComponentType, Scorer> = {
  agent: new AgentScorer(),
  command: new CommandScorer(),
  skill: new SkillScorer(),
  plugin: new PluginScorer(),
  'output-style': new OutputStyleScorer(),
};

export function getScorer(type: ComponentType): Scorer {
  return SCORERS[type];
}

/**
 * Parse raw file content and grade it
 *
 * @example
 * ```typescript
 * const { score } = scoreComponent('agent', fs.readFileSync('agents/reviewer.md', 'utf8'))
 * console.log(score.overall, score.tier)
 * ```
 */
export function scoreComponent(type: ComponentType, content: string): ScoredComponent {
  const parsed = parseComponent(type, content);
  return {
    type,
    score: getScorer(type).score(content, parsed.frontmatter, parsed.body),
    parseErrors: parsed.errors,
  };
}
