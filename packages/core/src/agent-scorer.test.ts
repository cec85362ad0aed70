import { describe, it, expect } from 'vitest';
import { AgentScorer } from './agent-scorer.js';
import type { Frontmatter, Metric } from './types.js';

const scorer = new AgentScorer();

const DESCRIPTION =
  'Reviews code changes for correctness, security and style. Use PROACTIVELY after any edit to catch regressions early and suggest focused fixes. Works through the diff file by file and reports findings with a severity.';

const FULL_BODY = `## Foundation

Skill: code-review-patterns

### Phase 1: Gather

Read the diff.

### Phase 2: Review

HARD GATE: do not approve a failing build.

## Expected Output

A list of findings.

## Success Criteria

- Every finding has a fix

## Edge Cases

- Empty diff

## Anti-Patterns

- Nitpicking formatting
`;

function toContent(frontmatter: Frontmatter, body: string): string {
  const yaml = Object.entries(frontmatter)
    .map(([key, value]) => `${key}: ${String(value)}`)
    .join('\n');
  return `---\n${yaml}\n---\n${body}`;
}

function findMetric(details: Metric[], name: string): Metric | undefined {
  return details.find((d) => d.name === name);
}

describe('AgentScorer', () => {
  it('should grade a complete agent at 90 (A)', () => {
    const frontmatter = {
      name: 'code-reviewer',
      description: DESCRIPTION,
      model: 'sonnet',
      tools: 'Read, Grep, Glob',
    };

    const score = scorer.score(toContent(frontmatter, FULL_BODY), frontmatter, FULL_BODY);

    expect(score.structural).toBe(35);
    expect(score.practices).toBe(35);
    expect(score.composition).toBe(10);
    expect(score.documentation).toBe(10);
    expect(score.overall).toBe(90);
    expect(score.tier).toBe('A');
    expect(findMetric(score.details, 'Description quality')?.note).toBe('Comprehensive');
    expect(findMetric(score.details, 'Section structure')?.note).toBe('Well-structured');
    expect(findMetric(score.details, 'Line count')?.note).toBe('Excellent: ≤120 lines');
  });

  it('should score an empty agent at zero apart from composition', () => {
    const score = scorer.score('', {}, '');

    expect(score.structural).toBe(0);
    expect(score.practices).toBe(0);
    expect(score.composition).toBe(10);
    expect(score.documentation).toBe(0);
    expect(score.tier).toBe('F');
    expect(findMetric(score.details, 'Description quality')?.note).toBe('Missing');
    expect(findMetric(score.details, 'Section structure')?.note).toBe('Poor structure');
  });

  it('should emit metrics in category order', () => {
    const score = scorer.score('', {}, '');

    expect(score.details.map((d) => d.name)).toEqual([
      'Has name',
      'Has description',
      'Has model',
      'Has tools',
      'Foundation section',
      'Phase workflow',
      'Success Criteria',
      'Edge Cases',
      'Skill: reference',
      'Anti-Patterns section',
      'Expected Output section',
      'HARD GATE markers',
      'Third-person description',
      'WHEN triggers in description',
      'Line count',
      'Description quality',
      'Section structure',
    ]);
  });

  it.each([
    ['Skill: tdd-workflow', true],
    ['**Skill**: tdd-workflow', true],
    ['Skill("tdd-workflow")', true],
    ['Skills:\n- tdd-workflow', true],
    ['Uses several skills', false],
  ])('should detect skill reference in %j', (body, expected) => {
    const score = scorer.score(body, {}, body);
    expect(findMetric(score.details, 'Skill: reference')?.passed).toBe(expected);
  });

  it('should reject first-person descriptions', () => {
    const frontmatter = { description: 'I review code when asked' };
    const score = scorer.score('', frontmatter, '');

    expect(findMetric(score.details, 'Third-person description')?.points).toBe(0);
    expect(findMetric(score.details, 'WHEN triggers in description')?.points).toBe(0);
  });

  it('should accept "use when" as a trigger phrase', () => {
    const frontmatter = { description: 'Reviews code. Use when the user asks for a review.' };
    const score = scorer.score('', frontmatter, '');

    expect(findMetric(score.details, 'Third-person description')?.points).toBe(5);
    expect(findMetric(score.details, 'WHEN triggers in description')?.points).toBe(5);
  });

  it('should treat a non-string description as missing', () => {
    const score = scorer.score('', { description: 12345 }, '');

    expect(findMetric(score.details, 'Has description')?.passed).toBe(true);
    expect(findMetric(score.details, 'Third-person description')?.passed).toBe(false);
    expect(findMetric(score.details, 'Description quality')?.note).toBe('Missing');
  });

  it.each([
    [120, 10],
    [121, 8],
    [180, 8],
    [220, 6],
    [221, 3],
    [275, 3],
    [276, 0],
  ])('should grade a %i-line agent with %i composition points', (lines, expected) => {
    const content = Array.from({ length: lines }, () => 'x').join('\n');
    expect(scorer.score(content, {}, '').composition).toBe(expected);
  });

  it('should grade heading counts', () => {
    const fourHeadings = '## A\n## B\n## C\n## D\n';
    const score = scorer.score(fourHeadings, {}, fourHeadings);
    const structure = findMetric(score.details, 'Section structure');

    expect(structure?.points).toBe(3);
    expect(structure?.note).toBe('Adequate structure');
    expect(structure?.passed).toBe(true);
  });
});
