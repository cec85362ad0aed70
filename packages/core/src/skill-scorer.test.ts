import { describe, it, expect } from 'vitest';
import { SkillScorer, referencedFiles } from './skill-scorer.js';
import type { Frontmatter, Metric, QualityScore } from './types.js';

const scorer = new SkillScorer();

function toContent(frontmatter: Frontmatter, body: string): string {
  const yaml = Object.entries(frontmatter)
    .map(([key, value]) => `${key}: ${String(value)}`)
    .join('\n');
  return `---\n${yaml}\n---\n${body}`;
}

function score(frontmatter: Frontmatter, body: string): QualityScore {
  return scorer.score(toContent(frontmatter, body), frontmatter, body);
}

function findMetric(details: Metric[], name: string): Metric | undefined {
  return details.find((d) => d.name === name);
}

const THIN_ROUTER_BODY = `## Quick Reference

| User Question | Action |
|---------------|--------|
| How to verify? | Read(references/web-verification.md) |
| Run tests? | Read(references/test-patterns.md) |

## Degeneralization Notes

Extracted routing logic from monolithic skill. Reference files contain full methodology.

## Related Skills

- quality-agent patterns
- See also: clean-code-patterns

## Anti-Patterns

| Anti-Pattern | Problem |
|---|---|
| Inline verification | Bloats skill |

## Success Criteria

- [ ] Routes to correct reference
`;

const METHODOLOGY_BODY = `## Workflow

### Phase 1
Do analysis

### Phase 2
Implement

## Anti-Patterns

| Anti-Pattern | Problem | Fix |
|---|---|---|
| Bad | Why | Good |

## Success Criteria

- [ ] Tests pass
`;

describe('SkillScorer', () => {
  describe('standard methodology skills', () => {
    it('should use the methodology section rules', () => {
      const result = score(
        { name: 'methodology-skill', description: 'A full methodology skill' },
        METHODOLOGY_BODY
      );

      expect(result.structural).toBe(32);
      expect(result.practices).toBe(18);
      expect(result.composition).toBe(10);
      expect(result.documentation).toBe(1);
      expect(result.overall).toBe(61);
      expect(result.tier).toBe('C');
      expect(findMetric(result.details, 'Workflow section')?.passed).toBe(true);
      expect(findMetric(result.details, 'Quick Reference')?.maxPoints).toBe(8);
      expect(findMetric(result.details, 'Reference routing pattern')).toBeUndefined();
    });

    it('should keep a workflow skill off the thin-router path despite router signals', () => {
      const body = `## Workflow

Follow references/guide.md and Read(references/steps.md).

## Degeneralization

Split from a larger skill.
`;
      const result = score({ name: 'mixed', description: 'Mixed signals' }, body);
      const names = result.details.map((d) => d.name);

      expect(names).toContain('Workflow section');
      expect(names).not.toContain('Reference routing pattern');
      expect(names).not.toContain('Routing table to references');
    });

    it('should award every standard practice', () => {
      const body = `## Quick Reference

| User Question | Action |
|---------------|--------|
| How? | Do this |

## Workflow

### Phase 1
First step

## Anti-Patterns

| Anti-Pattern | Problem | Fix |
|--------------|---------|-----|
| Bad | Why | Good |

## Success Criteria

- [ ] First

HARD GATE: Must verify

See references/patterns.md

Score = quality * completeness
`;
      const result = score({ name: 'full', description: 'Full skill' }, body);

      expect(result.practices).toBe(40);
      expect(result.structural).toBe(40);
    });
  });

  describe('standard reference-library skills', () => {
    const body = `## Quick Reference

| Pattern | Use |
|---|---|
| Retry | Transient errors |

## Patterns

### Retry with backoff

\`\`\`ts
retry(fn)
\`\`\`

## Best Practices

### Don't

- Retry forever
`;

    it('should use the reference section rules without success criteria', () => {
      const result = score({ name: 'retry-patterns' }, body);

      expect(result.details.filter((d) => d.category === 'structural').map((d) => d.name)).toEqual([
        'Has name',
        'Has description',
        'Quick Reference',
        'Pattern/Template section',
        'Anti-Patterns section',
      ]);
      expect(result.structural).toBe(30);
    });

    it('should accept Best Practices with a Don\'t subsection as anti-patterns', () => {
      const result = score({ name: 'retry-patterns' }, body);
      expect(findMetric(result.details, 'Anti-Patterns section')?.passed).toBe(true);
    });

    it('should count fence markers for code examples', () => {
      const result = score({ name: 'retry-patterns' }, body);
      const examples = findMetric(result.details, 'Code examples');

      expect(examples?.points).toBe(1);
      expect(examples?.note).toBe('Few examples');
    });
  });

  describe('anti-patterns fallback', () => {
    it.each([
      ['## Anti-Patterns\nBad things', true],
      ['| Anti-Pattern | Problem | Fix |\n| Bad | Why | Good |', true],
      ["## Best Practices\n\n### Don't\n\n- Don't do this", true],
      ['## Best Practices\n\n### Do\n\n- Do this', false],
      ['Just content', false],
    ])('should grade %j', (body, expected) => {
      const result = score({ name: 'test', description: 'Test skill' }, body);
      expect(findMetric(result.details, 'Anti-Patterns section')?.passed).toBe(expected);
    });
  });

  describe('thin routers', () => {
    it('should grade a complete thin router at 95 (A)', () => {
      const result = score(
        {
          name: 'verification-patterns',
          description:
            'Thin router skill that delegates verification workflows to reference files for detailed implementation guidance. '.repeat(
              2
            ),
        },
        THIN_ROUTER_BODY
      );

      expect(result.structural).toBe(40);
      expect(result.practices).toBe(40);
      expect(result.composition).toBe(10);
      expect(result.documentation).toBe(5);
      expect(result.overall).toBe(95);
      expect(result.tier).toBe('A');
    });

    it('should grade a minimal thin router at 73 (B)', () => {
      const body = `## Quick Reference

| Intent | Action |
|--------|--------|
| Create endpoint | Read(references/endpoints.md) |

## Degeneralization Notes

Extracted from monolithic API skill.

See references/models.md for data models.
`;
      const result = score(
        {
          name: 'fastapi-patterns',
          description: 'FastAPI pattern router that delegates to reference files. '.repeat(3),
        },
        body
      );

      expect(result.structural).toBe(40);
      expect(result.practices).toBe(20);
      expect(result.documentation).toBe(3);
      expect(result.overall).toBe(73);
      expect(result.tier).toBe('B');
    });

    it('should replace structural and practices metrics', () => {
      const result = score({ name: 'router-skill', description: 'Router' }, THIN_ROUTER_BODY);

      expect(result.details.map((d) => `${d.category}:${d.name}`)).toEqual([
        'structural:Has name',
        'structural:Has description',
        'structural:Routing table to references',
        'structural:Reference file mentions',
        'structural:Decision/intent table',
        'practices:Reference routing pattern',
        'practices:Related skills / cross-links',
        'practices:Degeneralization notes',
        'practices:Anti-Patterns section',
        'practices:Success criteria',
        'composition:Line count',
        'documentation:Description quality',
        'documentation:Code examples',
      ]);
      expect(findMetric(result.details, 'Reference file mentions')?.note).toBe('2 reference files');
    });

    it('should fail reference file mentions when one file is named twice', () => {
      const body = `| Intent | Action |
|--------|--------|
| Test | Read(references/testing.md) |

Details live in references/testing.md.
`;
      const result = score({ name: 'testing-router', description: 'Router' }, body);
      const mentions = findMetric(result.details, 'Reference file mentions');

      expect(mentions?.passed).toBe(false);
      expect(mentions?.points).toBe(0);
      expect(mentions?.note).toBe('1 reference file');
    });

    it('should keep the same point budgets as the standard path', () => {
      const result = score({}, THIN_ROUTER_BODY);
      const maxByCategory = (category: Metric['category']) =>
        result.details.filter((d) => d.category === category).reduce((sum, d) => sum + d.maxPoints, 0);

      expect(maxByCategory('structural')).toBe(40);
      expect(maxByCategory('practices')).toBe(40);
      expect(maxByCategory('composition')).toBe(10);
      expect(maxByCategory('documentation')).toBe(10);
    });
  });

  describe('documentation', () => {
    it.each([
      [0, 0, 'No examples'],
      [2, 1, 'Few examples'],
      [4, 3, 'Adequate examples'],
      [6, 5, 'Rich examples'],
    ])('should grade %i fence markers', (fences, expected, note) => {
      const body = Array.from({ length: fences }, () => '```').join('\ncode\n');
      const examples = findMetric(score({}, body).details, 'Code examples');

      expect(examples?.points).toBe(expected);
      expect(examples?.note).toBe(note);
    });
  });

  describe('composition', () => {
    it.each([
      [250, 10],
      [251, 8],
      [400, 8],
      [550, 6],
      [660, 3],
      [661, 0],
    ])('should grade a %i-line skill with %i points', (lines, expected) => {
      const content = Array.from({ length: lines }, () => 'text').join('\n');
      expect(scorer.score(content, {}, '').composition).toBe(expected);
    });
  });
});

describe('referencedFiles', () => {
  it('should list distinct reference paths', () => {
    const body = 'Read(references/a.md) then references/b.md and again references/a.md';
    expect(referencedFiles(body)).toEqual(['references/a.md', 'references/b.md']);
  });

  it('should leave a sentence-ending period off the path', () => {
    const body = '| Test | Read(references/testing.md) |\nDetails live in references/testing.md.';
    expect(referencedFiles(body)).toEqual(['references/testing.md']);
  });

  it('should keep dots inside a file name', () => {
    expect(referencedFiles('See references/api.v2.md.')).toEqual(['references/api.v2.md']);
  });
});
