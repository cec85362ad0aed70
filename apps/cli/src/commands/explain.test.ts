import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';

vi.mock('chalk', () => ({
  default: {
    bold: vi.fn((s) => s),
    dim: vi.fn((s) => s),
    cyan: vi.fn((s) => s),
    red: vi.fn((s) => s),
  },
}));

import { explain, formatRule, ruleTable } from './explain.js';

describe('explain command', () => {
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;
  let processExitSpy: MockInstance;

  beforeEach(() => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation((() => {}) as never);
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    processExitSpy.mockRestore();
  });

  it('should print the command rules', () => {
    explain('command');

    expect(consoleLogSpy).toHaveBeenCalledWith('Command rules:\n');
    expect(consoleLogSpy).toHaveBeenCalledWith('  structural     Has allowed-tools                10');
    expect(consoleLogSpy).toHaveBeenCalledWith('\nMaximum: 100/100');
  });

  it('should show the lower ceiling for agents', () => {
    explain('agent');

    expect(consoleLogSpy).toHaveBeenCalledWith('\nMaximum: 90/100');
  });

  it('should note the alternate skill rules', () => {
    explain('skill');

    expect(consoleLogSpy).toHaveBeenCalledWith(
      'Methodology skills and thin routers swap in their own structural and practices checks.'
    );
  });

  it('should reject unknown types', () => {
    explain('hook');

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      "Unknown component type 'hook'. Use one of: agent, command, skill, plugin, output-style"
    );
    expect(processExitSpy).toHaveBeenCalledWith(1);
    expect(consoleLogSpy).not.toHaveBeenCalled();
  });
});

describe('ruleTable', () => {
  it('should list every check with full points available', () => {
    const rules = ruleTable('output-style');

    expect(rules.map((r) => [r.name, r.maxPoints])).toEqual([
      ['Has frontmatter', 10],
      ['Has name', 15],
      ['Has description', 15],
      ['Has body content', 20],
      ['Has keep-coding-instructions', 10],
      ['Substantial body content', 10],
      ['File size', 10],
      ['Description quality', 5],
      ['Uses markdown formatting', 5],
    ]);
  });
});

describe('formatRule', () => {
  it('should align category, name and points', () => {
    expect(
      formatRule({ category: 'practices', name: 'Task delegation', points: 0, maxPoints: 15, passed: false })
    ).toBe('  practices      Task delegation                  15');
  });
});
