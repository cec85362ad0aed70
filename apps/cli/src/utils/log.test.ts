import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';

vi.mock('chalk', () => ({
  default: {
    dim: vi.fn((s) => s),
  },
}));

import { errorMessage, isVerbose, log, setVerbose } from './log.js';

describe('log', () => {
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
    setVerbose(false);
  });

  it('should write diagnostics to stderr in verbose mode', () => {
    setVerbose(true);
    log('Scanning agents/');

    expect(isVerbose()).toBe(true);
    expect(consoleErrorSpy).toHaveBeenCalledWith('Scanning agents/');
  });

  it('should stay quiet otherwise', () => {
    vi.stubEnv('DOCSCORE_DEBUG', '');
    setVerbose(false);
    log('Scanning agents/');

    expect(consoleErrorSpy).not.toHaveBeenCalled();
    vi.unstubAllEnvs();
  });
});

describe('errorMessage', () => {
  it('should read messages from errors and other values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(new Error(''))).toBe('Unknown error');
    expect(errorMessage('plain')).toBe('plain');
  });
});
