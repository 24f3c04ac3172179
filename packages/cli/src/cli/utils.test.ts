import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SourceError } from '@depdot/core';

// Mock ora
vi.mock('ora', () => {
  const mockOra = {
    start: vi.fn().mockReturnThis(),
    stop: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    text: '',
  };
  return {
    default: vi.fn(() => mockOra),
    __mockOra: mockOra,
  };
});

import ora from 'ora';
import { formatDuration, handleCommandError, pluralize, TaskSpinner } from './utils.js';

describe('formatDuration', () => {
  it('should format milliseconds below 1000', () => {
    expect(formatDuration(0)).toBe('0ms');
    expect(formatDuration(999)).toBe('999ms');
  });

  it('should format seconds for 1000ms and above', () => {
    expect(formatDuration(1000)).toBe('1.0s');
    expect(formatDuration(1500)).toBe('1.5s');
  });
});

describe('pluralize', () => {
  it('adds an s except for one', () => {
    expect(pluralize(0, 'edge')).toBe('0 edges');
    expect(pluralize(1, 'edge')).toBe('1 edge');
    expect(pluralize(5, 'node')).toBe('5 nodes');
  });
});

describe('TaskSpinner', () => {
  it('starts an ora spinner on stderr', () => {
    const spinner = new TaskSpinner('Running...');
    spinner.succeed('Done');

    expect(ora).toHaveBeenCalledWith({ text: 'Running...', stream: process.stderr });
  });
});

describe('handleCommandError', () => {
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const output = () => consoleErrorSpy.mock.calls.flat().join('\n');

  it('prints depdot errors without the unexpected-error prefix', () => {
    handleCommandError(new SourceError('Source command failed'));

    expect(output()).toContain('❌ Source command failed');
    expect(output()).not.toContain('Unexpected error');
    expect(output()).toContain('Run with --verbose for more details');
  });

  it('prints context in verbose mode', () => {
    handleCommandError(new SourceError('Source command failed', { exitCode: 2 }), true);

    expect(output()).toContain('Context:');
    expect(output()).toContain('"exitCode": 2');
    expect(output()).not.toContain('Run with --verbose');
  });

  it('prints unexpected errors with their stack in verbose mode', () => {
    handleCommandError(new TypeError('bad'), true);

    expect(output()).toContain('❌ Unexpected error: bad');
    expect(output()).toContain('Stack trace:');
  });
});
