/**
 * Unit tests for OutputFormatter
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import chalk from 'chalk';
import { OutputFormat, OutputFormatter } from '../../../src/cli/utils/output.js';
import { NotFoundError } from '../../../src/lib/errors/CapabilityErrors.js';

describe('OutputFormatter', () => {
  let printed: string[];
  let previousLevel: typeof chalk.level;

  beforeEach(() => {
    printed = [];
    previousLevel = chalk.level;
    chalk.level = 0;
    vi.spyOn(console, 'log').mockImplementation((line: string) => { printed.push(line); });
  });

  afterEach(() => {
    chalk.level = previousLevel;
    vi.restoreAllMocks();
  });

  it('should print list items as bullets', () => {
    new OutputFormatter().list(['sm_75', 'sm_86']);

    expect(printed).toEqual(['  • sm_75', '  • sm_86']);
  });

  it('should print a list as a JSON object with its items', () => {
    new OutputFormatter(OutputFormat.JSON).list(['sm_75']);

    expect(printed).toHaveLength(1);
    expect(JSON.parse(printed[0] ?? '')).toEqual({ type: 'list', items: ['sm_75'] });
  });

  it('should include the error category in JSON error output', () => {
    new OutputFormatter(OutputFormat.JSON).error('Failed to resolve flags', new NotFoundError('99.9', '12.0', 'unknown'));

    expect(JSON.parse(printed[0] ?? '')).toEqual({
      status: 'error',
      message: 'Failed to resolve flags',
      error: {
        name: 'NotFoundError',
        message: 'Compute capability 99.9 is not defined in the GPU table (CUDA 12.0)',
        code: 'CAPABILITY_NOT_FOUND',
        category: 'permanent'
      }
    });
  });
});
