/**
 * Unit tests for Logger
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { LOG_FILE_NAME, Logger } from '../../../src/lib/logger.js';

describe('Logger', () => {
  let tempDir: string;
  let lines: string[];

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'cuda-arch-log-'));
    lines = [];
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should append JSON Lines entries when a log directory is set', () => {
    const logDir = join(tempDir, 'logs');
    const logger = new Logger({ logDir, console: false });

    logger.info('Capabilities resolved', { cudaVersion: '12.0' });
    logger.debug('GPU table loaded');

    expect(logger.getLogFile()).toBe(join(logDir, LOG_FILE_NAME));
    const entries = readFileSync(join(logDir, LOG_FILE_NAME), 'utf-8')
      .trim()
      .split('\n')
      .map((line): unknown => JSON.parse(line));

    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({ level: 'info', message: 'Capabilities resolved', context: { cudaVersion: '12.0' } });
    expect(entries[1]).toMatchObject({ level: 'debug', message: 'GPU table loaded' });
  });

  it('should not create a file without a log directory', () => {
    const logger = new Logger({ console: false });

    logger.error('Nothing to see');

    expect(logger.getLogFile()).toBeNull();
    expect(existsSync(join(tempDir, LOG_FILE_NAME))).toBe(false);
  });

  it('should filter console output by level', () => {
    const logger = new Logger({ consoleLevel: 'warn', write: line => lines.push(line) });

    logger.info('hidden');
    logger.warn('Table is old', { rows: 18 });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[WARN\] \S+ Table is old \{"rows":18\}$/);
  });
});
