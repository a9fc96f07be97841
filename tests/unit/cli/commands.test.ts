/**
 * Unit tests for the flags, gpus and doctor command handlers
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { runFlags, selectField } from '../../../src/cli/commands/flags.js';
import { listGpus } from '../../../src/cli/commands/gpus.js';
import { runDoctor } from '../../../src/cli/commands/doctor.js';
import { consoleLevelFor, createContext, type CommandContext } from '../../../src/cli/utils/context.js';
import { Logger } from '../../../src/lib/logger.js';
import { BUNDLED_GPU_TABLE_PATH, GpuTable } from '../../../src/services/hardware/GpuTable.js';
import type { ResolverConfig } from '../../../src/services/config/ConfigService.js';
import {
  ConfigError,
  InvalidArgumentError,
  NotFoundError
} from '../../../src/lib/errors/CapabilityErrors.js';

function createTestContext(config: Partial<ResolverConfig>): CommandContext {
  return {
    config: { cudaForwardCompat: true, ...config },
    table: GpuTable.load()._unsafeUnwrap(),
    logger: new Logger({ console: false })
  };
}

describe('CLI commands', () => {
  describe('flags', () => {
    it('should resolve the requested capabilities', () => {
      const result = runFlags(createTestContext({ cudaVersion: '12.0', cudaCapabilities: ['7.5', '8.6'] }))._unsafeUnwrap();

      expect(result.gencode).toEqual([
        '-gencode=arch=compute_75,code=sm_75',
        '-gencode=arch=compute_86,code=sm_86',
        '-gencode=arch=compute_86,code=compute_86'
      ]);
      expect(result.archNameToCapabilities['Ampere']).toEqual(['8.0', '8.6', '8.7']);
      expect(result.capabilityToName['8.9']).toBe('Ada');
    });

    it('should honour a disabled forward compatibility switch', () => {
      const result = runFlags(createTestContext({
        cudaVersion: '12.0',
        cudaCapabilities: ['9.0'],
        cudaForwardCompat: false
      }))._unsafeUnwrap();

      expect(result.arches).toEqual(['sm_90']);
    });

    it('should require a CUDA version', () => {
      expect(runFlags(createTestContext({}))._unsafeUnwrapErr()).toBeInstanceOf(ConfigError);
    });

    it('should surface capabilities the toolkit does not support', () => {
      const error = runFlags(createTestContext({ cudaVersion: '11.0', cudaCapabilities: ['8.6'] }))._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error.message).toBe(
        'Compute capability 8.6 is not supported by CUDA 11.0 (Ampere 8.6 needs CUDA 11.2 through 12.0)'
      );
    });

    it('should select a single field', () => {
      const result = runFlags(createTestContext({ cudaVersion: '12.0', cudaCapabilities: ['7.5', '8.6'] }))._unsafeUnwrap();

      expect(selectField(result, 'arches')._unsafeUnwrap()).toEqual(['sm_75', 'sm_86', 'compute_86']);
      expect(selectField(result, 'forwardCapability')._unsafeUnwrap()).toEqual(['8.6+PTX']);
      expect(selectField(result, 'cudaVersion')._unsafeUnwrapErr()).toBeInstanceOf(InvalidArgumentError);
    });
  });

  describe('gpus', () => {
    it('should list GPUs supported by the toolkit', () => {
      const listing = listGpus(createTestContext({ cudaVersion: '11.0' }))._unsafeUnwrap();

      expect(listing.rows.map(row => row.computeCapability)).toEqual([
        '3.5', '3.7', '5.0', '5.2', '5.3', '6.0', '6.1', '6.2', '7.0', '7.2', '7.5'
      ]);
      expect(listing.archNameToCapabilities?.['Kepler']).toEqual(['3.5', '3.7']);
    });

    it('should list the whole table without a version', () => {
      const listing = listGpus(createTestContext({}), true)._unsafeUnwrap();

      expect(listing.cudaVersion).toBeNull();
      expect(listing.rows).toHaveLength(18);
      expect(listing.rows[0]?.supported).toBeUndefined();
      expect(listing.archNameToCapabilities).toBeNull();
    });

    it('should flag support when listing the whole table for a version', () => {
      const listing = listGpus(createTestContext({ cudaVersion: '12.0' }), true)._unsafeUnwrap();

      expect(listing.rows).toHaveLength(18);
      expect(listing.rows.filter(row => row.supported)).toHaveLength(14);
      expect(listing.rows[0]).toEqual({
        archName: 'Kepler',
        computeCapability: '3.0',
        minCudaVersion: '10.0',
        maxCudaVersion: '10.2',
        supported: false
      });
    });

    it('should require a version unless listing everything', () => {
      expect(listGpus(createTestContext({}))._unsafeUnwrapErr()).toBeInstanceOf(ConfigError);
    });
  });

  describe('doctor and context', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'cuda-arch-cli-'));
    });

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true });
    });

    it('should find no problems with the bundled table', () => {
      const report = runDoctor({ cudaVersion: '12.0' }, tempDir, {});

      expect(report).toEqual({
        source: BUNDLED_GPU_TABLE_PATH,
        gpuCount: 18,
        cudaVersion: '12.0',
        supportedCount: 14,
        problems: []
      });
    });

    it('should collect every problem of a broken table', () => {
      writeFileSync(join(tempDir, 'gpus.json'), JSON.stringify([
        { archName: 'Ampere', computeCapability: '8.6', minCudaVersion: '11.2', maxCudaVersion: '12.0' },
        { archName: 'Ada', computeCapability: '8.6', minCudaVersion: '11.8', maxCudaVersion: '12.0' }
      ]));

      const report = runDoctor({ cudaVersion: '12.0', gpuTablePath: 'gpus.json' }, tempDir, {});

      expect(report.source).toBe(join(tempDir, 'gpus.json'));
      expect(report.gpuCount).toBe(2);
      expect(report.problems).toEqual([
        'Capability 8.6 is listed for both Ampere and Ada',
        'GPU table invariant violated: capability 8.6 is listed for both Ampere and Ada'
      ]);
    });

    it('should report a toolkit no GPU supports', () => {
      const report = runDoctor({ cudaVersion: '13.0' }, tempDir, {});

      expect(report.supportedCount).toBe(0);
      expect(report.problems).toEqual(['No GPU in the table supports CUDA 13.0']);
    });

    it('should build a context from the configuration file', () => {
      writeFileSync(join(tempDir, 'cuda-arch.config.json'), JSON.stringify({ cudaVersion: '11.8' }));

      const context = createContext({}, { quiet: true }, tempDir, {})._unsafeUnwrap();

      expect(context.config.cudaVersion).toBe('11.8');
      expect(context.table.size).toBe(18);
      expect(context.logger.getLogFile()).toBeNull();
    });

    it('should pick the console log level from flags and LOG_LEVEL', () => {
      expect(consoleLevelFor({}, {})).toBe('warn');
      expect(consoleLevelFor({ verbose: true }, {})).toBe('debug');
      expect(consoleLevelFor({ quiet: true, verbose: true }, {})).toBe('error');
      expect(consoleLevelFor({ quiet: true }, { LOG_LEVEL: 'INFO' })).toBe('info');
    });
  });
});
