import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import {
  GpuTableSchema,
  freezeGpuDescriptor,
  type GpuDescriptor
} from '../../models/GpuDescriptor.js';
import {
  CapabilityError,
  ConfigError,
  ConfigInvariantViolationError
} from '../../lib/errors/CapabilityErrors.js';
import { Result, ok, err, trySync } from '../../lib/result-types.js';
import { parseVersion, versionOlder } from '../../lib/version-utils.js';

/**
 * Path of the hardware table shipped with the package
 */
export const BUNDLED_GPU_TABLE_PATH = fileURLToPath(new URL('../../data/gpus.json', import.meta.url));

/**
 * A consistency problem found by {@link GpuTable.audit}
 */
export interface TableProblem {
  kind: 'duplicate-capability' | 'inverted-range';
  computeCapability: string;
  message: string;
}

/**
 * GpuTable - the static, ordered list of GPU descriptors
 *
 * Rows are validated and frozen on load and never change afterwards.
 * Loading does not scan for duplicate capabilities; the resolver fails on a
 * duplicate when it reaches one, and {@link GpuTable.audit} reports all of them.
 */
export class GpuTable {
  private constructor(
    readonly gpus: readonly GpuDescriptor[],
    readonly source: string
  ) {}

  /**
   * Load a table from a JSON file
   *
   * @param path - Table file (default: the bundled table)
   */
  static load(path: string = BUNDLED_GPU_TABLE_PATH): Result<GpuTable, CapabilityError> {
    const parsed = trySync(
      (): unknown => JSON.parse(readFileSync(path, 'utf-8')),
      (error) => new ConfigError(
        'gpuTablePath',
        path,
        `cannot read GPU table: ${error instanceof Error ? error.message : String(error)}`
      )
    );

    return parsed.andThen((data) => GpuTable.fromData(data, path));
  }

  /**
   * Build a table from already-parsed data
   *
   * @param data - Array of descriptor records
   * @param source - Label used in error messages
   */
  static fromData(data: unknown, source: string = '<inline>'): Result<GpuTable, CapabilityError> {
    const validation = GpuTableSchema.safeParse(data);

    if (!validation.success) {
      const issue = validation.error.issues[0];
      const where = issue ? `[${issue.path.join('.')}] ${issue.message}` : 'invalid table';
      return err(new ConfigInvariantViolationError(`${source}: ${where}`));
    }

    const gpus = Object.freeze(validation.data.map(freezeGpuDescriptor));
    return ok(new GpuTable(gpus, source));
  }

  get size(): number {
    return this.gpus.length;
  }

  /**
   * Scan the whole table for duplicate capabilities and inverted version ranges
   */
  audit(): TableProblem[] {
    const problems: TableProblem[] = [];
    const seen = new Map<string, string>();

    for (const gpu of this.gpus) {
      const previous = seen.get(gpu.computeCapability);
      if (previous !== undefined) {
        problems.push({
          kind: 'duplicate-capability',
          computeCapability: gpu.computeCapability,
          message: `Capability ${gpu.computeCapability} is listed for both ${previous} and ${gpu.archName}`
        });
      } else {
        seen.set(gpu.computeCapability, gpu.archName);
      }

      const min = parseVersion(gpu.minCudaVersion);
      const max = parseVersion(gpu.maxCudaVersion);
      if (min.isOk() && max.isOk() && versionOlder(max.value, min.value)) {
        problems.push({
          kind: 'inverted-range',
          computeCapability: gpu.computeCapability,
          message: `Capability ${gpu.computeCapability} has maxCudaVersion ${gpu.maxCudaVersion} older than minCudaVersion ${gpu.minCudaVersion}`
        });
      }
    }

    return problems;
  }
}
