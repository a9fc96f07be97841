/**
 * GPUs Command
 *
 * Lists the GPUs a CUDA toolkit supports, grouped by architecture family.
 */

import { Command } from 'commander';
import type { GpuDescriptor } from '../../models/GpuDescriptor.js';
import type { CapabilityError } from '../../lib/errors/CapabilityErrors.js';
import { Result, ok } from '../../lib/result-types.js';
import { requireCudaVersion } from '../../services/config/ConfigService.js';
import { CapabilityResolver } from '../../services/hardware/CapabilityResolver.js';
import { createContext, type CommandContext, type GlobalOptions } from '../utils/context.js';
import { OutputFormatter, OutputFormat } from '../utils/output.js';

interface GpusOptions {
  cudaVersion?: string;
  gpuTable?: string;
  all?: boolean;
}

export interface GpuRow extends GpuDescriptor {
  /** Present when a toolkit version is known */
  supported?: boolean;
}

export interface GpuListing {
  cudaVersion: string | null;
  rows: GpuRow[];
  /** Family -> capabilities for the toolkit version, null without one */
  archNameToCapabilities: Record<string, string[]> | null;
}

/**
 * Build the GPU listing
 *
 * Without `all`, a toolkit version is required and only its supported GPUs are
 * listed. With `all`, every row is listed and, if a version is known, flagged.
 */
export function listGpus(context: CommandContext, all: boolean = false): Result<GpuListing, CapabilityError> {
  const { config, table } = context;

  if (all && config.cudaVersion === undefined) {
    return ok({ cudaVersion: null, rows: [...table.gpus], archNameToCapabilities: null });
  }

  return requireCudaVersion(config).andThen((cudaVersion) =>
    new CapabilityResolver(table).resolveEnvironment(cudaVersion).map((env): GpuListing => {
      const supported = new Set(env.supportedCapabilities);
      const source = all ? table.gpus : env.supportedGpus;

      return {
        cudaVersion,
        rows: source.map((gpu) => ({ ...gpu, supported: supported.has(gpu.computeCapability) })),
        archNameToCapabilities: Object.fromEntries(
          [...env.archNameToCapabilities].map(([name, capabilities]) => [name, [...capabilities]])
        )
      };
    })
  );
}

export function createGpusCommand(): Command {
  return new Command('gpus')
    .description('List GPUs supported by a CUDA toolkit version')
    .option('--cuda-version <version>', 'CUDA toolkit version (e.g., 12.0)')
    .option('--gpu-table <path>', 'Use an alternative GPU table JSON file')
    .option('--all', 'List every GPU in the table')
    .action((options: GpusOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const output = new OutputFormatter(globals.json ? OutputFormat.JSON : OutputFormat.HUMAN);

      const result = createContext(
        { cudaVersion: options.cudaVersion, gpuTablePath: options.gpuTable },
        globals
      ).andThen((context) => listGpus(context, options.all ?? false));

      if (result.isErr()) {
        output.error('Failed to list GPUs', result.error);
        process.exit(1);
      }

      const listing = result.value;

      if (output.getFormat() === OutputFormat.JSON) {
        output.json(listing);
        return;
      }

      const withSupport = listing.cudaVersion !== null && (options.all ?? false);
      const headers = ['Architecture', 'Capability', 'Min CUDA', 'Max CUDA'];
      output.table(
        withSupport ? [...headers, 'Supported'] : headers,
        listing.rows.map((row) => {
          const cells = [row.archName, row.computeCapability, row.minCudaVersion, row.maxCudaVersion];
          return withSupport ? [...cells, row.supported ? 'yes' : 'no'] : cells;
        })
      );

      if (listing.archNameToCapabilities !== null) {
        console.log();
        output.info(`Architectures supported by CUDA ${listing.cudaVersion}`, listing.archNameToCapabilities);
      }
    });
}
