/**
 * Flags Command
 *
 * Prints architecture tokens and nvcc -gencode arguments for a toolkit version.
 */

import { Command } from 'commander';
import {
  CAPABILITY_FIELDS,
  isCapabilityField,
  type CapabilityField,
  type ResolvedCapabilities
} from '../../models/CapabilityResult.js';
import { CapabilityError, InvalidArgumentError } from '../../lib/errors/CapabilityErrors.js';
import { Result, ok, err } from '../../lib/result-types.js';
import { requireCudaVersion } from '../../services/config/ConfigService.js';
import { CapabilityResolver } from '../../services/hardware/CapabilityResolver.js';
import { createContext, type CommandContext, type GlobalOptions } from '../utils/context.js';
import { OutputFormatter, OutputFormat } from '../utils/output.js';

interface FlagsOptions {
  cudaVersion?: string;
  capabilities?: string;
  forwardCompat?: boolean;
  field?: string;
  gpuTable?: string;
}

/**
 * Resolve the flags for the configured toolkit version and request
 */
export function runFlags(context: CommandContext): Result<ResolvedCapabilities, CapabilityError> {
  const { config, table, logger } = context;

  return requireCudaVersion(config).andThen((cudaVersion) => {
    const resolver = new CapabilityResolver(table);
    const result = resolver.resolve(cudaVersion, {
      cudaCapabilities: config.cudaCapabilities,
      enableForwardCompat: config.cudaForwardCompat
    });

    if (result.isOk()) {
      logger.info('Capabilities resolved', {
        cudaVersion,
        capabilities: result.value.cudaCapabilities,
        forwardCompat: result.value.enableForwardCompat
      });
    }
    return result;
  });
}

/**
 * Pick one field of the result as a list of values
 */
export function selectField(result: ResolvedCapabilities, field: string): Result<string[], CapabilityError> {
  if (!isCapabilityField(field)) {
    return err(new InvalidArgumentError('field', field, `expected one of ${CAPABILITY_FIELDS.join(', ')}`));
  }
  return ok(fieldValues(result, field));
}

function fieldValues(result: ResolvedCapabilities, field: CapabilityField): string[] {
  const value = result[field];
  return typeof value === 'string' ? [value] : [...value];
}

export function createFlagsCommand(): Command {
  return new Command('flags')
    .description('Print CUDA architecture tokens and nvcc gencode flags')
    .option('--cuda-version <version>', 'CUDA toolkit version (e.g., 12.0)')
    .option('--capabilities <list>', 'Compute capabilities to build for, newest last (e.g., "7.5,8.6")')
    .option('--forward-compat', 'Emit a PTX target for the newest capability (default)')
    .option('--no-forward-compat', 'Do not emit a PTX target')
    .option('--field <name>', `Print a single field (${CAPABILITY_FIELDS.join(', ')})`)
    .option('--gpu-table <path>', 'Use an alternative GPU table JSON file')
    .action((options: FlagsOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const output = new OutputFormatter(globals.json ? OutputFormat.JSON : OutputFormat.HUMAN);
      const startTime = Date.now();

      const result = createContext(
        {
          cudaVersion: options.cudaVersion,
          cudaCapabilities: options.capabilities,
          cudaForwardCompat: options.forwardCompat,
          gpuTablePath: options.gpuTable
        },
        globals
      ).andThen((context) =>
        runFlags(context).map((resolved) => {
          context.logger.logCommand('flags', { ...options }, startTime);
          return resolved;
        })
      );

      if (result.isErr()) {
        output.error('Failed to resolve CUDA architecture flags', result.error);
        process.exit(1);
      }

      const resolved = result.value;

      if (options.field !== undefined) {
        const selected = selectField(resolved, options.field);
        if (selected.isErr()) {
          output.error('Unknown field', selected.error);
          process.exit(1);
        }
        output.lines(selected.value);
        return;
      }

      if (output.getFormat() === OutputFormat.JSON) {
        output.json(resolved);
        return;
      }

      output.success(`CUDA ${resolved.cudaVersion}: ${resolved.archNames.join(', ')}`, {
        capabilities: resolved.cudaCapabilities,
        forwardCompat: resolved.enableForwardCompat,
        capabilitiesAndForward: resolved.capabilitiesAndForward,
        realArches: resolved.realArches,
        virtualArches: resolved.virtualArches,
        arches: resolved.arches
      });
      output.info('nvcc flags');
      output.list(resolved.gencode);
    });
}
