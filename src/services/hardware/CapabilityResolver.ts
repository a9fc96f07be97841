import type { GpuDescriptor } from '../../models/GpuDescriptor.js';
import type {
  CapabilityRequest,
  CapabilityResult,
  ResolvedCapabilities,
  ResolvedEnvironment
} from '../../models/CapabilityResult.js';
import {
  CapabilityError,
  ConfigInvariantViolationError,
  InvalidArgumentError,
  NotFoundError
} from '../../lib/errors/CapabilityErrors.js';
import { Result, ok, err, combineResults } from '../../lib/result-types.js';
import {
  dropDot,
  parseVersion,
  versionAtLeast,
  versionOlder,
  type VersionComponents
} from '../../lib/version-utils.js';
import type { GpuTable } from './GpuTable.js';

/**
 * Marker appended to the newest capability for the forward-compatible entry
 */
export const FORWARD_SUFFIX = '+PTX';

/** Real (SASS) architecture prefix */
export const REAL_ARCH_PREFIX = 'sm';

/** Virtual (PTX) architecture prefix */
export const VIRTUAL_ARCH_PREFIX = 'compute';

export interface ResolveOptions {
  /** Capabilities to build for (default: every capability the toolkit supports) */
  cudaCapabilities?: readonly string[];

  /** Default: true */
  enableForwardCompat?: boolean;
}

function parseTableVersion(gpu: GpuDescriptor, field: 'minCudaVersion' | 'maxCudaVersion'): Result<VersionComponents, CapabilityError> {
  return parseVersion(gpu[field]).mapErr(
    (error) => new ConfigInvariantViolationError(`${field} of capability ${gpu.computeCapability}: ${error.message}`)
  );
}

/**
 * Caller-supplied toolkit version, with surrounding whitespace removed
 */
export interface CudaVersion {
  text: string;
  components: VersionComponents;
}

/**
 * Parse a caller-supplied toolkit version
 */
export function parseCudaVersion(cudaVersion: string): Result<CudaVersion, CapabilityError> {
  const text = cudaVersion.trim();
  return parseVersion(text)
    .map((components) => ({ text, components }))
    .mapErr((error) => new InvalidArgumentError('cudaVersion', cudaVersion, error.message));
}

/**
 * A GPU is supported when cudaVersion >= minCudaVersion and maxCudaVersion
 * is not older than cudaVersion. Both bounds are inclusive.
 */
export function isSupported(gpu: GpuDescriptor, cudaVersion: VersionComponents): Result<boolean, CapabilityError> {
  return parseTableVersion(gpu, 'minCudaVersion').andThen((min) =>
    parseTableVersion(gpu, 'maxCudaVersion').map((max) => {
      const lowerBoundSatisfied = versionAtLeast(cudaVersion, min);
      const upperBoundSatisfied = !versionOlder(max, cudaVersion);
      return lowerBoundSatisfied && upperBoundSatisfied;
    })
  );
}

/**
 * GPUs supported by the toolkit, in table order
 */
export function filterSupportedGpus(
  gpus: readonly GpuDescriptor[],
  cudaVersion: VersionComponents
): Result<GpuDescriptor[], CapabilityError> {
  return combineResults(gpus.map((gpu) => isSupported(gpu, cudaVersion))).map((flags) =>
    gpus.filter((_, index) => flags[index])
  );
}

/**
 * Build the capability -> family and family -> capabilities maps.
 * A capability seen twice is a table defect and is never overwritten.
 */
export function buildLookups(
  supportedGpus: readonly GpuDescriptor[]
): Result<Pick<ResolvedEnvironment, 'capabilityToName' | 'archNameToCapabilities'>, CapabilityError> {
  const capabilityToName = new Map<string, string>();
  const archNameToCapabilities = new Map<string, string[]>();

  for (const gpu of supportedGpus) {
    const existing = capabilityToName.get(gpu.computeCapability);
    if (existing !== undefined) {
      return err(new ConfigInvariantViolationError(
        `capability ${gpu.computeCapability} is listed for both ${existing} and ${gpu.archName}`
      ));
    }
    capabilityToName.set(gpu.computeCapability, gpu.archName);

    const group = archNameToCapabilities.get(gpu.archName);
    if (group) {
      group.push(gpu.computeCapability);
    } else {
      archNameToCapabilities.set(gpu.archName, [gpu.computeCapability]);
    }
  }

  return ok({ capabilityToName, archNameToCapabilities });
}

/**
 * Filter a table by toolkit version and derive its lookups
 *
 * @param gpus - Full hardware table
 * @param cudaVersion - Toolkit version, e.g. "12.0"
 */
export function resolveEnvironment(
  gpus: readonly GpuDescriptor[],
  cudaVersion: string
): Result<ResolvedEnvironment, CapabilityError> {
  return parseCudaVersion(cudaVersion).andThen((version) =>
    filterSupportedGpus(gpus, version.components).andThen((supportedGpus) =>
      buildLookups(supportedGpus).map((lookups) => ({
        cudaVersion: version.text,
        knownGpus: gpus,
        supportedGpus,
        supportedCapabilities: supportedGpus.map((gpu) => gpu.computeCapability),
        ...lookups
      }))
    )
  );
}

// "sm", ["8.0", "8.6"] -> ["sm_80", "sm_86"]
const archMapper = (feat: string, capabilities: readonly string[]): string[] =>
  capabilities.map((capability) => `${feat}_${dropDot(capability)}`);

// "sm", ["8.6"] -> ["-gencode=arch=compute_86,code=sm_86"]
const gencodeMapper = (feat: string, capabilities: readonly string[]): string[] =>
  capabilities.map(
    (capability) => `-gencode=arch=${VIRTUAL_ARCH_PREFIX}_${dropDot(capability)},code=${feat}_${dropDot(capability)}`
  );

function capabilityNotFound(env: ResolvedEnvironment, capability: string): NotFoundError {
  const known = env.knownGpus.find((gpu) => gpu.computeCapability === capability);
  if (!known) {
    return new NotFoundError(capability, env.cudaVersion, 'unknown');
  }
  return new NotFoundError(
    capability,
    env.cudaVersion,
    'unsupported',
    `${known.archName} ${capability} needs CUDA ${known.minCudaVersion} through ${known.maxCudaVersion}`
  );
}

/**
 * Expand a list of capabilities into architecture tokens and nvcc flags.
 *
 * The last requested capability is the one used for forward compatibility;
 * no re-sorting happens here.
 */
export function formatCapabilities(
  env: ResolvedEnvironment,
  request: CapabilityRequest
): Result<CapabilityResult, CapabilityError> {
  const cudaCapabilities = [...request.cudaCapabilities];
  const enableForwardCompat = request.enableForwardCompat ?? true;
  const newest = cudaCapabilities[cudaCapabilities.length - 1];

  if (newest === undefined) {
    return err(new InvalidArgumentError('cudaCapabilities', cudaCapabilities, 'at least one compute capability is required'));
  }

  const archNames: string[] = [];
  for (const capability of cudaCapabilities) {
    const name = env.capabilityToName.get(capability);
    if (name === undefined) {
      return err(capabilityNotFound(env, capability));
    }
    if (!archNames.includes(name)) {
      archNames.push(name);
    }
  }

  const forwardCapability = `${newest}${FORWARD_SUFFIX}`;
  const realArches = archMapper(REAL_ARCH_PREFIX, cudaCapabilities);
  const virtualArches = archMapper(VIRTUAL_ARCH_PREFIX, cudaCapabilities);

  return ok({
    cudaCapabilities,
    enableForwardCompat,
    forwardCapability,
    capabilitiesAndForward: enableForwardCompat ? [...cudaCapabilities, forwardCapability] : [...cudaCapabilities],
    archNames,
    realArches,
    virtualArches,
    arches: enableForwardCompat ? [...realArches, ...archMapper(VIRTUAL_ARCH_PREFIX, [newest])] : [...realArches],
    gencode: [
      ...gencodeMapper(REAL_ARCH_PREFIX, cudaCapabilities),
      ...(enableForwardCompat ? gencodeMapper(VIRTUAL_ARCH_PREFIX, [newest]) : [])
    ]
  });
}

/**
 * Resolve the environment for a toolkit version and expand the requested
 * capabilities, defaulting to every capability the toolkit supports.
 */
export function resolveCapabilities(
  gpus: readonly GpuDescriptor[],
  cudaVersion: string,
  options: ResolveOptions = {}
): Result<ResolvedCapabilities, CapabilityError> {
  return resolveEnvironment(gpus, cudaVersion).andThen((env): Result<ResolvedCapabilities, CapabilityError> => {
    const cudaCapabilities = options.cudaCapabilities ?? env.supportedCapabilities;

    if (options.cudaCapabilities === undefined && cudaCapabilities.length === 0) {
      return err(new InvalidArgumentError('cudaVersion', env.cudaVersion, `no GPU in the table supports CUDA ${env.cudaVersion}`));
    }

    return formatCapabilities(env, {
      cudaCapabilities,
      enableForwardCompat: options.enableForwardCompat
    }).map((result): ResolvedCapabilities => ({
      cudaVersion: env.cudaVersion,
      capabilityToName: Object.fromEntries(env.capabilityToName),
      archNameToCapabilities: Object.fromEntries(
        [...env.archNameToCapabilities].map(([name, capabilities]) => [name, [...capabilities]])
      ),
      ...result
    }));
  });
}

/**
 * CapabilityResolver - resolves architecture flags against one GPU table
 */
export class CapabilityResolver {
  constructor(private readonly table: GpuTable) {}

  /**
   * Supported GPUs and lookup maps for a toolkit version
   */
  resolveEnvironment(cudaVersion: string): Result<ResolvedEnvironment, CapabilityError> {
    return resolveEnvironment(this.table.gpus, cudaVersion);
  }

  /**
   * Expand an explicit request for a toolkit version
   */
  formatCapabilities(cudaVersion: string, request: CapabilityRequest): Result<CapabilityResult, CapabilityError> {
    return this.resolveEnvironment(cudaVersion).andThen((env) => formatCapabilities(env, request));
  }

  /**
   * Expand the request, or every supported capability when none is given
   */
  resolve(cudaVersion: string, options: ResolveOptions = {}): Result<ResolvedCapabilities, CapabilityError> {
    return resolveCapabilities(this.table.gpus, cudaVersion, options);
  }
}
