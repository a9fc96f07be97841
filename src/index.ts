export {
  CapabilityResolver,
  FORWARD_SUFFIX,
  REAL_ARCH_PREFIX,
  VIRTUAL_ARCH_PREFIX,
  buildLookups,
  filterSupportedGpus,
  formatCapabilities,
  isSupported,
  parseCudaVersion,
  resolveCapabilities,
  resolveEnvironment
} from './services/hardware/CapabilityResolver.js';
export type { CudaVersion, ResolveOptions } from './services/hardware/CapabilityResolver.js';
export { GpuTable, BUNDLED_GPU_TABLE_PATH } from './services/hardware/GpuTable.js';
export type { TableProblem } from './services/hardware/GpuTable.js';
export {
  ConfigService,
  CONFIG_FILE_NAME,
  ENV_VARS,
  requireCudaVersion
} from './services/config/ConfigService.js';
export type { ConfigOverrides, ResolverConfig } from './services/config/ConfigService.js';
export {
  CapabilityError,
  ConfigError,
  ConfigInvariantViolationError,
  ErrorCategory,
  InvalidArgumentError,
  NotFoundError
} from './lib/errors/CapabilityErrors.js';
export type { NotFoundReason } from './lib/errors/CapabilityErrors.js';
export { Logger } from './lib/logger.js';
export type { LogLevel, LoggerConfig } from './lib/logger.js';
export { compareVersions, parseVersion, versionAtLeast, versionOlder } from './lib/version-utils.js';
export type { GpuDescriptor } from './models/GpuDescriptor.js';
export type {
  CapabilityRequest,
  CapabilityResult,
  ResolvedCapabilities,
  ResolvedEnvironment
} from './models/CapabilityResult.js';
