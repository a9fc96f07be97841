import { Logger, isLogLevel, type LogLevel } from '../../lib/logger.js';
import type { CapabilityError } from '../../lib/errors/CapabilityErrors.js';
import { Result } from '../../lib/result-types.js';
import {
  ConfigService,
  type ConfigOverrides,
  type ResolverConfig
} from '../../services/config/ConfigService.js';
import { GpuTable } from '../../services/hardware/GpuTable.js';

/**
 * Options registered on the root program
 */
export interface GlobalOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
}

/**
 * Everything a command needs once configuration is resolved
 */
export interface CommandContext {
  config: ResolverConfig;
  table: GpuTable;
  logger: Logger;
}

/**
 * Console log level: LOG_LEVEL wins, then --quiet, then --verbose
 */
export function consoleLevelFor(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): LogLevel {
  const fromEnv = env.LOG_LEVEL?.toLowerCase();
  if (fromEnv !== undefined && isLogLevel(fromEnv)) {
    return fromEnv;
  }
  if (options.quiet) {
    return 'error';
  }
  if (options.verbose) {
    return 'debug';
  }
  return 'warn';
}

/**
 * Resolve configuration, open the logger and load the GPU table
 */
export function createContext(
  overrides: ConfigOverrides,
  options: GlobalOptions,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): Result<CommandContext, CapabilityError> {
  const configService = new ConfigService(cwd, env);

  return configService
    .resolve({ ...overrides, configPath: options.config })
    .andThen((config) => {
      const logger = new Logger({
        logDir: config.logDir,
        consoleLevel: consoleLevelFor(options, env)
      });
      logger.debug('Configuration resolved', { ...config });

      return GpuTable.load(config.gpuTablePath).map((table) => {
        logger.debug('GPU table loaded', { source: table.source, gpus: table.size });
        return { config, table, logger };
      });
    });
}
