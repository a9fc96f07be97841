/**
 * Configuration Service
 *
 * Resolves the toolkit version, requested capabilities and forward-compat
 * switch from CLI flags, environment variables (.env aware) and
 * cuda-arch.config.json, in that order of precedence.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, resolve } from 'path';
import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../../lib/errors/CapabilityErrors.js';
import { Result, ok, err, trySync } from '../../lib/result-types.js';
import { isValidVersion } from '../../lib/version-utils.js';

export const CONFIG_FILE_NAME = 'cuda-arch.config.json';

/**
 * Environment variable names
 */
export const ENV_VARS = {
  cudaVersion: 'CUDA_VERSION',
  cudaCapabilities: 'CUDA_CAPABILITIES',
  cudaForwardCompat: 'CUDA_FORWARD_COMPAT',
  gpuTablePath: 'CUDA_ARCH_GPU_TABLE',
  logDir: 'CUDA_ARCH_LOG_DIR'
} as const;

export const ConfigFileSchema = z.object({
  cudaVersion: z.string().min(1).optional().describe('CUDA toolkit version, e.g. 12.0'),
  cudaCapabilities: z.array(z.string().min(1)).min(1).optional().describe('Capabilities to build for, newest last'),
  cudaForwardCompat: z.boolean().optional().describe('Emit a PTX target for the newest capability'),
  gpuTablePath: z.string().min(1).optional().describe('Alternative GPU table JSON file'),
  logDir: z.string().min(1).optional().describe('Directory for the JSON Lines log')
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Effective configuration after all sources are merged
 */
export interface ResolverConfig {
  cudaVersion?: string;
  cudaCapabilities?: string[];
  cudaForwardCompat: boolean;
  gpuTablePath?: string;
  logDir?: string;
}

/**
 * Values given on the command line; lists are still raw strings here
 */
export interface ConfigOverrides {
  cudaVersion?: string;
  cudaCapabilities?: string;
  cudaForwardCompat?: boolean;
  gpuTablePath?: string;
  configPath?: string;
}

/**
 * Split "7.5,8.6", "7.5;8.6" or "7.5 8.6" into capabilities
 */
export function parseCapabilityList(field: string, raw: string): Result<string[], ConfigError> {
  const capabilities = raw.split(/[\s,;]+/).filter(part => part.length > 0);

  if (capabilities.length === 0) {
    return err(new ConfigError(field, raw, 'expected at least one compute capability'));
  }

  const invalid = capabilities.find(capability => !isValidVersion(capability));
  if (invalid !== undefined) {
    return err(new ConfigError(field, raw, `"${invalid}" is not a compute capability such as 8.6`));
  }

  return ok(capabilities);
}

/**
 * Parse true/false/1/0/yes/no
 */
export function parseBoolean(field: string, raw: string): Result<boolean, ConfigError> {
  const normalized = raw.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) {
    return ok(true);
  }
  if (['false', '0', 'no'].includes(normalized)) {
    return ok(false);
  }
  return err(new ConfigError(field, raw, 'expected true or false'));
}

export class ConfigService {
  constructor(
    private readonly cwd: string = process.cwd(),
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * Load variables from an optional .env file in the working directory.
   * Variables already set in the environment win.
   */
  loadEnv(): Result<void, ConfigError> {
    const envPath = resolve(this.cwd, '.env');
    if (!existsSync(envPath)) {
      return ok(undefined);
    }

    return trySync(
      () => parseDotenv(readFileSync(envPath)),
      (error) => new ConfigError('.env', envPath, error instanceof Error ? error.message : String(error))
    ).map((parsed) => {
      for (const [key, value] of Object.entries(parsed)) {
        if (this.env[key] === undefined) {
          this.env[key] = value;
        }
      }
    });
  }

  /**
   * Load cuda-arch.config.json
   *
   * @param configPath - Explicit file; it must exist. Without it the default
   *   file in the working directory is optional.
   */
  loadFile(configPath?: string): Result<ConfigFile, ConfigError> {
    const path = this.resolvePath(configPath ?? CONFIG_FILE_NAME);

    if (!existsSync(path)) {
      return configPath === undefined
        ? ok({})
        : err(new ConfigError('config', path, 'configuration file not found'));
    }

    return trySync(
      (): unknown => JSON.parse(readFileSync(path, 'utf-8')),
      (error) => new ConfigError('config', path, `invalid JSON: ${error instanceof Error ? error.message : String(error)}`)
    ).andThen((data): Result<ConfigFile, ConfigError> => {
      const validation = ConfigFileSchema.safeParse(data);
      if (!validation.success) {
        const issue = validation.error.issues[0];
        const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
        return err(new ConfigError(where, data, issue ? issue.message : 'invalid configuration'));
      }
      return ok(validation.data);
    });
  }

  /**
   * Merge CLI overrides, environment and config file
   */
  resolve(overrides: ConfigOverrides = {}): Result<ResolverConfig, ConfigError> {
    return this.loadEnv()
      .andThen(() => this.loadFile(overrides.configPath))
      .andThen((file) => this.merge(overrides, file));
  }

  private merge(overrides: ConfigOverrides, file: ConfigFile): Result<ResolverConfig, ConfigError> {
    const capabilities = this.pickCapabilities(overrides, file);
    if (capabilities.isErr()) {
      return err(capabilities.error);
    }

    const forwardCompat = this.pickForwardCompat(overrides, file);
    if (forwardCompat.isErr()) {
      return err(forwardCompat.error);
    }

    const gpuTablePath = overrides.gpuTablePath ?? this.readEnv(ENV_VARS.gpuTablePath) ?? file.gpuTablePath;
    const logDir = this.readEnv(ENV_VARS.logDir) ?? file.logDir;

    return ok({
      cudaVersion: overrides.cudaVersion ?? this.readEnv(ENV_VARS.cudaVersion) ?? file.cudaVersion,
      cudaCapabilities: capabilities.value,
      cudaForwardCompat: forwardCompat.value,
      gpuTablePath: gpuTablePath === undefined ? undefined : this.resolvePath(gpuTablePath),
      logDir: logDir === undefined ? undefined : this.resolvePath(logDir)
    });
  }

  private pickCapabilities(overrides: ConfigOverrides, file: ConfigFile): Result<string[] | undefined, ConfigError> {
    if (overrides.cudaCapabilities !== undefined) {
      return parseCapabilityList('--capabilities', overrides.cudaCapabilities);
    }

    const fromEnv = this.readEnv(ENV_VARS.cudaCapabilities);
    if (fromEnv !== undefined) {
      return parseCapabilityList(ENV_VARS.cudaCapabilities, fromEnv);
    }

    if (file.cudaCapabilities !== undefined) {
      const invalid = file.cudaCapabilities.find(capability => !isValidVersion(capability));
      if (invalid !== undefined) {
        return err(new ConfigError('cudaCapabilities', file.cudaCapabilities, `"${invalid}" is not a compute capability such as 8.6`));
      }
    }
    return ok(file.cudaCapabilities);
  }

  private pickForwardCompat(overrides: ConfigOverrides, file: ConfigFile): Result<boolean, ConfigError> {
    if (overrides.cudaForwardCompat !== undefined) {
      return ok(overrides.cudaForwardCompat);
    }

    const fromEnv = this.readEnv(ENV_VARS.cudaForwardCompat);
    if (fromEnv !== undefined) {
      return parseBoolean(ENV_VARS.cudaForwardCompat, fromEnv);
    }

    return ok(file.cudaForwardCompat ?? true);
  }

  /**
   * Read a non-empty environment variable
   */
  private readEnv(name: string): string | undefined {
    const value = this.env[name]?.trim();
    return value ? value : undefined;
  }

  private resolvePath(path: string): string {
    return isAbsolute(path) ? path : resolve(this.cwd, path);
  }
}

/**
 * Require a toolkit version once all sources are merged
 */
export function requireCudaVersion(config: ResolverConfig): Result<string, ConfigError> {
  if (config.cudaVersion === undefined) {
    return err(new ConfigError(
      'cudaVersion',
      undefined,
      `no CUDA version given; pass --cuda-version, set ${ENV_VARS.cudaVersion} or add cudaVersion to ${CONFIG_FILE_NAME}`
    ));
  }
  return ok(config.cudaVersion);
}
