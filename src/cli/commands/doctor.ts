/**
 * Doctor Command
 *
 * Audits a GPU table and, when a toolkit version is configured, checks that
 * it resolves.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigService, type ConfigOverrides } from '../../services/config/ConfigService.js';
import { GpuTable } from '../../services/hardware/GpuTable.js';
import { resolveEnvironment } from '../../services/hardware/CapabilityResolver.js';
import type { GlobalOptions } from '../utils/context.js';
import { OutputFormatter, OutputFormat } from '../utils/output.js';

interface DoctorOptions {
  cudaVersion?: string;
  gpuTable?: string;
}

export interface DoctorReport {
  source: string;
  gpuCount: number;
  cudaVersion: string | null;
  supportedCount: number | null;
  problems: string[];
}

/**
 * Run every check and collect the problems instead of stopping at the first
 */
export function runDoctor(
  overrides: ConfigOverrides,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): DoctorReport {
  const report: DoctorReport = {
    source: overrides.gpuTablePath ?? 'bundled',
    gpuCount: 0,
    cudaVersion: null,
    supportedCount: null,
    problems: []
  };

  const config = new ConfigService(cwd, env).resolve(overrides);
  if (config.isErr()) {
    report.problems.push(config.error.message);
    return report;
  }

  const table = GpuTable.load(config.value.gpuTablePath);
  if (table.isErr()) {
    report.problems.push(table.error.message);
    return report;
  }

  report.source = table.value.source;
  report.gpuCount = table.value.size;
  report.problems.push(...table.value.audit().map((problem) => problem.message));

  const cudaVersion = config.value.cudaVersion;
  if (cudaVersion !== undefined) {
    report.cudaVersion = cudaVersion;
    const resolved = resolveEnvironment(table.value.gpus, cudaVersion);
    if (resolved.isErr()) {
      report.problems.push(resolved.error.message);
    } else {
      report.supportedCount = resolved.value.supportedGpus.length;
      if (report.supportedCount === 0) {
        report.problems.push(`No GPU in the table supports CUDA ${cudaVersion}`);
      }
    }
  }

  return report;
}

export function createDoctorCommand(): Command {
  return new Command('doctor')
    .description('Check the GPU table and configuration for problems')
    .option('--cuda-version <version>', 'Also check this CUDA toolkit version')
    .option('--gpu-table <path>', 'Check an alternative GPU table JSON file')
    .action((options: DoctorOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const output = new OutputFormatter(globals.json ? OutputFormat.JSON : OutputFormat.HUMAN);

      const report = runDoctor({
        cudaVersion: options.cudaVersion,
        gpuTablePath: options.gpuTable,
        configPath: globals.config
      });

      if (output.getFormat() === OutputFormat.JSON) {
        output.json(report);
      } else {
        console.log(chalk.bold('\nCUDA architecture doctor\n'));
        console.log(chalk.dim(`  Table: ${report.source}`));
        console.log(chalk.dim(`  GPUs: ${report.gpuCount}`));
        if (report.cudaVersion !== null && report.supportedCount !== null) {
          console.log(chalk.dim(`  Supported by CUDA ${report.cudaVersion}: ${report.supportedCount}`));
        }
        console.log();

        if (report.problems.length === 0) {
          output.success('No problems found');
        } else {
          for (const problem of report.problems) {
            console.log(chalk.red('✗') + ` ${problem}`);
          }
        }
      }

      if (report.problems.length > 0) {
        process.exit(1);
      }
    });
}
