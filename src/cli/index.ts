#!/usr/bin/env node

import { Command } from 'commander';
import { OutputFormatter, OutputFormat } from './utils/output.js';
import { createFlagsCommand } from './commands/flags.js';
import { createGpusCommand } from './commands/gpus.js';
import { createDoctorCommand } from './commands/doctor.js';

const program = new Command();
const output = new OutputFormatter();

program
  .name('cuda-arch-flags')
  .description('Resolve CUDA GPU architectures and nvcc gencode flags for a toolkit version')
  .version('1.0.0')
  .option('--json', 'Output results in JSON format')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-q, --quiet', 'Suppress non-error logging')
  .option('--config <path>', 'Configuration file (default: ./cuda-arch.config.json)')
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts().json) {
      output.setFormat(OutputFormat.JSON);
    }
  });

program.addCommand(createFlagsCommand());
program.addCommand(createGpusCommand());
program.addCommand(createDoctorCommand());

try {
  program.parse(process.argv);
} catch (error) {
  output.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
}
