import { Command } from 'commander';
import { version } from '../package.json';
import { registerNextCommand } from './commands/next';
import { registerCostsCommand } from './commands/costs';
import { registerRunCommand } from './commands/run';
import { registerCacheCommand } from './commands/cache';
import { registerDoctorCommand } from './commands/doctor';

export type { GlobalOptions } from './context';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('rebisect')
    .description('Pick the next revision to bisect by expected rebuild cost')
    .version(version)
    .enablePositionalOptions()
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--trace <file>', 'Append structured events to a JSONL file')
    .option('--yes', 'Automatically answer "yes" to all prompts')
    .option('--non-interactive', 'Disable interactive prompts');

  registerNextCommand(program);
  registerCostsCommand(program);
  registerRunCommand(program);
  registerCacheCommand(program);
  registerDoctorCommand(program);

  return program;
}
