import { Command } from 'commander';
import { fetchCommand } from './commands/fetch.js';
import { checkCommand } from './commands/check.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name('canvas-digest')
    .description('List Canvas courses and their assignments sorted by due date')
    .version('1.0.0');

  program.addCommand(fetchCommand);
  program.addCommand(checkCommand);

  return program;
}
