import { Command } from 'commander';
import { setupPreprocessCommand } from '../commands/preprocess.js';
import { getVersion } from '../utils/package.js';

/**
 * Build the shpp command-line program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('shpp')
    .description('Inline #include directives in shell scripts')
    .version(getVersion());

  setupPreprocessCommand(program);

  return program;
}
