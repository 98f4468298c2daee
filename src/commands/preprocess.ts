import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'path';
import type { CommandResult, PreprocessCommandOptions } from '../types/index.js';
import type { OutputPort } from '../core/ports/output.js';
import { loadProcessingConfig } from '../core/config.js';
import { ShellPreprocessor } from '../core/preprocessor.js';
import { createCliOutput } from '../cli/clack-output-adapter.js';
import { exists, isFile } from '../utils/fs.js';
import { handleError, withErrorHandling } from '../utils/errors.js';
import { DEFAULTS } from '../constants/index.js';

/**
 * Commander parser for --max-depth
 */
export function parseMaxDepth(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  const depth = Number.parseInt(value, 10);
  if (depth < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return depth;
}

/**
 * Expand `inputPath` into `outputPath`, reporting through `output`
 */
export async function runPreprocess(
  inputPath: string,
  outputPath: string,
  options: PreprocessCommandOptions,
  output: OutputPort
): Promise<CommandResult> {
  if (!(await exists(inputPath))) {
    return { success: false, error: `Input file does not exist: ${inputPath}` };
  }
  if (!(await isFile(inputPath))) {
    return { success: false, error: `Input path is not a file: ${inputPath}` };
  }

  try {
    const { config, configFile, warnings } = await loadProcessingConfig(inputPath, options);
    if (config.debug && configFile) {
      output.info(`Using config file ${configFile}`);
    }
    for (const warning of warnings) {
      output.warn(warning);
    }

    await new ShellPreprocessor(config).processFile(inputPath, outputPath);

    if (config.debug) {
      output.success(`Processed ${inputPath} -> ${outputPath}`);
    }
    return { success: true, data: { outputPath: resolve(outputPath) }, warnings };
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Setup the preprocessing action on the root program
 *
 * shpp takes its input and output as positional arguments; there are no subcommands.
 */
export function setupPreprocessCommand(program: Command): void {
  program
    .argument('<input>', 'input file to process')
    .argument('<output>', 'output file path')
    .option('-d, --debug', 'add include markers to the output')
    .option('--max-depth <n>', `maximum include depth (default: ${DEFAULTS.MAX_INCLUDE_DEPTH})`, parseMaxDepth)
    .option('--base-dir <dir>', "sandbox root for includes (default: the input file's directory)")
    .option('-c, --config <file>', 'YAML config file (default: .shpp.yml beside the input, if present)')
    .action(withErrorHandling(async (input: string, outputPath: string, options: PreprocessCommandOptions) => {
      const output = createCliOutput();
      const result = await runPreprocess(input, outputPath, options, output);
      if (!result.success) {
        output.error(result.error ?? 'Preprocessing failed');
        process.exitCode = 1;
      }
    }));
}
