import type { Command } from 'commander';
import { loadConfig } from '../boundaries/config-loader';
import { parseCliOptions } from '../boundaries/cli-parser';
import { handleUnknownError } from '../errors/index';
import { printChunks } from '../output/reporter';
import * as logger from '../output/logger';
import { DEFAULT_CHUNK_LIMIT } from '../config/constants';
import { chunkFile, resolveRunOptions } from './orchestrator';

/*
 * Registers the main chunking command with Commander.
 * Any fatal condition prints a diagnostic and exits with code 1.
 */
export function registerMainCommand(program: Command): void {
  program
    .option('-i, --input <path>', 'Markdown file to chunk')
    .option('-s, --substitutions <path>', 'CSV file of from,to substitutions applied before parsing')
    .option('-l, --limit <chars>', `Maximum characters per chunk (default ${DEFAULT_CHUNK_LIMIT})`)
    .option('--join <policy>', 'How merged leaves are joined: space or none')
    .option('--no-header', 'The substitution table has no header row')
    .option('--config <path>', 'Path to a .mdchunk.ini config file')
    .option('-v, --verbose', 'Print diagnostics to stderr')
    .argument('[input]', 'Markdown file to chunk')
    .action((input: string | undefined) => {
      let runOptions;
      try {
        const cliOptions = parseCliOptions(program.opts());
        logger.setVerboseMode(cliOptions.verbose);
        const config = loadConfig(process.cwd(), cliOptions.config);
        runOptions = resolveRunOptions(cliOptions, input, config);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing options');
        logger.error(err.message);
        process.exit(1);
      }

      let chunks;
      try {
        chunks = chunkFile(runOptions);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Chunking document');
        logger.error(err.message);
        process.exit(1);
      }

      printChunks(chunks);
    });
}
