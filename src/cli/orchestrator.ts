import * as path from "path";
import { MarkdownChunker } from "../chunking/chunker";
import type { Chunk, ChunkingStrategy } from "../chunking/types";
import { readUtf8File } from "../boundaries/document-reader";
import { loadSubstitutionTable } from "../boundaries/substitution-loader";
import { applySubstitutions } from "../substitution/substitution-table";
import { ValidationError } from "../errors/index";
import type { CliOptions } from "../schemas/cli-schemas";
import type { Config } from "../schemas/config-schemas";
import * as logger from "../output/logger";
import type { ChunkRunOptions } from "./types";

/*
 * Merges CLI options over the loaded config. CLI paths resolve against the
 * working directory; the config loader has already resolved its own.
 */
export function resolveRunOptions(
  cli: CliOptions,
  positionalInput: string | undefined,
  config: Config,
  cwd: string = process.cwd()
): ChunkRunOptions {
  if (cli.input && positionalInput && cli.input !== positionalInput) {
    throw new ValidationError(
      `Conflicting inputs: --input ${cli.input} and ${positionalInput}`
    );
  }
  const input = cli.input ?? positionalInput;
  if (!input) {
    throw new ValidationError("No input file given. Pass a path or use --input <path>.");
  }

  const substitutionsPath = cli.substitutions
    ? path.resolve(cwd, cli.substitutions)
    : config.substitutionsPath;

  return {
    inputPath: path.resolve(cwd, input),
    limit: cli.limit ?? config.chunkLimit,
    joinPolicy: cli.join ?? config.joinPolicy,
    substitutionsPath,
    // --no-header only ever turns the header off
    substitutionsHeader: cli.header && config.substitutionsHeader,
  };
}

/*
 * One run: read the document, apply substitutions, chunk.
 */
export function chunkFile(
  options: ChunkRunOptions,
  strategy: ChunkingStrategy = new MarkdownChunker()
): Chunk[] {
  let content = readUtf8File(options.inputPath, "input file");

  if (options.substitutionsPath) {
    const table = loadSubstitutionTable(options.substitutionsPath, {
      hasHeader: options.substitutionsHeader,
    });
    content = applySubstitutions(content, table);
  }

  const chunks = strategy.chunk(content, {
    limit: options.limit,
    joinPolicy: options.joinPolicy,
  });
  logger.debug(
    `${strategy.name}: ${chunks.length} chunk(s) from ${options.inputPath} (limit ${options.limit})`
  );
  return chunks;
}
