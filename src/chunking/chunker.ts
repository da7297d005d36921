import { DEFAULT_CHUNK_LIMIT, ELISION_THRESHOLD } from "../config/constants";
import { RemarkLeafSource, type LeafSource } from "../markdown/leaf-source";
import { accumulateChunks } from "./accumulator";
import { elideCodeBlock } from "./elider";
import type { Chunk, ChunkingOptions, ChunkingStrategy, Leaf } from "./types";

const DEFAULT_OPTIONS: Required<ChunkingOptions> = {
  limit: DEFAULT_CHUNK_LIMIT,
  joinPolicy: "space",
  elisionThreshold: ELISION_THRESHOLD,
};

export class MarkdownChunker implements ChunkingStrategy {
  readonly name = "markdown";

  constructor(private readonly source: LeafSource = new RemarkLeafSource()) {}

  chunk(content: string, options?: ChunkingOptions): Chunk[] {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const payloads = this.payloads(content, opts.elisionThreshold);
    return accumulateChunks(payloads, {
      limit: opts.limit,
      joinPolicy: opts.joinPolicy,
    });
  }

  /*
   * Leaf payloads in document order, with code blocks elided.
   */
  *payloads(content: string, elisionThreshold = ELISION_THRESHOLD): Generator<string> {
    for (const leaf of this.source.leaves(content)) {
      yield payloadOf(leaf, elisionThreshold);
    }
  }
}

function payloadOf(leaf: Leaf, elisionThreshold: number): string {
  return leaf.kind === "codeBlock"
    ? elideCodeBlock(leaf.value, elisionThreshold)
    : leaf.value;
}
