export type LeafKind = 'text' | 'inlineCode' | 'codeBlock';

export interface Leaf {
  kind: LeafKind;
  value: string;
}

export interface Chunk {
  content: string;
  index: number;
  leafCount: number; // Number of leaves joined into this chunk
}

/**
 * How adjacent leaves are joined inside a chunk: `space` inserts a single
 * space between them, `none` concatenates them directly.
 */
export type JoinPolicy = 'space' | 'none';

export interface AccumulatorOptions {
  limit: number; // Maximum characters per chunk
  joinPolicy?: JoinPolicy;
}

export interface ChunkingOptions {
  limit?: number;
  joinPolicy?: JoinPolicy;
  elisionThreshold?: number; // Code blocks longer than this are elided
}

export interface ChunkingStrategy {
  readonly name: string;
  chunk(content: string, options?: ChunkingOptions): Chunk[];
}
