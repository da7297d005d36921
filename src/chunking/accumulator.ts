import { ValidationError } from "../errors/index";
import type { AccumulatorOptions, Chunk } from "./types";
import { charLength, separatorFor } from "./utils";

/**
 * Greedily merges consecutive payloads into chunks of at most
 * `options.limit` characters. A payload is never split: one that is longer
 * than the limit on its own becomes a single oversized chunk.
 */
export function accumulateChunks(
  payloads: Iterable<string>,
  options: AccumulatorOptions
): Chunk[] {
  const { limit } = options;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`Chunk limit must be a positive integer, got ${limit}`);
  }
  const separator = separatorFor(options.joinPolicy ?? "space");
  const separatorLength = charLength(separator);

  const chunks: Chunk[] = [];
  let buffer = "";
  let bufferLength = 0;
  let leafCount = 0;

  const flush = (): void => {
    chunks.push({ content: buffer, index: chunks.length, leafCount });
    buffer = "";
    bufferLength = 0;
    leafCount = 0;
  };

  for (const payload of payloads) {
    if (!payload) continue;
    const payloadLength = charLength(payload);

    if (leafCount > 0 && bufferLength + separatorLength + payloadLength > limit) {
      flush();
    }

    if (leafCount > 0) {
      buffer += separator;
      bufferLength += separatorLength;
    }
    buffer += payload;
    bufferLength += payloadLength;
    leafCount++;
  }

  if (leafCount > 0) {
    flush();
  }

  return chunks;
}
