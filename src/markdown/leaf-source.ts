import type { Nodes } from 'mdast';
import { remark } from 'remark';
import type { Leaf } from '../chunking/types';

/**
 * Produces the text-bearing leaves of a document in depth-first order.
 * The returned sequence is lazy and is consumed once.
 */
export interface LeafSource {
  leaves(text: string): Iterable<Leaf>;
}

/**
 * CommonMark leaf source backed by remark. The parser accepts any input;
 * markup it cannot interpret comes back as plain text.
 */
export class RemarkLeafSource implements LeafSource {
  private readonly processor = remark();

  *leaves(text: string): Generator<Leaf> {
    yield* walk(this.processor.parse(text));
  }
}

function* walk(node: Nodes): Generator<Leaf> {
  switch (node.type) {
    case 'text':
      yield { kind: 'text', value: node.value };
      return;
    case 'inlineCode':
      yield { kind: 'inlineCode', value: node.value };
      return;
    case 'code':
      // Every listing line keeps its line ending, the last one included
      yield { kind: 'codeBlock', value: node.value ? `${node.value}\n` : '' };
      return;
  }

  if ('children' in node) {
    for (const child of node.children) {
      yield* walk(child);
    }
  }
}
