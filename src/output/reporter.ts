import chalk from 'chalk';
import { RECORD_DELIMITER } from '../config/constants';
import { charLength } from '../chunking/utils';
import type { Chunk } from '../chunking/types';

export function formatRecordHeader(chunk: Chunk): string {
  return `${RECORD_DELIMITER} ${charLength(chunk.content)} ${RECORD_DELIMITER}`;
}

/*
 * One record per chunk: separator line, chunk text, blank line.
 */
export function printChunks(chunks: readonly Chunk[]) {
  for (const chunk of chunks) {
    console.log(chalk.dim(formatRecordHeader(chunk)));
    console.log(chunk.content);
    console.log('');
  }
}
