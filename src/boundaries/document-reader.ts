import { readFileSync } from 'fs';
import { InputError, handleUnknownError } from '../errors/index';

const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Reads a file fully and decodes it as strict UTF-8.
 * Throws InputError when the file is missing, unreadable or not valid UTF-8.
 */
export function readUtf8File(filePath: string, description = 'file'): string {
  let bytes: Buffer;
  try {
    bytes = readFileSync(filePath);
  } catch (e: unknown) {
    const err = handleUnknownError(e, `Reading ${description}`);
    throw new InputError(`Cannot read ${description} ${filePath}: ${err.message}`, filePath);
  }

  try {
    return decoder.decode(bytes);
  } catch (e: unknown) {
    const err = handleUnknownError(e, `Decoding ${description}`);
    throw new InputError(`${description} ${filePath} is not valid UTF-8: ${err.message}`, filePath);
  }
}
