import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { readUtf8File } from '../src/boundaries/document-reader';
import { InputError } from '../src/errors/index';

const tempDirs: string[] = [];

function makeTempDir(prefix: string): string {
  const dir = mkdtempSync(path.join(tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

function tempFile(content: string | Buffer): string {
  const dir = makeTempDir('mdchunk-doc-');
  const file = path.join(dir, 'doc.md');
  writeFileSync(file, content);
  return file;
}

describe('readUtf8File', () => {
  it('reads UTF-8 text', () => {
    expect(readUtf8File(tempFile('héllo wörld'))).toBe('héllo wörld');
  });

  it('drops a leading byte order mark', () => {
    const file = tempFile(Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('abc')]));
    expect(readUtf8File(file)).toBe('abc');
  });

  it('rejects invalid UTF-8', () => {
    const file = tempFile(Buffer.from([0x61, 0xff, 0x62]));
    expect(() => readUtf8File(file, 'input file')).toThrow(/is not valid UTF-8/);
  });

  it('reports a missing file as an input error', () => {
    const missing = path.join(tmpdir(), 'mdchunk-missing', 'doc.md');
    try {
      readUtf8File(missing, 'input file');
      expect.fail('expected readUtf8File to throw');
    } catch (e: unknown) {
      expect(e).toBeInstanceOf(InputError);
      if (e instanceof InputError) {
        expect(e.code).toBe('INPUT_ERROR');
        expect(e.path).toBe(missing);
        expect(e.message).toMatch(/^Cannot read input file /);
      }
    }
  });
});
