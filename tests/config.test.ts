import { describe, it, expect, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { loadConfig } from '../src/boundaries/config-loader';
import { DEFAULT_CONFIG_FILENAME } from '../src/config/constants';
import { ConfigError } from '../src/errors/index';

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

function withConfig(ini: string): string {
  const cwd = makeTempDir('mdchunk-');
  writeFileSync(path.join(cwd, DEFAULT_CONFIG_FILENAME), ini);
  return cwd;
}

describe('Config (.mdchunk.ini)', () => {
  it('uses defaults when no config file exists', () => {
    const cwd = makeTempDir('mdchunk-');
    expect(loadConfig(cwd)).toEqual({
      chunkLimit: 1500,
      joinPolicy: 'space',
      substitutionsHeader: true,
      configDir: cwd,
    });
  });

  it('errors when an explicitly named config file is missing', () => {
    const cwd = makeTempDir('mdchunk-');
    expect(() => loadConfig(cwd, 'custom.ini')).toThrow(/Missing configuration file/);
  });

  it('parses every key and trims values', () => {
    const cwd = withConfig(`
      # chunking
      ChunkLimit = 200
      JoinPolicy = none
      ; substitutions
      Substitutions = "subs.csv"
      SubstitutionsHeader = false
    `);
    const cfg = loadConfig(cwd);
    expect(cfg.chunkLimit).toBe(200);
    expect(cfg.joinPolicy).toBe('none');
    expect(cfg.substitutionsPath).toBe(path.join(cwd, 'subs.csv'));
    expect(cfg.substitutionsHeader).toBe(false);
  });

  it('ignores unknown keys', () => {
    const cwd = withConfig('Colour=blue\nChunkLimit=42\n');
    expect(loadConfig(cwd).chunkLimit).toBe(42);
  });

  it('resolves Substitutions relative to the config file', () => {
    const cwd = makeTempDir('mdchunk-');
    const confDir = path.join(cwd, 'conf');
    mkdirSync(confDir);
    writeFileSync(path.join(confDir, 'chunk.ini'), 'Substitutions=tables/subs.csv\n');
    const cfg = loadConfig(cwd, 'conf/chunk.ini');
    expect(cfg.configDir).toBe(confDir);
    expect(cfg.substitutionsPath).toBe(path.join(confDir, 'tables', 'subs.csv'));
  });

  it('rejects a ChunkLimit that is not a positive integer', () => {
    expect(() => loadConfig(withConfig('ChunkLimit=abc\n'))).toThrow(ConfigError);
    expect(() => loadConfig(withConfig('ChunkLimit=0\n'))).toThrow(/Invalid ChunkLimit value: 0/);
  });

  it('rejects an unknown JoinPolicy', () => {
    expect(() => loadConfig(withConfig('JoinPolicy=tabs\n'))).toThrow(ConfigError);
    expect(() => loadConfig(withConfig('JoinPolicy=tabs\n'))).toThrow(/Invalid JoinPolicy value: tabs/);
  });

  it('rejects a SubstitutionsHeader that is not a boolean', () => {
    expect(() => loadConfig(withConfig('SubstitutionsHeader=maybe\n'))).toThrow(
      /Invalid SubstitutionsHeader value: maybe/
    );
  });
});
