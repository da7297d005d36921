import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { CONFIG_SCHEMA, type Config } from '../schemas/config-schemas';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';
import { DEFAULT_CONFIG_FILENAME } from '../config/constants';
import type { JoinPolicy } from '../chunking/types';

enum ConfigKey {
  CHUNK_LIMIT = 'ChunkLimit',
  JOIN_POLICY = 'JoinPolicy',
  SUBSTITUTIONS = 'Substitutions',
  SUBSTITUTIONS_HEADER = 'SubstitutionsHeader',
}

function parseBoolean(key: string, value: string): boolean {
  const v = value.toLowerCase();
  if (v === 'true' || v === 'yes' || v === '1') return true;
  if (v === 'false' || v === 'no' || v === '0') return false;
  throw new ConfigError(`Invalid ${key} value: ${value}`);
}

/**
 * Load and validate configuration from .mdchunk.ini.
 * The default file is optional; an explicitly named file must exist.
 */
export function loadConfig(cwd: string = process.cwd(), configPath?: string): Config {
  const iniPath = configPath
    ? path.resolve(cwd, configPath)
    : path.resolve(cwd, DEFAULT_CONFIG_FILENAME);

  if (!existsSync(iniPath)) {
    if (configPath) {
      throw new ConfigError(`Missing configuration file at ${iniPath}`);
    }
    return CONFIG_SCHEMA.parse({ configDir: cwd });
  }

  const configDir = path.dirname(iniPath);

  let chunkLimitRaw: number | undefined;
  let joinPolicyRaw: JoinPolicy | undefined;
  let substitutionsRaw: string | undefined;
  let substitutionsHeaderRaw: boolean | undefined;

  try {
    const raw = readFileSync(iniPath, 'utf-8');

    for (const rawLine of raw.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (!line || line.startsWith('#') || line.startsWith(';')) continue;

      const m = line.match(/^([A-Za-z0-9_.-]+)\s*=\s*(.*)$/);
      if (!m || !m[1]) continue;

      const key = m[1];
      const val = (m[2] || '').replace(/^"|"$/g, '').replace(/^'|'$/g, '');

      switch (key) {
        case ConfigKey.CHUNK_LIMIT as string: {
          const parsed = Number(val);
          if (!Number.isInteger(parsed) || parsed < 1) {
            throw new ConfigError(`Invalid ChunkLimit value: ${val}`);
          }
          chunkLimitRaw = parsed;
          break;
        }
        case ConfigKey.JOIN_POLICY as string:
          if (val !== 'space' && val !== 'none') {
            throw new ConfigError(`Invalid JoinPolicy value: ${val}`);
          }
          joinPolicyRaw = val;
          break;
        case ConfigKey.SUBSTITUTIONS as string:
          substitutionsRaw = val;
          break;
        case ConfigKey.SUBSTITUTIONS_HEADER as string:
          substitutionsHeaderRaw = parseBoolean(key, val);
          break;
      }
    }
  } catch (e: unknown) {
    if (e instanceof ConfigError) throw e;
    const err = handleUnknownError(e, 'Reading config file');
    throw new ConfigError(`Failed to read config file: ${err.message}`);
  }

  const substitutionsPath = substitutionsRaw
    ? path.resolve(configDir, substitutionsRaw)
    : undefined;

  const configData = {
    chunkLimit: chunkLimitRaw,
    joinPolicy: joinPolicyRaw,
    substitutionsPath,
    substitutionsHeader: substitutionsHeaderRaw,
    configDir,
  };

  try {
    return CONFIG_SCHEMA.parse(configData);
  } catch (e: unknown) {
    if (e instanceof Error && 'issues' in e) {
      // Zod error
      throw new ValidationError(`Invalid configuration: ${e.message}`);
    }
    const err = handleUnknownError(e, 'Config validation');
    throw new ConfigError(`Configuration validation failed: ${err.message}`);
  }
}
