import type { Command } from 'commander';
import { existsSync, writeFileSync } from 'fs';
import * as path from 'path';
import { DEFAULT_CHUNK_LIMIT, DEFAULT_CONFIG_FILENAME } from '../config/constants';

// Template for .mdchunk.ini configuration file
const CONFIG_TEMPLATE = `# mdchunk configuration
# Maximum characters per chunk
ChunkLimit=${DEFAULT_CHUNK_LIMIT}

# How merged leaves are joined: space or none
JoinPolicy=space

# Optional CSV of from,to substitutions (relative to this file)
# Substitutions=substitutions.csv
# SubstitutionsHeader=true
`;

interface InitOptions {
    force?: boolean;
}

/**
 * Registers the 'init' command with Commander.
 * This command writes a starter .mdchunk.ini in the current directory.
 */
export function registerInitCommand(program: Command): void {
    program
        .command('init')
        .description('Create a .mdchunk.ini configuration file')
        .option('--force', 'Overwrite an existing configuration file')
        .action((opts: InitOptions) => {
            const configPath = path.join(process.cwd(), DEFAULT_CONFIG_FILENAME);

            if (!opts.force && existsSync(configPath)) {
                console.error(`Error: ${DEFAULT_CONFIG_FILENAME} already exists.`);
                console.error(`\nUse --force to overwrite it.`);
                process.exit(1);
            }

            try {
                writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
            } catch (e: unknown) {
                const err = e instanceof Error ? e : new Error(String(e));
                console.error(`Error: Failed to write configuration file: ${err.message}`);
                process.exit(1);
            }

            console.log(`✓ Created ${DEFAULT_CONFIG_FILENAME}`);
        });
}
