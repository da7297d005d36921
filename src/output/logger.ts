/**
 * Logger utility for mdchunk
 *
 * Chunk records are the only thing a run writes to stdout; every
 * diagnostic goes to stderr.
 */
import chalk from 'chalk';
import { LOG_PREFIX } from '../config/constants';

let verboseMode = false;

/**
 * Enable or disable verbose mode.
 * When enabled, debug() prints its messages.
 */
export function setVerboseMode(verbose: boolean): void {
    verboseMode = verbose;
}

export function isVerboseMode(): boolean {
    return verboseMode;
}

/**
 * Diagnostic detail to stderr. Printed only in verbose mode.
 */
export function debug(message: string): void {
    if (verboseMode) {
        console.error(chalk.gray(`${LOG_PREFIX} ${message}`));
    }
}

/**
 * Log warning to stderr.
 */
export function warn(message: string): void {
    console.warn(chalk.yellow(`${LOG_PREFIX} Warning: ${message}`));
}

/**
 * Log error to stderr.
 */
export function error(message: string): void {
    console.error(chalk.red(`Error: ${message}`));
}
