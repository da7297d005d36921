/**
 * Configuration constants
 */

export const DEFAULT_CONFIG_FILENAME = '.mdchunk.ini';
export const DEFAULT_CHUNK_LIMIT = 1500;

// Code blocks longer than this are replaced by the placeholder
export const ELISION_THRESHOLD = 80;
export const ELISION_PLACEHOLDER = 'listing omitted; please see the original source';

export const RECORD_DELIMITER = '--- --- ---';
export const LOG_PREFIX = '[mdchunk]';
