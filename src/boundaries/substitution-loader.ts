import Papa from 'papaparse';
import { readUtf8File } from './document-reader';
import {
  buildSubstitutionTable,
  type SubstitutionRule,
  type SubstitutionTable,
} from '../substitution/substitution-table';
import * as logger from '../output/logger';

export interface SubstitutionLoadOptions {
  hasHeader?: boolean; // First row names the columns and is not a rule
}

export interface ParsedSubstitutionRows {
  rules: SubstitutionRule[];
  skippedRows: number[]; // 1-based row numbers
}

/**
 * Parses two-column CSV text into substitution rules. Rows that do not
 * have exactly two fields are skipped.
 */
export function parseSubstitutionRows(
  text: string,
  options: SubstitutionLoadOptions = {}
): ParsedSubstitutionRows {
  const hasHeader = options.hasHeader ?? true;
  const parsed = Papa.parse<string[]>(text, { delimiter: ',', skipEmptyLines: true });

  for (const issue of parsed.errors) {
    const row = issue.row !== undefined ? ` (row ${issue.row + 1})` : '';
    logger.debug(`Substitution table: ${issue.message}${row}`);
  }

  const rules: SubstitutionRule[] = [];
  const skippedRows: number[] = [];
  const rows = hasHeader ? parsed.data.slice(1) : parsed.data;
  const firstRowNumber = hasHeader ? 2 : 1;

  rows.forEach((row, i) => {
    const [from, to] = row;
    if (row.length !== 2 || from === undefined || to === undefined) {
      skippedRows.push(firstRowNumber + i);
      return;
    }
    rules.push({ from, to });
  });

  return { rules, skippedRows };
}

export function loadSubstitutionTable(
  filePath: string,
  options: SubstitutionLoadOptions = {}
): SubstitutionTable {
  const text = readUtf8File(filePath, 'substitution table');
  const { rules, skippedRows } = parseSubstitutionRows(text, options);

  if (skippedRows.length > 0) {
    logger.warn(`Skipped substitution rows without exactly two fields: ${skippedRows.join(', ')}`);
  }
  const table = buildSubstitutionTable(rules);
  logger.debug(`Loaded ${table.rules.length} substitution rule(s) from ${filePath}`);
  return table;
}
